/**
 * Markdown helpers for search result enrichment.
 */

import yaml from 'js-yaml';
import { createModuleLogger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';

const log = createModuleLogger('markdown');

export const DEFAULT_EXCERPT_LENGTH = 500;

const HEADING_PATTERN = /^#{1,6}\s+\S/;
const FENCE_PATTERN = /^(```|~~~)/;

export interface FrontmatterBlock {
  /** YAML text between the delimiters, trimmed */
  raw: string;
  /** Everything after the closing delimiter, leading whitespace removed */
  body: string;
}

/**
 * Split a leading `---` frontmatter block from the body.
 * Returns null when the document has no frontmatter.
 */
export function splitFrontmatter(content: string): FrontmatterBlock | null {
  if (!content.startsWith('---')) return null;
  const end = content.indexOf('---', 3);
  if (end === -1) return null;

  return {
    raw: content.slice(3, end).trim(),
    body: content.slice(end + 3).trimStart(),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parsed YAML frontmatter, or undefined when absent, empty, not a mapping
 * or not valid YAML.
 */
export function parseFrontmatter(
  content: string,
): Record<string, unknown> | undefined {
  const block = splitFrontmatter(content);
  if (!block || block.raw === '') return undefined;

  let parsed: unknown;
  try {
    parsed = yaml.load(block.raw);
  } catch (error) {
    log.debug('frontmatter:invalid', { error: errorMessage(error) });
    return undefined;
  }
  return isRecord(parsed) ? parsed : undefined;
}

/**
 * ATX headings of the document body, in order. Lines inside fenced code
 * blocks and the frontmatter are not headings.
 */
export function extractOutline(content: string): string[] {
  const body = splitFrontmatter(content)?.body ?? content;
  const headings: string[] = [];
  let inFence = false;

  for (const line of body.split('\n')) {
    const stripped = line.trim();
    if (FENCE_PATTERN.test(stripped)) {
      inFence = !inFence;
      continue;
    }
    if (!inFence && HEADING_PATTERN.test(stripped)) {
      headings.push(stripped);
    }
  }
  return headings;
}

/**
 * Leading text of the body, cut at a word boundary when one falls in the
 * second half of the window.
 */
export function extractExcerpt(
  content: string,
  maxLength = DEFAULT_EXCERPT_LENGTH,
): string {
  const text = splitFrontmatter(content)?.body ?? content;
  if (text.length <= maxLength) return text;

  let truncated = text.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');
  if (lastSpace > Math.floor(maxLength / 2)) {
    truncated = truncated.slice(0, lastSpace);
  }
  return `${truncated}...`;
}
