/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { createModuleLogger } from '../core/Logger.js';
import { VaultIndexError, errorMessage } from '../core/errors.js';
import type { RecentNote, SearchRequest, SearchResult } from '../search/Searcher.js';
import { parseNoteUri } from '../search/Searcher.js';
import type { DocumentKey } from '../storage/types.js';

const log = createModuleLogger('McpHandlers');

// ============================================================================
// Types
// ============================================================================

/** What the MCP surface needs from the worker. */
export interface NotesBackend {
  search(request: SearchRequest): Promise<SearchResult[]>;
  listRecent(limit?: number): Promise<RecentNote[]>;
  readNote(key: DocumentKey): Promise<string>;
}

export interface HandlerContext {
  backend: NotesBackend;
  uriScheme: string;
}

export interface ResourceEntry {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

const MARKDOWN = 'text/markdown';

// ============================================================================
// Resources
// ============================================================================

export async function listResources(
  context: HandlerContext,
): Promise<{ resources: ResourceEntry[] }> {
  const notes = await context.backend.listRecent();
  return {
    resources: notes.map((note) => ({
      uri: note.uri,
      name: note.relativePath,
      description: `Vault ${note.vaultName}, modified ${new Date(note.mtimeMs).toISOString()}`,
      mimeType: MARKDOWN,
    })),
  };
}

export async function readResource(
  context: HandlerContext,
  uri: string,
): Promise<{ contents: Array<{ uri: string; mimeType: string; text: string }> }> {
  const key = parseNoteUri(context.uriScheme, uri);
  if (!key) {
    throw new McpError(ErrorCode.InvalidParams, `Not a note URI: ${uri}`);
  }
  try {
    const text = await context.backend.readNote(key);
    return { contents: [{ uri, mimeType: MARKDOWN, text }] };
  } catch (error) {
    log.warn('resource:read-failed', { uri, error: errorMessage(error) });
    throw new McpError(ErrorCode.InvalidRequest, errorMessage(error));
  }
}

// ============================================================================
// Tools
// ============================================================================

export const SEARCH_NOTES_TOOL = 'search-notes';

export const searchNotesArgsSchema = z.object({
  query: z.string().min(1),
  limit: z.number().int().positive().optional(),
});

export const toolDefinitions = [
  {
    name: SEARCH_NOTES_TOOL,
    description:
      'Semantic search over the indexed markdown notes. Returns the closest ' +
      'notes with their URI, frontmatter, headings and an excerpt.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'What to look for' },
        limit: {
          type: 'integer',
          minimum: 1,
          description: 'Maximum number of results',
        },
      },
      required: ['query'],
    },
  },
];

export async function callTool(
  context: HandlerContext,
  name: string,
  args: Record<string, unknown> | undefined,
): Promise<ToolResult> {
  if (name !== SEARCH_NOTES_TOOL) {
    return errorResult(`Unknown tool: ${name}`);
  }

  const parsed = searchNotesArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    return errorResult(
      `Invalid arguments: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        .join('; ')}`,
    );
  }

  try {
    const results = await context.backend.search(parsed.data);
    const payload = results.map((result) => ({
      uri: result.uri,
      score: result.score,
      frontmatter: result.frontmatter,
      outline: result.outline,
      excerpt: result.excerpt,
    }));
    return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
  } catch (error) {
    log.warn('tool:failed', {
      tool: name,
      kind: error instanceof VaultIndexError ? error.kind : undefined,
      error: errorMessage(error),
    });
    return errorResult(`Search failed: ${errorMessage(error)}`);
  }
}

function errorResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}
