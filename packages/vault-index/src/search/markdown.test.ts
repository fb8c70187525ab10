import { describe, it, expect } from 'vitest';
import {
  extractExcerpt,
  extractOutline,
  parseFrontmatter,
  splitFrontmatter,
} from './markdown.js';

const NOTE = [
  '---',
  'title: Garden log',
  'tags: [plants, outdoors]',
  '---',
  '',
  '# Garden log',
  'Planted tomatoes today.',
  '## Watering',
  '```',
  '# not a heading',
  '```',
  '#tag-only-line',
  '  ### Indented heading  ',
].join('\n');

describe('splitFrontmatter', () => {
  it('should separate the YAML block from the body', () => {
    expect(splitFrontmatter(NOTE)).toEqual({
      raw: 'title: Garden log\ntags: [plants, outdoors]',
      body: NOTE.slice(NOTE.indexOf('# Garden log')),
    });
  });

  it('should return null without a leading delimiter', () => {
    expect(splitFrontmatter('# Title\n---\nbody')).toBeNull();
  });

  it('should return null for an unterminated block', () => {
    expect(splitFrontmatter('---\ntitle: x\n')).toBeNull();
  });
});

describe('parseFrontmatter', () => {
  it('should parse a mapping', () => {
    expect(parseFrontmatter(NOTE)).toEqual({
      title: 'Garden log',
      tags: ['plants', 'outdoors'],
    });
  });

  it('should ignore invalid YAML', () => {
    expect(parseFrontmatter('---\nkey: [unclosed\n---\nbody')).toBeUndefined();
  });

  it('should ignore frontmatter that is not a mapping', () => {
    expect(parseFrontmatter('---\njust a sentence\n---\nbody')).toBeUndefined();
    expect(parseFrontmatter('---\n---\nbody')).toBeUndefined();
  });

  it('should return undefined without frontmatter', () => {
    expect(parseFrontmatter('# Title')).toBeUndefined();
  });
});

describe('extractOutline', () => {
  it('should list headings outside code fences and frontmatter', () => {
    expect(extractOutline(NOTE)).toEqual([
      '# Garden log',
      '## Watering',
      '### Indented heading',
    ]);
  });

  it('should return an empty outline for plain text', () => {
    expect(extractOutline('no headings here')).toEqual([]);
  });
});

describe('extractExcerpt', () => {
  it('should return short bodies whole, without frontmatter', () => {
    expect(extractExcerpt('---\na: 1\n---\n\nShort body.')).toBe('Short body.');
  });

  it('should cut at the last word boundary', () => {
    const text = 'word '.repeat(200);
    expect(extractExcerpt(text, 500)).toBe(`${'word '.repeat(99)}word...`);
  });

  it('should cut mid-word when no space falls in the second half', () => {
    expect(extractExcerpt('x'.repeat(600), 500)).toBe(`${'x'.repeat(500)}...`);
    expect(extractExcerpt(`ab ${'x'.repeat(600)}`, 500)).toBe(
      `ab ${'x'.repeat(497)}...`,
    );
  });
});
