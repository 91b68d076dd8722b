import { describe, it, expect } from 'vitest';
import { parseFrontmatter, stringifyFrontmatter } from '../frontmatter.js';
import { FrontmatterError } from '../../utils/errors.js';

describe('parseFrontmatter', () => {
  it('parses frontmatter and trims the body', () => {
    const result = parseFrontmatter('---\nname: reviewer\ndescription: Reviews code\n---\n\n# Reviewer\n\nBody text\n');

    expect(result.frontmatter).toEqual({ name: 'reviewer', description: 'Reviews code' });
    expect(result.body).toBe('# Reviewer\n\nBody text');
  });

  it('handles CRLF line endings', () => {
    const result = parseFrontmatter('---\r\nname: x\r\n---\r\nBody\r\n');

    expect(result.frontmatter).toEqual({ name: 'x' });
    expect(result.body).toBe('Body');
  });

  it('ignores a leading byte order mark', () => {
    const result = parseFrontmatter('\uFEFF---\nname: x\n---\n');
    expect(result.frontmatter).toEqual({ name: 'x' });
    expect(result.body).toBe('');
  });

  it('keeps YAML types', () => {
    const result = parseFrontmatter('---\nname: x\ntools:\n  - Read\n  - Grep\nenabled: true\n---\n');
    expect(result.frontmatter).toEqual({ name: 'x', tools: ['Read', 'Grep'], enabled: true });
  });

  it('throws when there is no frontmatter block', () => {
    expect(() => parseFrontmatter('# Just markdown\n', 'a.md')).toThrow(
      'No YAML frontmatter found (expected a leading --- block)'
    );
  });

  it('throws when the block is never closed', () => {
    expect(() => parseFrontmatter('---\nname: x\n')).toThrow(FrontmatterError);
  });

  it('throws on invalid YAML', () => {
    expect(() => parseFrontmatter('---\nname: [unclosed\n---\n')).toThrow(/^Invalid YAML in frontmatter:/);
  });

  it('throws when frontmatter is not a mapping', () => {
    expect(() => parseFrontmatter('---\njust text\n---\n')).toThrow(
      'Frontmatter must be a YAML mapping of keys to values'
    );
    expect(() => parseFrontmatter('---\n- a\n- b\n---\n')).toThrow(
      'Frontmatter must be a YAML mapping of keys to values'
    );
  });

  it('records the file path on the error', () => {
    try {
      parseFrontmatter('nothing', 'plugins/a.md');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FrontmatterError);
      expect(error instanceof FrontmatterError && error.filePath).toBe('plugins/a.md');
    }
  });
});

describe('stringifyFrontmatter', () => {
  it('writes a frontmatter block followed by the body', () => {
    expect(stringifyFrontmatter({ name: 'x' }, '  Body  ')).toBe('---\nname: x\n---\n\nBody\n');
  });

  it('produces text parseFrontmatter reads back', () => {
    const frontmatter = { name: 'testing', description: 'Helpers: fixtures and mocks. Use when writing tests.' };
    const parsed = parseFrontmatter(stringifyFrontmatter(frontmatter, '# Testing'));

    expect(parsed.frontmatter).toEqual(frontmatter);
    expect(parsed.body).toBe('# Testing');
  });
});
