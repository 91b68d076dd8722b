/**
 * YAML frontmatter extraction for agent, command and SKILL.md files
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { FrontmatterError } from '../utils/errors.js';

const FRONTMATTER_REGEX = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n([\s\S]*))?$/;

export type FrontmatterData = Record<string, unknown>;

export interface ParsedMarkdown {
  frontmatter: FrontmatterData;
  body: string;
}

function isMapping(value: unknown): value is FrontmatterData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a Markdown document into its frontmatter mapping and body.
 * Throws FrontmatterError when the block is missing, is not valid YAML,
 * or is not a mapping.
 */
export function parseFrontmatter(content: string, filePath?: string): ParsedMarkdown {
  const source = content.startsWith('\uFEFF') ? content.slice(1) : content;
  const match = source.match(FRONTMATTER_REGEX);

  if (!match) {
    throw new FrontmatterError('No YAML frontmatter found (expected a leading --- block)', filePath);
  }

  const [, frontmatterStr, body = ''] = match;

  let data: unknown;
  try {
    data = yaml.parse(frontmatterStr);
  } catch (error) {
    throw new FrontmatterError(
      `Invalid YAML in frontmatter: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  if (!isMapping(data)) {
    throw new FrontmatterError('Frontmatter must be a YAML mapping of keys to values', filePath);
  }

  return { frontmatter: data, body: body.trim() };
}

export async function readFrontmatterFile(filePath: string): Promise<ParsedMarkdown> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseFrontmatter(content, filePath);
}

/**
 * Serialize a mapping back into a frontmatter block followed by a body
 */
export function stringifyFrontmatter(frontmatter: FrontmatterData, body: string): string {
  const yamlStr = yaml.stringify(frontmatter, { lineWidth: 0 });
  return `---\n${yamlStr}---\n\n${body.trim()}\n`;
}
