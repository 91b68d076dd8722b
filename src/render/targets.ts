/**
 * Render targets and template sources
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { RenderError } from '../utils/errors.js';

export type TargetFormat = 'json' | 'markdown';

export interface RenderTarget {
  readonly name: string;
  readonly templateId: string;
  /** Relative to the output directory */
  readonly outputPath: string;
  readonly format: TargetFormat;
}

export const RENDER_TARGETS: readonly RenderTarget[] = [
  { name: 'manifest', templateId: 'manifest', outputPath: 'marketplace.json', format: 'json' },
  { name: 'agents', templateId: 'agents', outputPath: 'agents.md', format: 'markdown' },
  { name: 'agent-skills', templateId: 'agent-skills', outputPath: 'agent-skills.md', format: 'markdown' },
  { name: 'plugins', templateId: 'plugins', outputPath: 'plugins.md', format: 'markdown' },
  { name: 'usage', templateId: 'usage', outputPath: 'usage.md', format: 'markdown' },
];

export const TARGET_NAMES: readonly string[] = RENDER_TARGETS.map((t) => t.name);

/**
 * Resolve target names ("all" selects every target). Unknown names and an
 * empty selection are fatal.
 */
export function resolveTargets(names: readonly string[] | 'all' = 'all'): RenderTarget[] {
  if (names === 'all' || names.includes('all')) {
    return [...RENDER_TARGETS];
  }

  const unknown = names.filter((n) => !TARGET_NAMES.includes(n));
  if (unknown.length > 0) {
    throw new RenderError(`Unknown render target(s): ${unknown.join(', ')} (available: ${TARGET_NAMES.join(', ')})`);
  }

  const selected = RENDER_TARGETS.filter((t) => names.includes(t.name));
  if (selected.length === 0) {
    throw new RenderError('No render targets selected');
  }
  return selected;
}

/**
 * Where Markdown templates come from
 */
export interface TemplateSource {
  /** Template text, or undefined when there is no such template */
  load(templateId: string): Promise<string | undefined>;
}

export const TEMPLATE_EXTENSION = '.md.tmpl';

/** templates/ at the package root, for both src/ and dist/ layouts */
export function getDefaultTemplatesDir(): string {
  return fileURLToPath(new URL('../../templates/', import.meta.url));
}

export class FileTemplateSource implements TemplateSource {
  constructor(private readonly dir: string = getDefaultTemplatesDir()) {}

  templatePath(templateId: string): string {
    return path.join(this.dir, `${templateId}${TEMPLATE_EXTENSION}`);
  }

  async load(templateId: string): Promise<string | undefined> {
    try {
      return await fs.readFile(this.templatePath(templateId), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }
}

/**
 * In-memory templates, used by tests and programmatic callers
 */
export class MapTemplateSource implements TemplateSource {
  private readonly templates: Map<string, string>;

  constructor(templates: Record<string, string>) {
    this.templates = new Map(Object.entries(templates));
  }

  async load(templateId: string): Promise<string | undefined> {
    return this.templates.get(templateId);
  }
}
