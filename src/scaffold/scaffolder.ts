/**
 * Plugin scaffolding - writes a new plugin directory that the scanner accepts
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { stringifyFrontmatter } from '../catalog/frontmatter.js';
import { isValidPluginId } from '../catalog/validator.js';
import type { PluginManifest } from '../catalog/types.js';
import { ScaffoldError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface ScaffoldOptions {
  id: string;
  description: string;
  version?: string;
  category?: string;
  keywords?: string[];
  agents?: string[];
  commands?: string[];
  skills?: string[];
  /** Model written into agent frontmatter */
  model?: string;
}

export interface ScaffoldResult {
  pluginPath: string;
  /** Created files, relative to the plugin directory */
  files: string[];
}

function titleCase(name: string): string {
  return name
    .split('-')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

function checkNames(kind: string, names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (!isValidPluginId(name)) {
      throw new ScaffoldError(`Invalid ${kind} name "${name}": use lowercase letters, digits and inner hyphens`);
    }
    if (seen.has(name)) {
      throw new ScaffoldError(`Duplicate ${kind} name "${name}"`);
    }
    seen.add(name);
  }
}

function agentFile(name: string, model: string): string {
  return stringifyFrontmatter(
    {
      name,
      description: `${titleCase(name)} specialist. Use when the task needs ${name.replace(/-/g, ' ')} expertise.`,
      model,
    },
    `# ${titleCase(name)}\n\nDescribe the agent's role, expertise and working style here.`
  );
}

function commandFile(name: string): string {
  return stringifyFrontmatter(
    {
      name,
      description: `Run the ${name.replace(/-/g, ' ')} workflow.`,
    },
    `# ${titleCase(name)}\n\n## Steps\n\n1. First, do this\n2. Then do that\n3. Finally, report the result`
  );
}

function skillFile(name: string): string {
  return stringifyFrontmatter(
    {
      name,
      description: `${titleCase(name)} knowledge. Use when working on ${name.replace(/-/g, ' ')} tasks.`,
    },
    `# ${titleCase(name)}\n\n## Overview\n\nOne-liner of what this skill covers.\n\n## Workflow\n\n1. First, do this\n2. Then do that`
  );
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Create <root>/<id> with a plugin manifest and one file per requested
 * component. Refuses to touch an existing directory.
 */
export async function scaffoldPlugin(root: string, options: ScaffoldOptions): Promise<ScaffoldResult> {
  const agents = options.agents ?? [];
  const commands = options.commands ?? [];
  const skills = options.skills ?? [];

  if (!isValidPluginId(options.id)) {
    throw new ScaffoldError(`Invalid plugin id "${options.id}": use lowercase letters, digits and inner hyphens`);
  }
  if (agents.length === 0 && commands.length === 0) {
    throw new ScaffoldError('A plugin needs at least one agent or command');
  }
  checkNames('agent', agents);
  checkNames('command', commands);
  checkNames('skill', skills);

  const pluginPath = path.join(path.resolve(root), options.id);

  if (await pathExists(pluginPath)) {
    throw new ScaffoldError(`Plugin directory already exists: ${pluginPath}`);
  }

  const manifest: PluginManifest = {
    name: options.id,
    description: options.description,
    version: options.version ?? '0.1.0',
    ...(options.category !== undefined ? { category: options.category } : {}),
    ...(options.keywords && options.keywords.length > 0 ? { keywords: options.keywords } : {}),
  };

  const files = new Map<string, string>([['.claude-plugin/plugin.json', `${JSON.stringify(manifest, null, 2)}\n`]]);
  for (const name of agents) files.set(`agents/${name}.md`, agentFile(name, options.model ?? 'sonnet'));
  for (const name of commands) files.set(`commands/${name}.md`, commandFile(name));
  for (const name of skills) files.set(`skills/${name}/SKILL.md`, skillFile(name));

  for (const [relativePath, content] of files) {
    const target = path.join(pluginPath, ...relativePath.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }

  logger.info(`Created plugin: ${pluginPath} (${files.size} files)`);

  return { pluginPath, files: [...files.keys()] };
}
