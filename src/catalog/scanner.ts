/**
 * Catalog scanner - turns a plugin root directory into an in-memory Catalog
 *
 * Only a missing or unreadable root is fatal. Everything found below it is
 * reported as diagnostics, and whatever parsed cleanly is kept.
 */

import type { Dirent, Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { Catalog, ComponentKind, ComponentRecord, PluginManifest, PluginRecord } from './types.js';
import { readFrontmatterFile, type FrontmatterData } from './frontmatter.js';
import {
  DEFAULT_MAX_SKILL_DESCRIPTION_LENGTH,
  checkSkillDescription,
  extractTrigger,
  isValidPluginId,
  normalizeFrontmatter,
  validateComponentFrontmatter,
} from './validator.js';
import { compareStrings, error, warning, type Diagnostic } from './diagnostics.js';
import { ScanError, errorMessage } from '../utils/errors.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_SCAN_CONCURRENCY = 4;

const PluginManifestSchema: z.ZodType<PluginManifest> = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  version: z.string().optional(),
  category: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  author: z
    .object({
      name: z.string(),
      email: z.string().optional(),
      url: z.string().optional(),
    })
    .optional(),
  license: z.string().optional(),
  homepage: z.string().optional(),
});

export interface ScanOptions {
  /** Plugin directories scanned in parallel */
  concurrency?: number;
  maxSkillDescriptionLength?: number;
  signal?: AbortSignal;
}

export interface ScanResult {
  catalog: Catalog;
  diagnostics: Diagnostic[];
}

interface PluginScan {
  record?: PluginRecord;
  diagnostics: Diagnostic[];
}

interface ComponentScan {
  component?: ComponentRecord;
  diagnostics: Diagnostic[];
}

interface ScanContext {
  root: string;
  pluginId: string;
  maxSkillDescriptionLength: number;
}

function toRelative(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join('/');
}

function byName(a: Dirent, b: Dirent): number {
  return compareStrings(a.name, b.name);
}

/** A directory entry with symbolic links followed */
interface DirEntry {
  name: string;
  path: string;
  isFile: boolean;
  isDirectory: boolean;
}

interface Listing {
  entries: DirEntry[];
  diagnostics: Diagnostic[];
}

function unreadable(message: string, root: string, target: string, pluginId?: string): Diagnostic {
  return warning('plugin.unreadable_path', message, {
    ...(pluginId !== undefined ? { pluginId } : {}),
    componentPath: toRelative(root, target),
  });
}

/**
 * Resolve dirents, following symbolic links. A link that cannot be followed
 * is reported and left out.
 */
async function resolveEntries(dir: string, dirents: Dirent[], root: string, pluginId?: string): Promise<Listing> {
  const entries: DirEntry[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const dirent of [...dirents].sort(byName)) {
    const entryPath = path.join(dir, dirent.name);

    if (!dirent.isSymbolicLink()) {
      entries.push({ name: dirent.name, path: entryPath, isFile: dirent.isFile(), isDirectory: dirent.isDirectory() });
      continue;
    }

    try {
      const target = await fs.stat(entryPath);
      entries.push({ name: dirent.name, path: entryPath, isFile: target.isFile(), isDirectory: target.isDirectory() });
    } catch (err) {
      diagnostics.push(unreadable(`Cannot follow symbolic link: ${errorMessage(err)}`, root, entryPath, pluginId));
    }
  }

  return { entries, diagnostics };
}

/**
 * Directory entries sorted by name. A missing directory yields none; one
 * that cannot be read is reported and yields none.
 */
async function listEntries(dir: string, ctx: ScanContext): Promise<Listing> {
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return { entries: [], diagnostics: [] };
    }
    return {
      entries: [],
      diagnostics: [unreadable(`Cannot read directory: ${errorMessage(err)}`, ctx.root, dir, ctx.pluginId)],
    };
  }

  return resolveEntries(dir, dirents, ctx.root, ctx.pluginId);
}

/**
 * Load .claude-plugin/plugin.json when the plugin ships one
 */
async function loadPluginManifest(pluginPath: string, ctx: ScanContext): Promise<{
  manifest?: PluginManifest;
  diagnostics: Diagnostic[];
}> {
  const manifestPath = path.join(pluginPath, '.claude-plugin', 'plugin.json');
  const location = { pluginId: ctx.pluginId, componentPath: toRelative(ctx.root, manifestPath) };

  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return { diagnostics: [] };
    }
    return {
      diagnostics: [
        warning('plugin.invalid_manifest', `Cannot read plugin manifest: ${errorMessage(err)}`, location),
      ],
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return {
      diagnostics: [
        warning('plugin.invalid_manifest', `Invalid JSON in plugin manifest: ${errorMessage(err)}`, location),
      ],
    };
  }

  const parsed = PluginManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return {
      diagnostics: [warning('plugin.invalid_manifest', `Invalid plugin manifest: ${issues}`, location)],
    };
  }

  const manifest = parsed.data;
  const diagnostics: Diagnostic[] = [];
  if (manifest.name !== undefined && manifest.name !== ctx.pluginId) {
    diagnostics.push(
      warning(
        'plugin.manifest_name_mismatch',
        `Plugin manifest name "${manifest.name}" does not match directory "${ctx.pluginId}"`,
        location
      )
    );
  }

  return { manifest, diagnostics };
}

/**
 * Parse one component file. Files with unusable frontmatter are excluded
 * and reported as warnings.
 */
async function scanComponent(
  kind: ComponentKind,
  filePath: string,
  ctx: ScanContext,
  skillName?: string
): Promise<ComponentScan> {
  const relativePath = toRelative(ctx.root, filePath);
  const location = { pluginId: ctx.pluginId, componentPath: relativePath };

  let frontmatter: FrontmatterData;
  try {
    ({ frontmatter } = await readFrontmatterFile(filePath));
  } catch (err) {
    return { diagnostics: [warning('component.invalid_frontmatter', errorMessage(err), location)] };
  }

  const fieldErrors = validateComponentFrontmatter(frontmatter);
  if (fieldErrors.length > 0) {
    return {
      diagnostics: [
        warning(
          'component.invalid_frontmatter',
          `Invalid ${kind} frontmatter: ${fieldErrors.map((e) => e.message).join('; ')}`,
          location
        ),
      ],
    };
  }

  const metadata = normalizeFrontmatter(frontmatter, kind);
  const diagnostics: Diagnostic[] = [];
  let name = metadata.name;
  let extra = metadata.extra;

  if (kind === 'skill' && skillName !== undefined) {
    if (metadata.name !== skillName) {
      diagnostics.push(
        warning(
          'skill.name_mismatch',
          `Skill frontmatter name "${metadata.name}" differs from directory "${skillName}"; using the directory name`,
          location
        )
      );
    }
    name = skillName;
    extra = { ...extra, use_when: extractTrigger(metadata.description) };
  }

  const component: ComponentRecord = Object.freeze({
    kind,
    name,
    description: metadata.description,
    ...(metadata.model !== undefined ? { model: metadata.model } : {}),
    filePath: relativePath,
    extra: Object.freeze(extra),
  });

  if (kind === 'skill') {
    diagnostics.push(...checkSkillDescription(component, ctx.pluginId, ctx.maxSkillDescriptionLength));
  }

  logger.debug(`Discovered ${kind}: ${ctx.pluginId}:${name}`);
  return { component, diagnostics };
}

/**
 * Agents or commands: every .md file directly inside the directory
 */
async function scanMarkdownDir(kind: ComponentKind, dir: string, ctx: ScanContext): Promise<ComponentScan[]> {
  const listing = await listEntries(dir, ctx);
  const files = listing.entries.filter((e) => e.isFile && e.name.endsWith('.md'));

  const scans = await Promise.all(files.map((e) => scanComponent(kind, e.path, ctx)));
  return [{ diagnostics: listing.diagnostics }, ...scans];
}

/**
 * Skills: every subdirectory holding a SKILL.md
 */
async function scanSkillsDir(dir: string, ctx: ScanContext): Promise<ComponentScan[]> {
  const listing = await listEntries(dir, ctx);
  const scans: ComponentScan[] = [{ diagnostics: listing.diagnostics }];

  for (const entry of listing.entries) {
    if (!entry.isDirectory) continue;

    const skillFilePath = path.join(entry.path, 'SKILL.md');
    try {
      await fs.access(skillFilePath);
    } catch {
      logger.debug(`Skipping ${entry.path}: no SKILL.md`);
      continue;
    }

    scans.push(await scanComponent('skill', skillFilePath, ctx, entry.name));
  }

  return scans;
}

async function scanPlugin(root: string, dirName: string, options: ScanOptions): Promise<PluginScan> {
  const pluginPath = path.join(root, dirName);

  if (!isValidPluginId(dirName)) {
    return {
      diagnostics: [
        error(
          'plugin.invalid_name',
          `Plugin directory "${dirName}" is not a valid hyphen-case id (lowercase letters, digits and inner hyphens)`,
          { componentPath: dirName }
        ),
      ],
    };
  }

  const ctx: ScanContext = {
    root,
    pluginId: dirName,
    maxSkillDescriptionLength: options.maxSkillDescriptionLength ?? DEFAULT_MAX_SKILL_DESCRIPTION_LENGTH,
  };

  const [manifestScan, agents, commands, skills] = await Promise.all([
    loadPluginManifest(pluginPath, ctx),
    scanMarkdownDir('agent', path.join(pluginPath, 'agents'), ctx),
    scanMarkdownDir('command', path.join(pluginPath, 'commands'), ctx),
    scanSkillsDir(path.join(pluginPath, 'skills'), ctx),
  ]);

  const componentScans = [...agents, ...commands, ...skills];
  const diagnostics = [...manifestScan.diagnostics, ...componentScans.flatMap((s) => s.diagnostics)];
  const components = componentScans
    .map((s) => s.component)
    .filter((c): c is ComponentRecord => c !== undefined);

  if (components.length === 0) {
    diagnostics.push(
      error('plugin.empty', `Plugin "${dirName}" has no valid agents, commands or skills`, {
        pluginId: dirName,
        componentPath: dirName,
      })
    );
    return { diagnostics };
  }

  const manifest = manifestScan.manifest;
  const record: PluginRecord = Object.freeze({
    id: dirName,
    description: manifest?.description ?? '',
    ...(manifest?.version !== undefined ? { version: manifest.version } : {}),
    ...(manifest?.category !== undefined ? { category: manifest.category } : {}),
    keywords: Object.freeze([...(manifest?.keywords ?? [])]),
    ...(manifest?.author !== undefined ? { author: Object.freeze({ ...manifest.author }) } : {}),
    ...(manifest?.license !== undefined ? { license: manifest.license } : {}),
    ...(manifest?.homepage !== undefined ? { homepage: manifest.homepage } : {}),
    path: pluginPath,
    components: Object.freeze(components),
  });

  const count = (kind: ComponentKind) => components.filter((c) => c.kind === kind).length;
  logger.debug(
    `Scanned plugin: ${dirName} (${count('agent')} agents, ${count('command')} commands, ${count('skill')} skills)`
  );

  return { record, diagnostics };
}

/**
 * Build a frozen catalog. Plugins are keyed and inserted in id order.
 */
export function createCatalog(root: string, records: readonly PluginRecord[]): Catalog {
  const sorted = [...records].sort((a, b) => compareStrings(a.id, b.id));
  const plugins = new Map<string, PluginRecord>();

  for (const record of sorted) {
    plugins.set(record.id, record);
  }

  return Object.freeze({ root, plugins });
}

/**
 * Scan a plugin root. Throws ScanError when the root is missing, not a
 * directory, or unreadable; CancelledError when the signal fires.
 */
export async function scan(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const root = path.resolve(rootPath);

  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ScanError(`Plugin root not found: ${root}`, root);
    }
    throw new ScanError(`Cannot access plugin root ${root}: ${errorMessage(err)}`, root);
  }

  if (!stat.isDirectory()) {
    throw new ScanError(`Plugin root is not a directory: ${root}`, root);
  }

  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(root, { withFileTypes: true });
  } catch (err) {
    throw new ScanError(`Cannot read plugin root ${root}: ${errorMessage(err)}`, root);
  }

  const listing = await resolveEntries(root, dirents.filter((d) => !d.name.startsWith('.')), root);
  const pluginDirs = listing.entries.filter((e) => e.isDirectory).map((e) => e.name);

  // A plugin that fails in an unexpected way is reported, never fatal
  const scans = await mapWithConcurrency(
    pluginDirs,
    options.concurrency ?? DEFAULT_SCAN_CONCURRENCY,
    (dirName) =>
      scanPlugin(root, dirName, options).catch(
        (err: unknown): PluginScan => ({
          diagnostics: [
            unreadable(`Cannot scan plugin directory: ${errorMessage(err)}`, root, path.join(root, dirName), dirName),
          ],
        })
      ),
    options.signal
  );

  const records = scans.map((s) => s.record).filter((r): r is PluginRecord => r !== undefined);
  const catalog = createCatalog(root, records);

  logger.info(`Scanned ${catalog.plugins.size} plugins from ${root}`);

  return { catalog, diagnostics: [...listing.diagnostics, ...scans.flatMap((s) => s.diagnostics)] };
}
