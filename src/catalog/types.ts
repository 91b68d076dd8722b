/**
 * Type definitions for the plugin catalog
 *
 * Layout consumed by the scanner:
 *   <root>/<plugin-id>/agents/*.md
 *   <root>/<plugin-id>/commands/*.md
 *   <root>/<plugin-id>/skills/<skill-id>/SKILL.md
 *   <root>/<plugin-id>/.claude-plugin/plugin.json (optional)
 */

/** Hyphen-case plugin identifier, unique within one catalog */
export type PluginId = string;

export const COMPONENT_KINDS = ['agent', 'command', 'skill'] as const;

export type ComponentKind = (typeof COMPONENT_KINDS)[number];

/**
 * One agent, command or skill discovered on disk
 */
export interface ComponentRecord {
  readonly kind: ComponentKind;
  /** Frontmatter name for agents and commands, directory name for skills */
  readonly name: string;
  readonly description: string;
  /** Declared model (agents only) */
  readonly model?: string;
  /** Path relative to the scanned root, always with `/` separators */
  readonly filePath: string;
  /**
   * Remaining scalar frontmatter keys. Skills always carry `use_when`,
   * the trigger sentence taken from the description.
   */
  readonly extra: Readonly<Record<string, string>>;
}

/**
 * A plugin directory with its parsed components
 */
export interface PluginRecord {
  readonly id: PluginId;
  readonly description: string;
  readonly version?: string;
  readonly category?: string;
  readonly keywords: readonly string[];
  readonly author?: Readonly<PluginAuthor>;
  readonly license?: string;
  readonly homepage?: string;
  /** Absolute path to the plugin directory */
  readonly path: string;
  /** Agents, then commands, then skills, each in file name order */
  readonly components: readonly ComponentRecord[];
}

/**
 * Aggregate root. Built once per run by the scanner, frozen afterwards.
 */
export interface Catalog {
  /** Absolute path of the scanned root */
  readonly root: string;
  readonly plugins: ReadonlyMap<PluginId, PluginRecord>;
}

export interface PluginAuthor {
  name: string;
  email?: string;
  url?: string;
}

/**
 * Optional plugin manifest (.claude-plugin/plugin.json)
 */
export interface PluginManifest {
  name?: string;
  description?: string;
  version?: string;
  category?: string;
  keywords?: string[];
  author?: PluginAuthor;
  license?: string;
  homepage?: string;
}
