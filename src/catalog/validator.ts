/**
 * Component and catalog validation logic
 *
 * Field-level rules run while scanning a single file; catalog-wide rules
 * (`validate`) run once the whole tree has been scanned.
 */

import type { Catalog, ComponentKind, ComponentRecord } from './types.js';
import type { FrontmatterData } from './frontmatter.js';
import { compareStrings, error, warning, type Diagnostic } from './diagnostics.js';

const PLUGIN_ID_REGEX = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;
const TRIGGER_PHRASE = 'use when';

export const DEFAULT_MAX_SKILL_DESCRIPTION_LENGTH = 1024;
export const DEFAULT_KNOWN_MODELS: readonly string[] = ['haiku', 'sonnet', 'opus', 'inherit'];

export interface FieldError {
  field: string;
  message: string;
}

export interface ComponentMetadata {
  name: string;
  description: string;
  model?: string;
  extra: Record<string, string>;
}

/**
 * Lowercase ASCII letters, digits and hyphens, not starting or ending with a hyphen
 */
export function isValidPluginId(name: string): boolean {
  return PLUGIN_ID_REGEX.test(name);
}

/**
 * Validate the required frontmatter keys of a component file
 */
export function validateComponentFrontmatter(frontmatter: FrontmatterData): FieldError[] {
  const errors: FieldError[] = [];

  for (const field of ['name', 'description']) {
    const value = frontmatter[field];
    if (value === undefined || value === null) {
      errors.push({ field, message: `"${field}" is required` });
    } else if (typeof value !== 'string') {
      errors.push({ field, message: `"${field}" must be a string` });
    } else if (value.trim() === '') {
      errors.push({ field, message: `"${field}" must not be empty` });
    }
  }

  return errors;
}

function stringifyScalar(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Normalize validated frontmatter into component metadata. Keys that are not
 * name/description (or model, for agents) land in `extra` when they hold a
 * scalar or a list of scalars.
 */
export function normalizeFrontmatter(frontmatter: FrontmatterData, kind: ComponentKind): ComponentMetadata {
  const extra: Record<string, string> = {};
  const reserved = kind === 'agent' ? ['name', 'description', 'model'] : ['name', 'description'];

  for (const [key, value] of Object.entries(frontmatter)) {
    if (reserved.includes(key)) continue;

    if (Array.isArray(value)) {
      const items = value.map(stringifyScalar).filter((item): item is string => item !== undefined);
      if (items.length === value.length) {
        extra[key] = items.join(', ');
      }
      continue;
    }

    const scalar = stringifyScalar(value);
    if (scalar !== undefined) {
      extra[key] = scalar;
    }
  }

  const model = kind === 'agent' ? stringifyScalar(frontmatter.model) : undefined;

  return {
    name: String(frontmatter.name),
    description: String(frontmatter.description),
    ...(model !== undefined ? { model } : {}),
    extra,
  };
}

/**
 * The "Use when ..." sentence of a skill description, or '' when absent
 */
export function extractTrigger(description: string): string {
  const start = description.toLowerCase().indexOf(TRIGGER_PHRASE);
  if (start === -1) return '';

  const rest = description.slice(start);
  const end = rest.search(/[.!?](\s|$)/);
  const sentence = end === -1 ? rest : rest.slice(0, end + 1);

  return sentence.replace(/\s+/g, ' ').trim();
}

/**
 * Advisory checks on a skill description. Skills failing them are still kept.
 */
export function checkSkillDescription(
  skill: Pick<ComponentRecord, 'name' | 'description' | 'filePath'>,
  pluginId: string,
  maxLength: number = DEFAULT_MAX_SKILL_DESCRIPTION_LENGTH
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const location = { pluginId, componentPath: skill.filePath };

  // Counted in code points
  const length = [...skill.description].length;

  if (length > maxLength) {
    diagnostics.push(
      warning(
        'skill.description_too_long',
        `Skill "${skill.name}" description is ${length} characters (limit ${maxLength})`,
        location
      )
    );
  }

  if (!skill.description.toLowerCase().includes(TRIGGER_PHRASE)) {
    diagnostics.push(
      warning('skill.missing_trigger', `Skill "${skill.name}" description has no "Use when" trigger`, location)
    );
  }

  return diagnostics;
}

export interface ValidateOptions {
  /** Accepted agent model labels, compared case-insensitively */
  knownModels?: readonly string[];
}

function checkMinimumComponents(catalog: Catalog): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const plugin of catalog.plugins.values()) {
    const runnable = plugin.components.some((c) => c.kind === 'agent' || c.kind === 'command');
    if (!runnable) {
      diagnostics.push(
        error(
          'plugin.missing_required_component',
          `Plugin "${plugin.id}" must define at least one agent or command`,
          { pluginId: plugin.id, componentPath: plugin.id }
        )
      );
    }
  }

  return diagnostics;
}

function checkDuplicateNames(catalog: Catalog): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const plugin of catalog.plugins.values()) {
    const groups = new Map<string, ComponentRecord[]>();

    for (const component of plugin.components) {
      const key = `${component.kind}\u0000${component.name}`;
      const group = groups.get(key) ?? [];
      group.push(component);
      groups.set(key, group);
    }

    for (const group of groups.values()) {
      if (group.length < 2) continue;

      const paths = group.map((c) => c.filePath).sort(compareStrings);
      const { kind, name } = group[0];
      diagnostics.push(
        error('component.duplicate_name', `Duplicate ${kind} name "${name}" in ${paths.join(', ')}`, {
          pluginId: plugin.id,
          componentPath: paths[0],
          relatedPaths: paths,
        })
      );
    }
  }

  return diagnostics;
}

function checkSkillCollisions(catalog: Catalog): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const owners = new Map<string, Array<{ pluginId: string; filePath: string }>>();

  for (const plugin of catalog.plugins.values()) {
    for (const skill of plugin.components) {
      if (skill.kind !== 'skill') continue;
      const list = owners.get(skill.name) ?? [];
      list.push({ pluginId: plugin.id, filePath: skill.filePath });
      owners.set(skill.name, list);
    }
  }

  for (const [name, list] of owners) {
    const pluginIds = [...new Set(list.map((o) => o.pluginId))].sort(compareStrings);
    if (pluginIds.length < 2) continue;

    for (const owner of list) {
      const others = pluginIds.filter((id) => id !== owner.pluginId);
      diagnostics.push(
        warning(
          'skill.name_collision_across_plugins',
          `Skill "${name}" is also defined by ${others.join(', ')}`,
          { pluginId: owner.pluginId, componentPath: owner.filePath }
        )
      );
    }
  }

  return diagnostics;
}

function checkAgentModels(catalog: Catalog, knownModels: readonly string[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const known = new Set(knownModels.map((m) => m.toLowerCase()));

  for (const plugin of catalog.plugins.values()) {
    for (const agent of plugin.components) {
      if (agent.kind !== 'agent' || agent.model === undefined) continue;
      if (known.has(agent.model.toLowerCase())) continue;

      diagnostics.push(
        warning(
          'agent.unknown_model',
          `Agent "${agent.name}" uses unknown model "${agent.model}" (known: ${knownModels.join(', ')})`,
          { pluginId: plugin.id, componentPath: agent.filePath }
        )
      );
    }
  }

  return diagnostics;
}

/**
 * Catalog-wide checks. Every check runs regardless of earlier failures;
 * the catalog is not modified.
 */
export function validate(catalog: Catalog, options: ValidateOptions = {}): Diagnostic[] {
  const knownModels = options.knownModels ?? DEFAULT_KNOWN_MODELS;

  return [
    ...checkMinimumComponents(catalog),
    ...checkDuplicateNames(catalog),
    ...checkSkillCollisions(catalog),
    ...checkAgentModels(catalog, knownModels),
  ];
}
