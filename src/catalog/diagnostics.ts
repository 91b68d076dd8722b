/**
 * Structured scan, validation and render problems.
 *
 * Recoverable problems never throw across the scanner/validator/renderer
 * boundary; they travel as Diagnostic values and are printed at the end.
 */

import type { PluginId } from './types.js';

export type Severity = 'error' | 'warning';

export type DiagnosticCode =
  | 'plugin.invalid_name'
  | 'plugin.empty'
  | 'plugin.invalid_manifest'
  | 'plugin.manifest_name_mismatch'
  | 'plugin.missing_required_component'
  | 'plugin.unreadable_path'
  | 'component.invalid_frontmatter'
  | 'component.duplicate_name'
  | 'skill.description_too_long'
  | 'skill.missing_trigger'
  | 'skill.name_mismatch'
  | 'skill.name_collision_across_plugins'
  | 'agent.unknown_model'
  | 'render.missing_template'
  | 'render.template_error'
  | 'render.write_failed';

export interface Diagnostic {
  readonly severity: Severity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly pluginId?: PluginId;
  /** Root-relative path of the file or directory the problem is about */
  readonly componentPath?: string;
  /** Other files involved (e.g. every file of a duplicate name) */
  readonly relatedPaths?: readonly string[];
}

export interface DiagnosticLocation {
  pluginId?: PluginId;
  componentPath?: string;
  relatedPaths?: string[];
}

/** Codes whose presence means something was left out of the catalog */
export const EXCLUDING_CODES: ReadonlySet<DiagnosticCode> = new Set<DiagnosticCode>([
  'plugin.invalid_name',
  'plugin.empty',
  'plugin.unreadable_path',
  'component.invalid_frontmatter',
]);

export function createDiagnostic(
  severity: Severity,
  code: DiagnosticCode,
  message: string,
  location: DiagnosticLocation = {}
): Diagnostic {
  const diagnostic: Diagnostic = {
    severity,
    code,
    message,
    ...(location.pluginId !== undefined ? { pluginId: location.pluginId } : {}),
    ...(location.componentPath !== undefined ? { componentPath: location.componentPath } : {}),
    ...(location.relatedPaths !== undefined ? { relatedPaths: Object.freeze([...location.relatedPaths]) } : {}),
  };
  return Object.freeze(diagnostic);
}

export function error(code: DiagnosticCode, message: string, location?: DiagnosticLocation): Diagnostic {
  return createDiagnostic('error', code, message, location);
}

export function warning(code: DiagnosticCode, message: string, location?: DiagnosticLocation): Diagnostic {
  return createDiagnostic('warning', code, message, location);
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Code-point comparison. localeCompare is avoided so that ordering does not
 * depend on the machine's locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Errors first, then by plugin id, path and code. Diagnostics without a
 * plugin sort before those with one.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  const severityRank = (s: Severity) => (s === 'error' ? 0 : 1);

  return [...diagnostics].sort(
    (a, b) =>
      severityRank(a.severity) - severityRank(b.severity) ||
      compareStrings(a.pluginId ?? '', b.pluginId ?? '') ||
      compareStrings(a.componentPath ?? '', b.componentPath ?? '') ||
      compareStrings(a.code, b.code) ||
      compareStrings(a.message, b.message)
  );
}

export interface DiagnosticSummary {
  errors: number;
  warnings: number;
  /** Plugin directories or component files left out of the catalog */
  excluded: string[];
}

export function summarizeDiagnostics(diagnostics: readonly Diagnostic[]): DiagnosticSummary {
  const excluded = new Set<string>();

  for (const d of diagnostics) {
    if (!EXCLUDING_CODES.has(d.code)) continue;
    const subject = d.componentPath ?? d.pluginId;
    if (subject) excluded.add(subject);
  }

  return {
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
    excluded: [...excluded].sort(compareStrings),
  };
}

/**
 * Single-line rendering, e.g.
 * `error component.duplicate_name [tools] Duplicate command name "build" (tools/commands/a.md)`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const scope = diagnostic.pluginId ? ` [${diagnostic.pluginId}]` : '';
  const where = diagnostic.componentPath ? ` (${diagnostic.componentPath})` : '';
  return `${diagnostic.severity} ${diagnostic.code}${scope} ${diagnostic.message}${where}`;
}
