/**
 * Scan -> validate -> render, as used by the CLI and programmatic callers
 */

import type { Catalog } from '../catalog/types.js';
import { scan } from '../catalog/scanner.js';
import { validate } from '../catalog/validator.js';
import {
  hasErrors,
  sortDiagnostics,
  summarizeDiagnostics,
  type Diagnostic,
  type DiagnosticSummary,
} from '../catalog/diagnostics.js';
import { render, type RenderMode, type RenderResult } from '../render/renderer.js';
import { FileTemplateSource, resolveTargets, type TemplateSource } from '../render/targets.js';
import { CancelledError, RenderError, ScanError } from '../utils/errors.js';
import { ConfigManager } from './config.js';

export const ExitCode = {
  Success: 0,
  ValidationErrors: 1,
  ScanFailure: 2,
  RenderFailure: 3,
  Cancelled: 130,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export interface CheckOptions {
  config?: ConfigManager;
  signal?: AbortSignal;
}

export interface CheckOutcome {
  catalog: Catalog;
  /** Scanner and validator diagnostics, sorted */
  diagnostics: Diagnostic[];
  summary: DiagnosticSummary;
  exitCode: ExitCodeValue;
}

export interface RenderRunOptions extends CheckOptions {
  targets?: readonly string[] | 'all';
  mode?: RenderMode;
  /** Defaults to the configured output directory */
  outputDir?: string;
  /** Defaults to files in the configured (or bundled) templates directory */
  templates?: TemplateSource;
  generatedAt?: Date;
}

export interface RenderRunOutcome extends CheckOutcome {
  results: RenderResult[];
}

/**
 * Scan and validate a plugin root
 */
export async function runCheck(root: string, options: CheckOptions = {}): Promise<CheckOutcome> {
  const config = options.config ?? ConfigManager.fromObject({});

  const scanned = await scan(root, {
    concurrency: config.getConcurrency(),
    maxSkillDescriptionLength: config.getMaxSkillDescriptionLength(),
    signal: options.signal,
  });
  const validation = validate(scanned.catalog, { knownModels: config.getKnownModels() });
  const diagnostics = sortDiagnostics([...scanned.diagnostics, ...validation]);

  return {
    catalog: scanned.catalog,
    diagnostics,
    summary: summarizeDiagnostics(diagnostics),
    exitCode: hasErrors(diagnostics) ? ExitCode.ValidationErrors : ExitCode.Success,
  };
}

/**
 * Full pipeline. Validation errors do not stop rendering; they only decide
 * the exit code.
 */
export async function runRender(root: string, options: RenderRunOptions = {}): Promise<RenderRunOutcome> {
  const config = options.config ?? ConfigManager.fromObject({});
  const targets = resolveTargets(options.targets ?? 'all');
  const checked = await runCheck(root, { config, signal: options.signal });

  const templates = options.templates ?? new FileTemplateSource(config.getTemplatesDir());
  const rendered = await render(checked.catalog, targets, options.mode ?? 'write', {
    outputDir: options.outputDir ?? config.getOutputDir(),
    templates,
    marketplace: config.getMarketplace(),
    generatedAt: options.generatedAt,
    signal: options.signal,
  });

  const diagnostics = sortDiagnostics([...checked.diagnostics, ...rendered.diagnostics]);

  return {
    catalog: checked.catalog,
    diagnostics,
    summary: summarizeDiagnostics(diagnostics),
    exitCode: hasErrors(diagnostics) ? ExitCode.ValidationErrors : ExitCode.Success,
    results: rendered.results,
  };
}

/**
 * Exit code for an error that ended the run
 */
export function exitCodeForError(error: unknown): ExitCodeValue {
  if (error instanceof CancelledError) return ExitCode.Cancelled;
  if (error instanceof ScanError) return ExitCode.ScanFailure;
  if (error instanceof RenderError) return ExitCode.RenderFailure;
  return ExitCode.ValidationErrors;
}
