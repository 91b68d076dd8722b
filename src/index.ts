/**
 * plugin-catalog - scan, validate and document agent/command/skill plugins
 *
 * Main exports for programmatic usage
 */

export * from './catalog/index.js';
export * from './render/index.js';

export { ConfigManager } from './core/config.js';
export type { CatalogConfig, CatalogConfigInput, ConfigOverrides, MarketplaceConfig } from './core/config.js';
export { ExitCode, exitCodeForError, runCheck, runRender } from './core/pipeline.js';
export type { CheckOptions, CheckOutcome, ExitCodeValue, RenderRunOptions, RenderRunOutcome } from './core/pipeline.js';

export { scaffoldPlugin } from './scaffold/scaffolder.js';
export type { ScaffoldOptions, ScaffoldResult } from './scaffold/scaffolder.js';

export { mapWithConcurrency } from './utils/concurrency.js';
export { writeFileAtomic } from './utils/fs.js';
export { logger, LogLevel } from './utils/logger.js';

export * from './utils/errors.js';
