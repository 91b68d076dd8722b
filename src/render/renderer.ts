/**
 * Catalog renderer - produces the manifest and reference documents
 *
 * Every target is rendered fully in memory before anything is written.
 * A target that cannot be rendered is reported and skipped; the run only
 * fails outright when nothing could be rendered at all.
 */

import * as path from 'path';
import type { Catalog } from '../catalog/types.js';
import { error, type Diagnostic } from '../catalog/diagnostics.js';
import { buildContext, type MarketplaceInfo, type TemplateContext } from './context.js';
import { buildManifest, serializeManifest } from './manifest.js';
import { Template } from './template.js';
import { FileTemplateSource, type RenderTarget, type TemplateSource } from './targets.js';
import { CancelledError, RenderError, TemplateError, errorMessage } from '../utils/errors.js';
import { writeFileAtomic } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

export type RenderMode = 'write' | 'dry-run';

export interface RenderResult {
  target: RenderTarget;
  content: string;
  /** Absolute path the content belongs at */
  outputFile: string;
  /** Set in write mode only */
  bytesWritten?: number;
}

export interface RenderOptions {
  outputDir: string;
  templates?: TemplateSource;
  marketplace?: MarketplaceInfo;
  /** Stamp Markdown output with this time; omitted by default */
  generatedAt?: Date;
  signal?: AbortSignal;
}

export interface RenderOutcome {
  results: RenderResult[];
  diagnostics: Diagnostic[];
}

async function renderTarget(
  target: RenderTarget,
  catalog: Catalog,
  context: TemplateContext,
  templates: TemplateSource
): Promise<string | Diagnostic> {
  if (target.format === 'json') {
    return serializeManifest(buildManifest(catalog, context.marketplace));
  }

  const source = await templates.load(target.templateId);
  if (source === undefined) {
    return error('render.missing_template', `No template "${target.templateId}" for target "${target.name}"`, {
      componentPath: target.outputPath,
    });
  }

  try {
    return new Template(source, target.templateId).render(context);
  } catch (err) {
    if (err instanceof TemplateError) {
      return error('render.template_error', `Template "${target.templateId}": ${err.message}`, {
        componentPath: target.outputPath,
      });
    }
    throw err;
  }
}

export async function render(
  catalog: Catalog,
  targets: readonly RenderTarget[],
  mode: RenderMode,
  options: RenderOptions
): Promise<RenderOutcome> {
  if (targets.length === 0) {
    throw new RenderError('No render targets requested');
  }

  const templates = options.templates ?? new FileTemplateSource();
  const context = buildContext(catalog, {
    marketplace: options.marketplace,
    generatedAt: options.generatedAt,
  });
  const outputDir = path.resolve(options.outputDir);
  const results: RenderResult[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const target of targets) {
    if (options.signal?.aborted) {
      throw new CancelledError('Render cancelled');
    }

    const rendered = await renderTarget(target, catalog, context, templates);
    if (typeof rendered !== 'string') {
      diagnostics.push(rendered);
      continue;
    }

    const outputFile = path.join(outputDir, target.outputPath);

    if (mode === 'dry-run') {
      results.push({ target, content: rendered, outputFile });
      logger.debug(`Rendered ${target.name} (dry run)`);
      continue;
    }

    try {
      const bytesWritten = await writeFileAtomic(outputFile, rendered);
      results.push({ target, content: rendered, outputFile, bytesWritten });
      logger.debug(`Wrote ${outputFile} (${bytesWritten} bytes)`);
    } catch (err) {
      diagnostics.push(
        error('render.write_failed', `Cannot write ${outputFile}: ${errorMessage(err)}`, {
          componentPath: target.outputPath,
        })
      );
    }
  }

  if (results.length === 0) {
    throw new RenderError('No render target could be rendered', diagnostics);
  }

  return { results, diagnostics };
}
