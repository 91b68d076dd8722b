import type { Diagnostic } from '../catalog/diagnostics.js';

export class CatalogError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

export class ConfigurationError extends CatalogError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ScanError extends CatalogError {
  constructor(message: string, public rootPath?: string) {
    super(message, 'SCAN_ERROR');
    this.name = 'ScanError';
  }
}

export class RenderError extends CatalogError {
  /** Per-target problems gathered before the render gave up */
  public diagnostics: readonly Diagnostic[];

  constructor(message: string, diagnostics: readonly Diagnostic[] = []) {
    super(message, 'RENDER_ERROR');
    this.diagnostics = diagnostics;
    this.name = 'RenderError';
  }
}

export class TemplateError extends CatalogError {
  constructor(message: string, public templateId?: string) {
    super(message, 'TEMPLATE_ERROR');
    this.name = 'TemplateError';
  }
}

export class ScaffoldError extends CatalogError {
  constructor(message: string) {
    super(message, 'SCAFFOLD_ERROR');
    this.name = 'ScaffoldError';
  }
}

export class CancelledError extends CatalogError {
  constructor(message = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class FrontmatterError extends CatalogError {
  constructor(message: string, public filePath?: string) {
    super(message, 'FRONTMATTER_ERROR');
    this.name = 'FrontmatterError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
