/**
 * Plugin catalog: scanning, diagnostics and validation
 *
 * @module catalog
 */

export * from './types.js';
export * from './diagnostics.js';
export * from './frontmatter.js';
export * from './validator.js';
export * from './scanner.js';
