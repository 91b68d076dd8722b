export * from './template.js';
export * from './context.js';
export * from './manifest.js';
export * from './targets.js';
export * from './renderer.js';
