/**
 * modboot - module scaffold, checksum and packaging engine.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Registry
export * from './core/registry/index.js';

// Run context
export { createRunContext } from './core/context.js';
export type { RunContext, RunContextInit } from './core/context.js';

// Writing, templates and scaffolding
export * from './core/writer/index.js';
export * from './core/templates/index.js';
export * from './core/scaffold/index.js';

// Manifests and packaging
export * from './core/manifest/index.js';
export * from './core/packaging/index.js';

// Orchestration
export * from './core/bootstrap/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
