/**
 * Bootstrap exports barrel file.
 */
export { BootstrapOrchestrator, runBootstrap, computeExitCode, PACKAGING_DIR_NAME } from './orchestrator.js';
export type { BootstrapOptions } from './orchestrator.js';
export { resolveCapabilities } from './capabilities.js';
export type { Capabilities, ToolLookup } from './capabilities.js';
export { ModuleLifecycle, MODULE_STATES, canTransition, isTerminal } from './state-machine.js';
export type { ModuleState } from './state-machine.js';
export type { BootstrapSummary, ModuleReport, TreeReport, ErrorSummary } from './types.js';
