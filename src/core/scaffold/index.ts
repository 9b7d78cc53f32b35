/**
 * Scaffold builder exports barrel file.
 */
export { ScaffoldBuilder, summarizeOutcomes, resolveUnder } from './builder.js';
export { secretStoreExtension, DEFAULT_EXTENSIONS } from './extensions.js';
export { SKELETON_DIRS } from './types.js';
export type {
  ScaffoldExtension,
  ModuleBuildResult,
  PlannedArtifact,
  OutcomeCounts,
} from './types.js';
