/**
 * Formatter input types.
 */
import type { PlannedArtifact } from '../../core/scaffold/types.js';

/** Dry-run plan for one module. */
export interface ModulePlan {
  module: string;
  artifacts: PlannedArtifact[];
}
