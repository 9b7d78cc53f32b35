/**
 * Scaffold type definitions.
 */
import type { ModuleDescriptor } from '../registry/schema.js';
import type { ArtifactSpec } from '../templates/renderer.js';
import type { WriteOutcome } from '../writer/types.js';

/** Skeleton directories every module gets, created before any file write. */
export const SKELETON_DIRS = [
  'bin',
  'etc',
  'lib',
  'docs',
  'tests',
  'ci',
  'packaging',
  'hooks',
  'docker',
  'k8s',
] as const;

/**
 * Contributes extra artifacts to one named module.
 */
export interface ScaffoldExtension {
  /** Module this extension applies to */
  moduleName: string;
  /** Shown in logs when the extension runs */
  description: string;
  artifacts(module: ModuleDescriptor): ArtifactSpec[];
}

/**
 * Result of scaffolding one module.
 */
export interface ModuleBuildResult {
  module: ModuleDescriptor;
  /** Absolute module directory */
  moduleDir: string;
  /** One outcome per artifact, in write order */
  outcomes: WriteOutcome[];
  /** True iff no outcome failed */
  ok: boolean;
}

/**
 * Dry-run view of one artifact.
 */
export interface PlannedArtifact {
  kind: string;
  /** Absolute destination */
  path: string;
  exists: boolean;
  /** Whether a real run would write (false when it would skip) */
  willWrite: boolean;
  executable: boolean;
}

export interface OutcomeCounts {
  written: number;
  skipped: number;
  failed: number;
}
