/**
 * Bootstrap run reporting types.
 */
import type { ExitCode } from '../../utils/errors.js';
import type { PackageArtifact } from '../packaging/types.js';
import type { OutcomeCounts } from '../scaffold/types.js';
import type { ModuleState } from './state-machine.js';

export interface ErrorSummary {
  code: string;
  message: string;
}

export interface ModuleReport {
  name: string;
  /** Terminal state: done or failed */
  state: ModuleState;
  history: readonly ModuleState[];
  counts: OutcomeCounts;
  signed: boolean;
  manifestPath?: string;
  package?: PackageArtifact;
  /** Non-fatal problems (signing, service build) */
  warnings: string[];
  error?: ErrorSummary;
}

export interface TreeReport {
  /** Top-level README/manifest/test-runner outcomes */
  topLevel: OutcomeCounts;
  manifestPath?: string;
  manifestSignaturePath?: string;
  archive?: PackageArtifact;
  /** Relative paths left out of the whole-tree manifest and archive */
  excluded: string[];
  warnings: string[];
  error?: ErrorSummary;
}

export interface BootstrapSummary {
  baseDir: string;
  modules: ModuleReport[];
  tree: TreeReport;
  exitCode: ExitCode;
}
