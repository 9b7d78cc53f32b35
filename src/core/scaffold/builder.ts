/**
 * Scaffold builder: one module descriptor -> files on disk.
 *
 * Skeleton directories are created first; a failure there aborts the module.
 * Artifact writes are best-effort: a failed artifact is recorded and its
 * siblings are still written.
 */
import * as path from 'node:path';
import type { ModuleDescriptor } from '../registry/schema.js';
import { renderModule, serviceSourceDirFor, type ArtifactSpec } from '../templates/renderer.js';
import { ensureDirectory } from '../writer/atomic-writer.js';
import type { WriteOutcome } from '../writer/types.js';
import { pathExists } from '../../utils/file-system.js';
import type { RunContext } from '../context.js';
import { DEFAULT_EXTENSIONS } from './extensions.js';
import {
  SKELETON_DIRS,
  type ModuleBuildResult,
  type OutcomeCounts,
  type PlannedArtifact,
  type ScaffoldExtension,
} from './types.js';

/**
 * Resolve a forward-slash relative path under a root directory.
 */
export function resolveUnder(rootDir: string, relativePath: string): string {
  return path.join(rootDir, ...relativePath.split('/'));
}

export function summarizeOutcomes(outcomes: readonly WriteOutcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { written: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'written':
        counts.written++;
        break;
      case 'skipped-existing':
        counts.skipped++;
        break;
      case 'failed':
        counts.failed++;
        break;
    }
  }
  return counts;
}

export class ScaffoldBuilder {
  constructor(
    private readonly ctx: RunContext,
    private readonly extensions: readonly ScaffoldExtension[] = DEFAULT_EXTENSIONS
  ) {}

  moduleDir(module: ModuleDescriptor): string {
    return path.join(this.ctx.baseDir, module.name);
  }

  /**
   * Every artifact for a module: the fixed kinds, then matching extensions.
   */
  artifactsFor(module: ModuleDescriptor): ArtifactSpec[] {
    const artifacts = renderModule(module);
    for (const extension of this.extensions) {
      if (extension.moduleName === module.name) {
        artifacts.push(...extension.artifacts(module));
      }
    }
    return artifacts;
  }

  /**
   * Scaffold a module.
   *
   * @throws DirectoryCreateError when a skeleton directory cannot be created
   */
  async build(module: ModuleDescriptor): Promise<ModuleBuildResult> {
    const moduleDir = this.moduleDir(module);
    const log = this.ctx.log.child(module.name);

    log.info(`Scaffolding module: ${module.name} - ${module.description}`);
    for (const dir of [...SKELETON_DIRS, serviceSourceDirFor(module)]) {
      await ensureDirectory(resolveUnder(moduleDir, dir));
    }

    for (const extension of this.extensions) {
      if (extension.moduleName === module.name) {
        log.info(`Applying extension: ${extension.description}`);
      }
    }

    const outcomes: WriteOutcome[] = [];
    for (const artifact of this.artifactsFor(module)) {
      const outcome = await this.ctx.writer.write(resolveUnder(moduleDir, artifact.relativePath), artifact.content, {
        overwrite: this.ctx.overwrite,
        executable: artifact.executable,
      });
      outcomes.push(outcome);
    }

    const ok = outcomes.every((o) => o.kind !== 'failed');
    const counts = summarizeOutcomes(outcomes);
    log.info(`Scaffolded ${module.name}: ${counts.written} written, ${counts.skipped} skipped, ${counts.failed} failed`);

    return { module, moduleDir, outcomes, ok };
  }

  /**
   * Report what build() would do without writing anything.
   */
  async plan(module: ModuleDescriptor): Promise<PlannedArtifact[]> {
    const moduleDir = this.moduleDir(module);
    const planned: PlannedArtifact[] = [];
    for (const artifact of this.artifactsFor(module)) {
      const dest = resolveUnder(moduleDir, artifact.relativePath);
      const exists = await pathExists(dest);
      planned.push({
        kind: artifact.kind,
        path: dest,
        exists,
        willWrite: !exists || this.ctx.overwrite,
        executable: artifact.executable,
      });
    }
    return planned;
  }
}
