/**
 * Bootstrap orchestrator.
 *
 * Runs every module through scaffolding, manifesting, packaging and optional
 * signing, sequentially and in registry order. A module failure is recorded
 * and the next module proceeds. Once every module is terminal, the whole
 * tree (minus failed modules) is manifested and archived.
 */
import * as path from 'node:path';
import { toPosix } from '../../utils/file-system.js';
import { BootstrapError, ExitCodes, SigningError, errorMessage, type ExitCode } from '../../utils/errors.js';
import { LOG_DIR_NAME } from '../config/loader.js';
import type { RunContext } from '../context.js';
import { MANIFEST_FILE_NAME } from '../manifest/types.js';
import { writeManifest } from '../manifest/generator.js';
import { packageDirectory } from '../packaging/packager.js';
import { signFile } from '../packaging/signer.js';
import { buildEmbeddedService } from '../packaging/service-builder.js';
import { BUNDLE_ARCHIVE_NAME, moduleArchiveName } from '../packaging/types.js';
import type { ModuleRegistry } from '../registry/loader.js';
import type { ModuleDescriptor } from '../registry/schema.js';
import { ScaffoldBuilder, resolveUnder, summarizeOutcomes } from '../scaffold/builder.js';
import { DEFAULT_EXTENSIONS } from '../scaffold/extensions.js';
import type { ScaffoldExtension } from '../scaffold/types.js';
import { renderTopLevel } from '../templates/renderer.js';
import { ensureDirectory } from '../writer/atomic-writer.js';
import type { WriteOutcome } from '../writer/types.js';
import type { Capabilities } from './capabilities.js';
import { ModuleLifecycle } from './state-machine.js';
import type { BootstrapSummary, ErrorSummary, ModuleReport, TreeReport } from './types.js';

/** Top-level output directory for manifests and archives. */
export const PACKAGING_DIR_NAME = 'packaging';

export interface BootstrapOptions {
  registry: ModuleRegistry;
  capabilities: Capabilities;
  extensions?: readonly ScaffoldExtension[];
  /** Additional relative paths to keep out of the whole-tree manifest and archive */
  treeExclude?: readonly string[];
}

function summarizeError(error: unknown): ErrorSummary {
  if (error instanceof BootstrapError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'UNEXPECTED', message: errorMessage(error) };
}

function firstFailure(outcomes: readonly WriteOutcome[]): BootstrapError | undefined {
  for (const outcome of outcomes) {
    if (outcome.kind === 'failed') return outcome.error;
  }
  return undefined;
}

export class BootstrapOrchestrator {
  private readonly builder: ScaffoldBuilder;

  constructor(
    private readonly ctx: RunContext,
    private readonly capabilities: Capabilities,
    extensions: readonly ScaffoldExtension[] = DEFAULT_EXTENSIONS
  ) {
    this.builder = new ScaffoldBuilder(ctx, extensions);
  }

  get packagingDir(): string {
    return path.join(this.ctx.baseDir, PACKAGING_DIR_NAME);
  }

  /**
   * Drive one module to a terminal state. Never throws for module-level failures.
   */
  async runModule(module: ModuleDescriptor): Promise<ModuleReport> {
    const log = this.ctx.log.child(module.name);
    const lifecycle = new ModuleLifecycle(module.name, log);
    const report: ModuleReport = {
      name: module.name,
      state: lifecycle.state,
      history: lifecycle.history,
      counts: { written: 0, skipped: 0, failed: 0 },
      signed: false,
      warnings: [],
    };

    try {
      lifecycle.transition('scaffolding');
      const build = await this.builder.build(module);
      report.counts = summarizeOutcomes(build.outcomes);
      const failure = firstFailure(build.outcomes);
      if (failure) {
        throw failure;
      }

      // Build output lands in the module tree, so it must exist before the
      // module is checksummed.
      const { serviceBuilder } = this.capabilities;
      if (serviceBuilder) {
        try {
          const result = await buildEmbeddedService(build.moduleDir, serviceBuilder);
          log.info(`Service build: ${result}`);
        } catch (error) {
          const message = errorMessage(error);
          report.warnings.push(message);
          log.warn(message);
        }
      }

      lifecycle.transition('manifesting');
      const manifest = await writeManifest(
        build.moduleDir,
        resolveUnder(build.moduleDir, `packaging/${MANIFEST_FILE_NAME}`),
        this.ctx.writer
      );
      report.manifestPath = manifest.manifestPath;
      log.info(`Generated checksums for ${module.name} (${manifest.entries.length} files)`);

      lifecycle.transition('packaging');
      const { archiver, signer } = this.capabilities;
      const artifact = await packageDirectory(
        build.moduleDir,
        path.join(this.packagingDir, moduleArchiveName(module.name)),
        archiver
      );
      report.package = artifact;
      log.info(`Created archive: ${artifact.archivePath} (${artifact.fileCount} files)`);

      if (signer) {
        try {
          artifact.signaturePath = await signFile(artifact.archivePath, signer);
          report.signed = true;
          lifecycle.transition('signed', artifact.signaturePath);
        } catch (error) {
          if (!(error instanceof SigningError)) throw error;
          report.warnings.push(error.message);
          log.warn(error.message);
          lifecycle.transition('unsigned', 'signing failed');
        }
      } else {
        lifecycle.transition('unsigned');
      }

      lifecycle.transition('done');
    } catch (error) {
      report.error = summarizeError(error);
      lifecycle.transition('failed', report.error.message);
    }

    report.state = lifecycle.state;
    return report;
  }

  /**
   * Top-level artifacts, whole-tree manifest and whole-tree archive.
   */
  async packageTree(
    registry: ModuleRegistry,
    modules: readonly ModuleReport[],
    extraExclude: readonly string[] = []
  ): Promise<TreeReport> {
    const log = this.ctx.log;
    const excluded = [
      `${PACKAGING_DIR_NAME}/`,
      `${LOG_DIR_NAME}/`,
      ...extraExclude,
      ...modules.filter((m) => m.state === 'failed').map((m) => `${m.name}/`),
    ];
    const report: TreeReport = {
      topLevel: { written: 0, skipped: 0, failed: 0 },
      excluded,
      warnings: [],
    };

    const outcomes: WriteOutcome[] = [];
    for (const artifact of renderTopLevel(registry)) {
      outcomes.push(
        await this.ctx.writer.write(resolveUnder(this.ctx.baseDir, artifact.relativePath), artifact.content, {
          overwrite: this.ctx.overwrite,
          executable: artifact.executable,
        })
      );
    }
    report.topLevel = summarizeOutcomes(outcomes);
    for (const outcome of outcomes) {
      if (outcome.kind === 'failed') {
        // Never list a file whose write failed
        excluded.push(toPosix(path.relative(this.ctx.baseDir, outcome.path)));
      }
    }

    for (const name of modules.filter((m) => m.state === 'failed').map((m) => m.name)) {
      log.warn(`Excluding failed module from tree manifest and archive: ${name}`);
    }

    const { archiver, signer } = this.capabilities;

    try {
      const manifest = await writeManifest(
        this.ctx.baseDir,
        path.join(this.packagingDir, MANIFEST_FILE_NAME),
        this.ctx.writer,
        { exclude: excluded }
      );
      report.manifestPath = manifest.manifestPath;
      log.info(`Top-level SHASUMS generated (${manifest.entries.length} files)`);
    } catch (error) {
      report.error = summarizeError(error);
      log.error(`Tree manifest failed: ${report.error.message}`);
      return report;
    }

    if (signer) {
      try {
        report.manifestSignaturePath = await signFile(report.manifestPath, signer, { armor: true });
      } catch (error) {
        if (!(error instanceof SigningError)) throw error;
        report.warnings.push(error.message);
        log.warn(error.message);
      }
    }

    try {
      report.archive = await packageDirectory(
        this.ctx.baseDir,
        path.join(this.packagingDir, BUNDLE_ARCHIVE_NAME),
        archiver,
        { exclude: excluded }
      );
      log.info(`Created archive: ${report.archive.archivePath} (${report.archive.fileCount} files)`);
    } catch (error) {
      report.error = summarizeError(error);
      log.error(`Tree archive failed: ${report.error.message}`);
      return report;
    }

    if (signer) {
      try {
        report.archive.signaturePath = await signFile(report.archive.archivePath, signer);
      } catch (error) {
        if (!(error instanceof SigningError)) throw error;
        report.warnings.push(error.message);
        log.warn(error.message);
      }
    }

    return report;
  }

  /**
   * Run the whole bootstrap.
   *
   * @throws DirectoryCreateError when the base or packaging directory cannot be created
   */
  async run(registry: ModuleRegistry, treeExclude: readonly string[] = []): Promise<BootstrapSummary> {
    this.ctx.log.info(`Base directory: ${this.ctx.baseDir}`);
    await ensureDirectory(this.ctx.baseDir);
    await ensureDirectory(this.packagingDir);

    const modules: ModuleReport[] = [];
    for (const module of registry) {
      modules.push(await this.runModule(module));
    }

    const tree = await this.packageTree(registry, modules, treeExclude);
    const summary: BootstrapSummary = {
      baseDir: this.ctx.baseDir,
      modules,
      tree,
      exitCode: computeExitCode(modules, tree),
    };
    logSummary(this.ctx, summary);
    return summary;
  }
}

export function computeExitCode(modules: readonly ModuleReport[], tree: TreeReport): ExitCode {
  if (tree.error) {
    return tree.manifestPath === undefined ? ExitCodes.MANIFEST : ExitCodes.ARCHIVE;
  }
  if (modules.some((m) => m.state === 'failed') || tree.topLevel.failed > 0) {
    return ExitCodes.MODULE_FAILED;
  }
  return ExitCodes.SUCCESS;
}

function logSummary(ctx: RunContext, summary: BootstrapSummary): void {
  const { log } = ctx;
  log.info('Bootstrap summary:');
  for (const module of summary.modules) {
    const counts = `${module.counts.written} written, ${module.counts.skipped} skipped, ${module.counts.failed} failed`;
    if (module.state === 'failed') {
      log.fail(`${module.name}: failed (${counts}) - ${module.error?.message ?? 'unknown error'}`);
    } else {
      const warnings = module.warnings.length > 0 ? `, ${module.warnings.length} warning(s)` : '';
      log.success(`${module.name}: done, ${module.signed ? 'signed' : 'unsigned'} (${counts}${warnings})`);
    }
  }
  if (summary.tree.archive) {
    log.info(`Tree archive: ${summary.tree.archive.archivePath}`);
  }
  log.info(`Exit status: ${summary.exitCode}`);
}

/**
 * Convenience entry point: build an orchestrator and run it.
 */
export async function runBootstrap(ctx: RunContext, options: BootstrapOptions): Promise<BootstrapSummary> {
  const orchestrator = new BootstrapOrchestrator(ctx, options.capabilities, options.extensions);
  return orchestrator.run(options.registry, options.treeExclude);
}
