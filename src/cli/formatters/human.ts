/**
 * Human-readable terminal output.
 */
import * as path from 'node:path';
import chalk from 'chalk';
import type { BootstrapSummary } from '../../core/bootstrap/types.js';
import type { ManifestVerification } from '../../core/manifest/types.js';
import type { ModuleRegistry } from '../../core/registry/loader.js';
import type { ModulePlan } from './types.js';

export function formatPlan(baseDir: string, plans: readonly ModulePlan[]): string {
  const lines: string[] = [chalk.bold(`Dry run in ${baseDir}`)];
  let writes = 0;
  for (const plan of plans) {
    lines.push('', chalk.bold(plan.module));
    for (const artifact of plan.artifacts) {
      const rel = path.relative(baseDir, artifact.path);
      const mode = artifact.executable ? ' (exec)' : '';
      if (artifact.willWrite) {
        writes++;
        lines.push(`  ${chalk.green(artifact.exists ? 'overwrite' : 'create')} ${rel}${mode}`);
      } else {
        lines.push(`  ${chalk.dim('skip')}      ${rel}`);
      }
    }
  }
  lines.push('', chalk.dim(`${writes} file(s) would be written. Run without --dry-run to apply.`));
  return lines.join('\n');
}

export function formatSummary(summary: BootstrapSummary): string {
  const lines: string[] = ['', chalk.bold('Bootstrap Summary:')];
  for (const module of summary.modules) {
    const state =
      module.state === 'failed'
        ? chalk.red('failed')
        : `${chalk.green('done')} ${chalk.dim(module.signed ? 'signed' : 'unsigned')}`;
    const counts = chalk.dim(`${module.counts.written} written, ${module.counts.skipped} skipped`);
    lines.push(`  ${module.name.padEnd(28)} ${state}  ${counts}`);
    if (module.error) {
      lines.push(`    ${chalk.red(`[${module.error.code}] ${module.error.message}`)}`);
    }
    for (const warning of module.warnings) {
      lines.push(`    ${chalk.yellow(`⚠ ${warning}`)}`);
    }
  }

  const { tree } = summary;
  if (tree.archive) {
    lines.push('', `  Bundle:   ${tree.archive.archivePath} (${tree.archive.fileCount} files)`);
  }
  if (tree.manifestPath) {
    lines.push(`  Manifest: ${tree.manifestPath}`);
  }
  if (tree.error) {
    lines.push('', `  ${chalk.red(`[${tree.error.code}] ${tree.error.message}`)}`);
  }
  for (const warning of tree.warnings) {
    lines.push(`  ${chalk.yellow(`⚠ ${warning}`)}`);
  }

  const status = summary.exitCode === 0 ? chalk.green('0') : chalk.red(String(summary.exitCode));
  lines.push('', `Exit status: ${status}`);
  return lines.join('\n');
}

export function formatVerification(manifestPath: string, result: ManifestVerification): string {
  const lines: string[] = [];
  for (const file of result.mismatched) lines.push(`${chalk.red('MISMATCH')}   ${file}`);
  for (const file of result.missing) lines.push(`${chalk.red('MISSING')}    ${file}`);
  for (const file of result.unexpected) lines.push(`${chalk.yellow('UNEXPECTED')} ${file}`);
  lines.push(
    result.ok
      ? chalk.green(`✓ ${manifestPath}: ${result.checked} file(s) OK`)
      : chalk.red(`✗ ${manifestPath}: ${result.mismatched.length + result.missing.length + result.unexpected.length} problem(s)`)
  );
  return lines.join('\n');
}

export function formatRegistry(registry: ModuleRegistry): string {
  const width = Math.max(0, ...registry.map((m) => m.name.length));
  return registry.map((m) => `${chalk.cyan(m.name.padEnd(width))}  ${m.description}`).join('\n');
}
