/**
 * Embedded service build step (best effort).
 */
import * as path from 'node:path';
import { runTool } from '../../utils/tools.js';
import { BootstrapError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { pathExists } from '../../utils/file-system.js';
import type { ServiceBuilder } from './types.js';

/** Module-relative directory of the embedded service project. */
export const SERVICE_PROJECT_DIR = 'java';

export class MavenServiceBuilder implements ServiceBuilder {
  readonly name = 'mvn';

  constructor(
    private readonly mvnPath: string,
    private readonly timeoutMs?: number
  ) {}

  async build(projectDir: string): Promise<void> {
    runTool(this.mvnPath, ['-q', '-DskipTests', 'package'], { cwd: projectDir, timeoutMs: this.timeoutMs });
  }
}

export type ServiceBuildResult = 'built' | 'no-project';

/**
 * Build a module's embedded service if it has one.
 *
 * @throws BootstrapError (SERVICE_BUILD_FAILED) when the build tool fails
 */
export async function buildEmbeddedService(moduleDir: string, builder: ServiceBuilder): Promise<ServiceBuildResult> {
  const projectDir = path.join(moduleDir, SERVICE_PROJECT_DIR);
  if (!(await pathExists(path.join(projectDir, 'pom.xml')))) {
    return 'no-project';
  }
  try {
    await builder.build(projectDir);
  } catch (error) {
    throw new BootstrapError(ErrorCodes.SERVICE_BUILD_FAILED, `${builder.name} build failed in ${projectDir}: ${errorMessage(error)}`, {
      projectDir,
    });
  }
  return 'built';
}
