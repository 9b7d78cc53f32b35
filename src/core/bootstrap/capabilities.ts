/**
 * External tool capabilities, resolved once before any write.
 *
 * The archiver is required; signing and the service build are optional and
 * are simply absent when not configured or when their tool is missing.
 */
import { MissingToolError, ErrorCodes } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { findExecutable } from '../../utils/tools.js';
import type { RunConfig } from '../config/schema.js';
import { TarArchiver } from '../packaging/archiver.js';
import { GpgSigner } from '../packaging/signer.js';
import { MavenServiceBuilder } from '../packaging/service-builder.js';
import type { Archiver, ServiceBuilder, Signer } from '../packaging/types.js';

export interface Capabilities {
  archiver: Archiver;
  signer?: Signer;
  serviceBuilder?: ServiceBuilder;
}

/** Resolves a bare command name to an executable path, or null. */
export type ToolLookup = (command: string) => string | null;

export function resolveCapabilities(
  config: Pick<RunConfig, 'sign' | 'signKey' | 'buildServices' | 'toolTimeoutMs'>,
  log: Logger,
  lookup: ToolLookup = (command) => findExecutable(command)
): Capabilities {
  const tarPath = lookup('tar');
  if (tarPath === null) {
    throw new MissingToolError(ErrorCodes.MISSING_TOOL, 'Required command missing: tar', { missing: ['tar'] });
  }
  const capabilities: Capabilities = { archiver: new TarArchiver(tarPath, config.toolTimeoutMs) };

  if (config.sign) {
    const gpgPath = lookup('gpg');
    if (gpgPath) {
      capabilities.signer = new GpgSigner(gpgPath, config.signKey, config.toolTimeoutMs);
      log.info(`Signing enabled (${gpgPath}${config.signKey ? `, key ${config.signKey}` : ''})`);
    } else {
      log.warn('Signing requested but gpg was not found on PATH; archives will be unsigned');
    }
  }

  if (config.buildServices) {
    const mvnPath = lookup('mvn');
    if (mvnPath) {
      capabilities.serviceBuilder = new MavenServiceBuilder(mvnPath, config.toolTimeoutMs);
      log.info(`Service builds enabled (${mvnPath})`);
    } else {
      log.warn('Service builds requested but mvn was not found on PATH; skipping service builds');
    }
  }

  return capabilities;
}
