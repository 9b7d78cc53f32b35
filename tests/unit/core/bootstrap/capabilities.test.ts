/**
 * Tests for capability resolution.
 */
import { describe, it, expect } from 'vitest';
import { resolveCapabilities, type ToolLookup } from '../../../../src/core/bootstrap/capabilities.js';
import { TarArchiver } from '../../../../src/core/packaging/archiver.js';
import { GpgSigner } from '../../../../src/core/packaging/signer.js';
import { MavenServiceBuilder } from '../../../../src/core/packaging/service-builder.js';
import { MissingToolError } from '../../../../src/utils/errors.js';
import { memoryLogger } from '../../../helpers/fakes.js';

const BASE = { sign: false, buildServices: false, toolTimeoutMs: 1000 };

function lookupOf(available: string[]): ToolLookup {
  return (command) => (available.includes(command) ? `/usr/bin/${command}` : null);
}

describe('resolveCapabilities', () => {
  it('should require the archiver', () => {
    const { log } = memoryLogger();

    expect(() => resolveCapabilities(BASE, log, lookupOf([]))).toThrow(MissingToolError);
    expect(() => resolveCapabilities(BASE, log, lookupOf([]))).toThrow('Required command missing: tar');
  });

  it('should leave optional capabilities absent unless enabled', () => {
    const { log } = memoryLogger();

    const capabilities = resolveCapabilities(BASE, log, lookupOf(['tar', 'gpg', 'mvn']));

    expect(capabilities.archiver).toBeInstanceOf(TarArchiver);
    expect(capabilities.signer).toBeUndefined();
    expect(capabilities.serviceBuilder).toBeUndefined();
  });

  it('should enable signing and service builds when their tools exist', () => {
    const { log } = memoryLogger();

    const capabilities = resolveCapabilities(
      { ...BASE, sign: true, signKey: 'release@example.test', buildServices: true },
      log,
      lookupOf(['tar', 'gpg', 'mvn'])
    );

    expect(capabilities.signer).toBeInstanceOf(GpgSigner);
    expect(capabilities.serviceBuilder).toBeInstanceOf(MavenServiceBuilder);
  });

  it('should warn and continue unsigned when gpg is missing', () => {
    const { log, sink } = memoryLogger();

    const capabilities = resolveCapabilities({ ...BASE, sign: true }, log, lookupOf(['tar']));

    expect(capabilities.signer).toBeUndefined();
    expect(sink.messages('warn')).toEqual([
      'Signing requested but gpg was not found on PATH; archives will be unsigned',
    ]);
  });

  it('should warn when mvn is missing', () => {
    const { log, sink } = memoryLogger();

    resolveCapabilities({ ...BASE, buildServices: true }, log, lookupOf(['tar']));

    expect(sink.messages('warn')).toEqual([
      'Service builds requested but mvn was not found on PATH; skipping service builds',
    ]);
  });
});
