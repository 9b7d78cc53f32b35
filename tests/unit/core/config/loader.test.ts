/**
 * Tests for run configuration resolution.
 */
import { describe, it, expect } from 'vitest';
import { compactTimestamp, defaultLogFile, resolveRunConfig } from '../../../../src/core/config/loader.js';
import { ConfigError } from '../../../../src/utils/errors.js';

const NOW = new Date('2026-10-18T09:30:00.123Z');

describe('compactTimestamp', () => {
  it('should drop separators and milliseconds', () => {
    expect(compactTimestamp(NOW)).toBe('20261018T093000Z');
  });
});

describe('defaultLogFile', () => {
  it('should place the log under <base>/logs', () => {
    expect(defaultLogFile('/out', NOW)).toBe('/out/logs/bootstrap-20261018T093000Z.log');
  });
});

describe('resolveRunConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = resolveRunConfig({ env: {}, cwd: '/work', now: NOW });

    expect(config).toEqual({
      baseDir: '/work/bootstrapped-modules',
      force: false,
      sign: false,
      buildServices: false,
      logFile: '/work/bootstrapped-modules/logs/bootstrap-20261018T093000Z.log',
      logLevel: 'info',
      toolTimeoutMs: 120000,
    });
  });

  it('should read flags and values from the environment', () => {
    const config = resolveRunConfig({
      env: {
        BASE_DIR: 'out',
        FORCE: '1',
        GPG_SIGN: '1',
        GPG_KEY: 'release@example.test',
        BUILD_SERVICES: '1',
        MODULES_FILE: 'modules.yaml',
        LOG_LEVEL: 'debug',
        TOOL_TIMEOUT_MS: '5000',
      },
      cwd: '/work',
      now: NOW,
    });

    expect(config.baseDir).toBe('/work/out');
    expect(config.force).toBe(true);
    expect(config.sign).toBe(true);
    expect(config.signKey).toBe('release@example.test');
    expect(config.buildServices).toBe(true);
    expect(config.modulesFile).toBe('modules.yaml');
    expect(config.logLevel).toBe('debug');
    expect(config.toolTimeoutMs).toBe(5000);
  });

  it('should only treat "1" as enabled', () => {
    const config = resolveRunConfig({ env: { FORCE: 'yes', GPG_SIGN: 'true' }, cwd: '/work', now: NOW });

    expect(config.force).toBe(false);
    expect(config.sign).toBe(false);
  });

  it('should treat empty strings as unset', () => {
    const config = resolveRunConfig({ env: { BASE_DIR: '', GPG_KEY: '' }, cwd: '/work', now: NOW });

    expect(config.baseDir).toBe('/work/bootstrapped-modules');
    expect(config.signKey).toBeUndefined();
  });

  it('should disable the log file for an empty LOG_FILE', () => {
    expect(resolveRunConfig({ env: { LOG_FILE: '' }, cwd: '/work', now: NOW }).logFile).toBeNull();
  });

  it('should resolve LOG_FILE against cwd', () => {
    expect(resolveRunConfig({ env: { LOG_FILE: 'run.log' }, cwd: '/work', now: NOW }).logFile).toBe('/work/run.log');
  });

  it('should let overrides win over the environment', () => {
    const config = resolveRunConfig({
      env: { BASE_DIR: 'from-env', LOG_FILE: 'env.log' },
      cwd: '/work',
      now: NOW,
      overrides: { baseDir: '/abs/out', force: true, logFile: false, only: ['alpha'] },
    });

    expect(config.baseDir).toBe('/abs/out');
    expect(config.force).toBe(true);
    expect(config.logFile).toBeNull();
    expect(config.only).toEqual(['alpha']);
  });

  it('should reject an unknown log level', () => {
    expect(() => resolveRunConfig({ env: { LOG_LEVEL: 'loud' }, cwd: '/work', now: NOW })).toThrow(ConfigError);
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => resolveRunConfig({ env: { TOOL_TIMEOUT_MS: 'soon' }, cwd: '/work', now: NOW })).toThrow(
      /Invalid environment: TOOL_TIMEOUT_MS/
    );
  });
});
