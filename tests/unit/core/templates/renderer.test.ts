/**
 * Tests for the template renderer.
 */
import { describe, it, expect } from 'vitest';
import {
  TEMPLATE_KINDS,
  renderArtifact,
  renderModule,
  renderTopLevel,
  serviceSourceDirFor,
  toClassName,
  toJavaSegment,
} from '../../../../src/core/templates/renderer.js';
import { parseYaml } from '../../../../src/utils/yaml.js';

const SBOM = { name: 'sbom-gen', description: 'SBOM & Dependency Monitor' };

describe('renderModule', () => {
  it('should render one artifact per kind, in enumeration order', () => {
    expect(renderModule(SBOM).map((a) => a.kind)).toEqual([...TEMPLATE_KINDS]);
  });

  it('should lay artifacts out at fixed paths', () => {
    expect(renderModule(SBOM).map((a) => a.relativePath)).toEqual([
      'README.md',
      'bin/entrypoint.sh',
      'etc/default.conf',
      'lib/utils.sh',
      'lib/metrics.sh',
      'docker/Dockerfile',
      'k8s/deployment.yaml',
      'ci/ci.yml',
      'tests/run_tests.sh',
      'packaging/make_package.sh',
      'docs/SECURITY_ADVISORY.md',
      'docs/IMPLEMENTATION_NOTES.md',
      'java/pom.xml',
      'java/src/main/java/com/modboot/sbomgen/SbomGenService.java',
    ]);
  });

  it('should mark only scripts as executable', () => {
    const executable = renderModule(SBOM)
      .filter((a) => a.executable)
      .map((a) => a.kind);

    expect(executable).toEqual(['entrypoint', 'metrics-lib', 'test-stub', 'packaging-script']);
  });

  it('should render identical bytes for identical input', () => {
    const first = renderModule(SBOM);
    const second = renderModule({ ...SBOM });

    first.forEach((artifact, i) => {
      expect(artifact.content.equals(second[i].content)).toBe(true);
    });
  });
});

describe('renderArtifact', () => {
  it('should put name and description at the top of the README', () => {
    const readme = renderArtifact(SBOM, 'readme').content.toString('utf-8');

    expect(readme.startsWith('# sbom-gen\n\nSBOM & Dependency Monitor\n')).toBe(true);
  });

  it('should render a Deployment manifest named after the module', () => {
    const manifest = parseYaml(renderArtifact(SBOM, 'k8s-manifest').content.toString('utf-8'));

    expect(manifest).toMatchObject({
      kind: 'Deployment',
      metadata: { name: 'sbom-gen', labels: { app: 'sbom-gen' } },
    });
  });

  it('should declare the service class in the module package', () => {
    const stub = renderArtifact(SBOM, 'service-stub').content.toString('utf-8');

    expect(stub.split('\n')[0]).toBe('package com.modboot.sbomgen;');
    expect(stub).toContain('public class SbomGenService {');
  });
});

describe('name helpers', () => {
  it('should build Java package segments', () => {
    expect(toJavaSegment('secrets-lifecycle')).toBe('secretslifecycle');
    expect(toJavaSegment('3d-print')).toBe('_3dprint');
  });

  it('should build class names', () => {
    expect(toClassName('secrets-lifecycle')).toBe('SecretsLifecycle');
    expect(toClassName('sbom-gen_v2.1')).toBe('SbomGenV21');
    expect(toClassName('3d-print')).toBe('M3dPrint');
  });

  it('should place service sources under the Java group', () => {
    expect(serviceSourceDirFor(SBOM)).toBe('java/src/main/java/com/modboot/sbomgen');
  });
});

describe('renderTopLevel', () => {
  it('should list modules in the packaging manifest', () => {
    const artifacts = renderTopLevel([
      { name: 'alpha', description: 'First' },
      { name: 'beta', description: '' },
    ]);

    expect(artifacts.map((a) => [a.relativePath, a.executable])).toEqual([
      ['README.md', false],
      ['PACKAGING_MANIFEST.txt', false],
      ['run_all_tests.sh', true],
    ]);
    expect(artifacts[1].content.toString('utf-8')).toBe('Modules:\nalpha: First\nbeta: \n');
  });
});
