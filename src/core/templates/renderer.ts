/**
 * Template renderer: (module, kind) -> ArtifactSpec.
 *
 * Pure and total over TemplateKind. Never touches the filesystem or the
 * environment, so identical registries always render identical bytes.
 */
import type { ModuleDescriptor } from '../registry/schema.js';
import * as bodies from './bodies.js';
import { JAVA_GROUP, type TemplateContext } from './bodies.js';

/** Fixed enumeration of per-module artifacts, in write order. */
export const TEMPLATE_KINDS = [
  'readme',
  'entrypoint',
  'default-config',
  'utils-lib',
  'metrics-lib',
  'dockerfile',
  'k8s-manifest',
  'ci-workflow',
  'test-stub',
  'packaging-script',
  'security-advisory',
  'implementation-notes',
  'service-pom',
  'service-stub',
] as const;

export type TemplateKind = (typeof TEMPLATE_KINDS)[number];

export interface ArtifactSpec {
  /** Template kind, or an extension-defined label */
  kind: string;
  /** Path relative to the module (or tree) root, forward slashes */
  relativePath: string;
  content: Buffer;
  executable: boolean;
}

interface KindLayout {
  path: (t: TemplateContext) => string;
  executable: boolean;
  body: (t: TemplateContext) => string;
}

const LAYOUT: Record<TemplateKind, KindLayout> = {
  readme: { path: () => 'README.md', executable: false, body: bodies.readme },
  entrypoint: { path: () => 'bin/entrypoint.sh', executable: true, body: bodies.entrypoint },
  'default-config': { path: () => 'etc/default.conf', executable: false, body: bodies.defaultConfig },
  'utils-lib': { path: () => 'lib/utils.sh', executable: false, body: bodies.utilsLib },
  'metrics-lib': { path: () => 'lib/metrics.sh', executable: true, body: bodies.metricsLib },
  dockerfile: { path: () => 'docker/Dockerfile', executable: false, body: bodies.dockerfile },
  'k8s-manifest': { path: () => 'k8s/deployment.yaml', executable: false, body: bodies.k8sManifest },
  'ci-workflow': { path: () => 'ci/ci.yml', executable: false, body: bodies.ciWorkflow },
  'test-stub': { path: () => 'tests/run_tests.sh', executable: true, body: bodies.testStub },
  'packaging-script': { path: () => 'packaging/make_package.sh', executable: true, body: bodies.packagingScript },
  'security-advisory': { path: () => 'docs/SECURITY_ADVISORY.md', executable: false, body: bodies.securityAdvisory },
  'implementation-notes': {
    path: () => 'docs/IMPLEMENTATION_NOTES.md',
    executable: false,
    body: bodies.implementationNotes,
  },
  'service-pom': { path: () => 'java/pom.xml', executable: false, body: bodies.servicePom },
  'service-stub': {
    path: (t) => `${serviceSourceDir(t)}/${t.className}Service.java`,
    executable: false,
    body: bodies.serviceStub,
  },
};

/**
 * Java package segment for a module name: alphanumerics only, never leading with a digit.
 */
export function toJavaSegment(name: string): string {
  const segment = name.replace(/[^a-z0-9]/g, '');
  return /^[0-9]/.test(segment) ? `_${segment}` : segment;
}

/**
 * PascalCase class prefix for a module name.
 */
export function toClassName(name: string): string {
  const pascal = name
    .split(/[^a-z0-9]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
  return /^[0-9]/.test(pascal) ? `M${pascal}` : pascal;
}

export function templateContext(module: ModuleDescriptor): TemplateContext {
  return {
    name: module.name,
    description: module.description,
    javaSegment: toJavaSegment(module.name),
    className: toClassName(module.name),
  };
}

function serviceSourceDir(t: TemplateContext): string {
  return `java/src/main/java/${JAVA_GROUP.replace(/\./g, '/')}/${t.javaSegment}`;
}

/**
 * Module-relative directory holding the embedded service sources.
 */
export function serviceSourceDirFor(module: ModuleDescriptor): string {
  return serviceSourceDir(templateContext(module));
}

export function renderArtifact(module: ModuleDescriptor, kind: TemplateKind): ArtifactSpec {
  const t = templateContext(module);
  const layout = LAYOUT[kind];
  return {
    kind,
    relativePath: layout.path(t),
    content: Buffer.from(layout.body(t), 'utf-8'),
    executable: layout.executable,
  };
}

/**
 * Render every kind for a module, in TEMPLATE_KINDS order.
 */
export function renderModule(module: ModuleDescriptor): ArtifactSpec[] {
  return TEMPLATE_KINDS.map((kind) => renderArtifact(module, kind));
}

/**
 * Artifacts written once at the root of the generated tree.
 */
export function renderTopLevel(modules: readonly ModuleDescriptor[]): ArtifactSpec[] {
  return [
    { kind: 'top-readme', relativePath: 'README.md', content: Buffer.from(bodies.topReadme(), 'utf-8'), executable: false },
    {
      kind: 'packaging-manifest',
      relativePath: 'PACKAGING_MANIFEST.txt',
      content: Buffer.from(bodies.packagingManifest(modules), 'utf-8'),
      executable: false,
    },
    {
      kind: 'run-all-tests',
      relativePath: 'run_all_tests.sh',
      content: Buffer.from(bodies.runAllTests(), 'utf-8'),
      executable: true,
    },
  ];
}
