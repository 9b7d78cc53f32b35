/**
 * Template renderer exports barrel file.
 */
export {
  TEMPLATE_KINDS,
  renderArtifact,
  renderModule,
  renderTopLevel,
  templateContext,
  toJavaSegment,
  toClassName,
  serviceSourceDirFor,
} from './renderer.js';
export type { TemplateKind, ArtifactSpec } from './renderer.js';
export type { TemplateContext } from './bodies.js';
export { JAVA_GROUP } from './bodies.js';
