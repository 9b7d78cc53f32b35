/**
 * Manifest exports barrel file.
 */
export { generateManifest, formatManifest, parseManifest, writeManifest, relativeInside } from './generator.js';
export type { WriteManifestResult } from './generator.js';
export { verifyManifest } from './verifier.js';
export { MANIFEST_FILE_NAME } from './types.js';
export type { ManifestEntry, ManifestOptions, ManifestVerification } from './types.js';
