/**
 * Packaging exports barrel file.
 */
export { packageDirectory } from './packager.js';
export type { PackageOptions } from './packager.js';
export { TarArchiver, listTarball } from './archiver.js';
export { GpgSigner, signFile, signaturePathFor } from './signer.js';
export { MavenServiceBuilder, buildEmbeddedService, SERVICE_PROJECT_DIR } from './service-builder.js';
export type { ServiceBuildResult } from './service-builder.js';
export { BUNDLE_ARCHIVE_NAME, moduleArchiveName } from './types.js';
export type { Archiver, Signer, ServiceBuilder, SignOptions, PackageArtifact } from './types.js';
