/**
 * Packaging capability interfaces.
 *
 * Each external collaborator (archive tool, signing tool, service build tool)
 * sits behind one of these so callers branch on presence, and tests can pass
 * in-process fakes.
 */

export interface Archiver {
  readonly name: string;
  /**
   * Write a gzip-compressed archive of `files` (relative to sourceDir) to destPath.
   */
  create(sourceDir: string, files: readonly string[], destPath: string): Promise<void>;
}

export interface SignOptions {
  /** ASCII-armored output instead of binary */
  armor: boolean;
}

export interface Signer {
  readonly name: string;
  /**
   * Write a detached signature of filePath to signaturePath.
   */
  sign(filePath: string, signaturePath: string, options: SignOptions): Promise<void>;
}

export interface ServiceBuilder {
  readonly name: string;
  /**
   * Build the embedded service project rooted at projectDir.
   */
  build(projectDir: string): Promise<void>;
}

export interface PackageArtifact {
  sourceDir: string;
  archivePath: string;
  /** Number of regular files archived */
  fileCount: number;
  /** Present only when a detached signature was produced */
  signaturePath?: string;
}

/** Name of the whole-tree archive under <BASE_DIR>/packaging/. */
export const BUNDLE_ARCHIVE_NAME = 'bundle.tar.gz';

export function moduleArchiveName(moduleName: string): string {
  return `${moduleName}.tar.gz`;
}
