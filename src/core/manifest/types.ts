/**
 * Manifest type definitions.
 */

/** Conventional manifest file name, sha256sum-compatible. */
export const MANIFEST_FILE_NAME = 'SHASUMS256.txt';

export interface ManifestEntry {
  /** Path relative to the manifest root, forward slashes */
  relativePath: string;
  /** Lowercase hex SHA-256 of the full file content */
  digest: string;
  /** Size in bytes */
  size: number;
}

export interface ManifestOptions {
  /**
   * Relative paths to leave out. An entry ending in '/' leaves out a subtree.
   */
  exclude?: readonly string[];
}

export interface ManifestVerification {
  ok: boolean;
  /** Number of entries whose files were hashed */
  checked: number;
  /** Listed files whose digest differs */
  mismatched: string[];
  /** Listed files that no longer exist */
  missing: string[];
  /** Files on disk that the manifest does not list */
  unexpected: string[];
}
