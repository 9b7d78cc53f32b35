/**
 * SHA-256 digests for manifest entries.
 */
import { createHash } from 'node:crypto';

/**
 * Full hex SHA-256 digest of the given bytes.
 */
export function sha256Hex(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Verify a stored digest against content.
 */
export function verifyDigest(content: string | Uint8Array, storedDigest: string): boolean {
  return sha256Hex(content) === storedDigest.toLowerCase();
}
