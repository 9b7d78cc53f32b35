/**
 * Detached signatures.
 */
import * as fs from 'node:fs';
import { runTool } from '../../utils/tools.js';
import { ErrorCodes, SigningError, errorMessage } from '../../utils/errors.js';
import { removeTempFile, tempPathFor } from '../writer/atomic-writer.js';
import type { SignOptions, Signer } from './types.js';

export class GpgSigner implements Signer {
  readonly name = 'gpg';

  constructor(
    private readonly gpgPath: string,
    private readonly keyRef?: string,
    private readonly timeoutMs?: number
  ) {}

  async sign(filePath: string, signaturePath: string, options: SignOptions): Promise<void> {
    const args = [
      '--batch',
      '--yes',
      ...(this.keyRef ? ['--local-user', this.keyRef] : []),
      ...(options.armor ? ['--armor'] : []),
      '--output',
      signaturePath,
      '--detach-sign',
      filePath,
    ];
    runTool(this.gpgPath, args, { timeoutMs: this.timeoutMs });
  }
}

/**
 * Signature path convention: ".asc" for armored, ".sig" for binary.
 */
export function signaturePathFor(filePath: string, armor: boolean): string {
  return `${filePath}${armor ? '.asc' : '.sig'}`;
}

/**
 * Sign a file, placing the signature beside it atomically.
 *
 * @returns The signature path
 * @throws SigningError when the signer fails; the signed file is left untouched
 */
export async function signFile(filePath: string, signer: Signer, options: SignOptions = { armor: false }): Promise<string> {
  const signaturePath = signaturePathFor(filePath, options.armor);
  const tmpPath = tempPathFor(signaturePath);
  try {
    await signer.sign(filePath, tmpPath, options);
    await fs.promises.rename(tmpPath, signaturePath);
  } catch (error) {
    const cleanupError = await removeTempFile(tmpPath);
    throw new SigningError(ErrorCodes.SIGNING_FAILED, `${signer.name} signing failed for ${filePath}: ${errorMessage(error)}`, {
      filePath,
      signer: signer.name,
      ...(cleanupError ? { cleanupError } : {}),
    });
  }
  return signaturePath;
}
