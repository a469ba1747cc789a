/**
 * Input asset checks: fail before any output is written
 */

import { readFile, stat } from 'fs/promises';
import { MissingAssetError, isMissingFileError } from './errors.js';

/**
 * Read a binary asset into memory. Throws MissingAssetError unless path is
 * an existing regular file.
 */
export async function readBinaryAsset(kind: string, path: string): Promise<Buffer> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw MissingAssetError.fromPath(kind, path);
    }
    return await readFile(path);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw MissingAssetError.fromPath(kind, path);
    }
    throw error;
  }
}

export async function readTextAsset(kind: string, path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw MissingAssetError.fromPath(kind, path);
    }
    throw error;
  }
}
