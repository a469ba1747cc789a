/**
 * Site content loading
 */

import { readFile } from 'fs/promises';
import { InvalidInputError, MissingAssetError, isMissingFileError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { SiteContent } from './types.js';
import { validateSiteContent } from './validate.js';

/**
 * Parse site content from JSON text
 */
export function parseSiteContent(json: string): SiteContent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw InvalidInputError.fromInvalidContent('document', `is not valid JSON (${reason})`);
  }
  return validateSiteContent(parsed);
}

/**
 * Read and validate a site content file
 */
export async function loadSiteContent(path: string): Promise<SiteContent> {
  let json: string;
  try {
    json = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw MissingAssetError.fromPath('content file', path);
    }
    throw error;
  }

  const content = parseSiteContent(json);
  getLogger().debug(`Loaded site content for "${content.brandName}" from ${path}`);
  return content;
}
