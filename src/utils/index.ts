/**
 * Utility functions for paths, logging, errors and input assets
 */

export { getLogger, resetLogger, Logger } from './logger.js';
export type { LoggerConfig, ProgressStats, SummaryStats } from './logger.js';

export {
  OUTPUT_LAYOUT,
  slugify,
  cityStateSlug,
  cityCanonicalPath,
  getPageFilePath,
  getRobotsPath,
  getSitemapPath,
  isValidSlug,
  isWithinDir,
  MAX_SLUG_LENGTH,
} from './paths.js';

export {
  SiteBuildError,
  InvalidInputError,
  MissingAssetError,
  getExitCode,
  reportError,
  handleError,
  isMissingFileError,
} from './errors.js';

export { readBinaryAsset, readTextAsset } from './assets.js';
