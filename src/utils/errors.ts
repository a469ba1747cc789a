/**
 * Error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code
 * - message: user-facing message naming the offending input
 * - details: optional verbose details
 */

import { getLogger } from './logger.js';

/**
 * Base error class with exit code
 */
export abstract class SiteBuildError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: malformed city rows, invalid content configuration,
 * duplicate pages, invalid CLI values
 */
export class InvalidInputError extends SiteBuildError {
  readonly code = 1;

  static fromMissingHeaders(missing: string[], found: string[]): InvalidInputError {
    return new InvalidInputError(
      `City CSV is missing required column(s): ${missing.join(', ')}`,
      `Header must contain city,state,col (found: ${found.length > 0 ? found.join(',') : 'nothing'})`
    );
  }

  static fromEmptyField(line: number, column: string, rawLine: string): InvalidInputError {
    return new InvalidInputError(
      `Missing value for "${column}" at CSV line ${line}`,
      `Row: ${rawLine}`
    );
  }

  static fromInvalidNumber(line: number, column: string, raw: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid ${column} value at CSV line ${line}: "${raw}"`,
      `"${column}" must be a finite number such as 1.0 or 1.25`
    );
  }

  static fromInvalidContent(field: string, reason: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid site content: ${field} ${reason}`,
      'See content/site.json for the expected shape'
    );
  }

  static fromDuplicatePage(canonicalPath: string, city: string, state: string): InvalidInputError {
    return new InvalidInputError(
      `City "${city}, ${state}" maps to ${canonicalPath}, which is already generated`,
      'Two cities produce the same slug; rename or remove one of them'
    );
  }

  static fromInvalidSlug(city: string, state: string, slug: string): InvalidInputError {
    if (slug.length === 0) {
      return new InvalidInputError(
        `City "${city}, ${state}" produces an empty URL slug`,
        'City names need at least one ASCII letter or digit'
      );
    }
    return new InvalidInputError(
      `City "${city}, ${state}" produces an invalid URL slug (${slug.length} characters)`,
      `Slug: ${slug}`
    );
  }

  static fromNoCities(): InvalidInputError {
    return new InvalidInputError(
      'No cities to generate. Pass --cities <csv> or add a "cities" list to the content file.'
    );
  }

  static fromInvalidOption(option: string, value: string, expected: string): InvalidInputError {
    return new InvalidInputError(`${option} ${expected}, got: ${value}`);
  }
}

/**
 * Missing asset error (exit code 2)
 * Triggered by: image, stylesheet, content or city file absent
 */
export class MissingAssetError extends SiteBuildError {
  readonly code = 2;

  static fromPath(kind: string, path: string): MissingAssetError {
    return new MissingAssetError(
      `Missing ${kind}: ${path}`,
      `Create the file or point the matching CLI option at it`
    );
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof SiteBuildError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Log an error and return the exit code the process should use
 */
export function reportError(error: unknown): number {
  if (error instanceof SiteBuildError) {
    error.log();
    return error.getExitCode();
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  return 1;
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  process.exit(reportError(error));
}

/**
 * True when a file system call failed because the path does not exist
 */
export function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
