/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - progress(): page-writing progress indicator
 * - summary(): final build statistics
 */

export interface LoggerConfig {
  verbose?: boolean;
}

export interface ProgressStats {
  phase: string;
  current: number;
  total: number;
}

export interface SummaryStats {
  pages?: {
    fixed: number;
    cities: number;
  };
  files?: {
    written: number;
    outDir: string;
  };
}

const PREFIX = '[city-site]';

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  /**
   * Always prints - used for concise summary lines
   */
  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - used for per-page detail
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Progress indicator for a phase.
   * Concise mode only reports the first and last item.
   */
  progress(stats: ProgressStats): void {
    const { phase, current, total } = stats;
    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;

    if (this.verbose) {
      console.log(`${PREFIX} PROGRESS: ${phase} - ${current}/${total} (${percentage}%)`);
    } else if (current === 0 || current === total) {
      console.log(`${PREFIX} ${phase}: ${current}/${total} (${percentage}%)`);
    }
  }

  summary(stats: SummaryStats): void {
    const lines: string[] = [];

    if (stats.pages) {
      const { fixed, cities } = stats.pages;
      lines.push(`Pages: ${fixed + cities} total (${fixed} fixed, ${cities} city)`);
    }

    if (stats.files) {
      const { written, outDir } = stats.files;
      lines.push(`Files: ${written} written to ${outDir}`);
    }

    lines.forEach((line) => this.info(line));
  }

  phaseComplete(phaseName: string, details?: string): void {
    const msg = details ? `${phaseName} complete: ${details}` : `${phaseName} complete`;
    this.info(msg);
  }

  /**
   * Print a phase start message (verbose only)
   */
  phaseStart(phaseName: string): void {
    this.debug(`Starting phase: ${phaseName}`);
  }

  warn(message: string): void {
    console.warn(`${PREFIX} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton.
 * A config passed after creation only updates verbosity when it sets it.
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
