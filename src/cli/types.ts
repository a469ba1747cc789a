/**
 * CLI argument parsing and validation types
 */

export interface CliOptions {
  cities?: string;
  content: string;
  image: string;
  stylesheet: string;
  out: string;
  siteUrl?: string;
  verbose?: boolean;
}

export const CLI_DEFAULTS = {
  content: 'content/site.json',
  image: 'content/picture.png',
  stylesheet: 'content/styles.css',
  out: 'public',
} as const;
