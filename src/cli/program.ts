import { Command, InvalidArgumentError } from 'commander';
import type { BuildOptions } from '../core/index.js';
import { CLI_DEFAULTS, type CliOptions } from './types.js';

export type BuildHandler = (options: CliOptions) => Promise<void>;

/**
 * Accept http(s) URLs only; the value prefixes sitemap locations
 */
export function parseSiteUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new InvalidArgumentError(`Expected an absolute URL such as https://example.com, got: ${value}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidArgumentError(`Expected an http or https URL, got: ${value}`);
  }

  return value.replace(/\/+$/, '');
}

export function toBuildOptions(options: CliOptions): BuildOptions {
  return {
    contentPath: options.content,
    citiesPath: options.cities,
    imagePath: options.image,
    stylesheetPath: options.stylesheet,
    outDir: options.out,
    siteUrl: options.siteUrl,
  };
}

export function createProgram(onBuild: BuildHandler): Command {
  const program = new Command();

  program
    .name('city-site')
    .description('Generate a static marketing site with one landing page per city')
    .version('0.1.0');

  program
    .command('build')
    .description('Generate the site into the output directory (the directory is replaced)')
    .option('--cities <csv>', 'City CSV with city,state,col columns (default: cities list in the content file)')
    .option('--content <json>', 'Site content file', CLI_DEFAULTS.content)
    .option('--image <path>', 'Shared image copied into the output root', CLI_DEFAULTS.image)
    .option('--stylesheet <path>', 'Stylesheet inlined into every page', CLI_DEFAULTS.stylesheet)
    .option('--out <dir>', 'Output directory', CLI_DEFAULTS.out)
    .option('--site-url <url>', 'Absolute site URL used in sitemap.xml and robots.txt', parseSiteUrl)
    .option('--verbose', 'Enable verbose logging')
    .action(async (options: CliOptions) => {
      await onBuild(options);
    });

  return program;
}
