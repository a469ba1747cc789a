#!/usr/bin/env node
import { orchestrateBuild } from '../core/index.js';
import { handleError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { createProgram, toBuildOptions } from './program.js';

function run(): void {
  const program = createProgram(async (options) => {
    const logger = getLogger({ verbose: options.verbose ?? false });

    logger.debug('Parsed CLI arguments:');
    logger.debug(`  Content: ${options.content}`);
    logger.debug(`  Cities: ${options.cities ?? '(content file list)'}`);
    logger.debug(`  Image: ${options.image}`);
    logger.debug(`  Stylesheet: ${options.stylesheet}`);
    logger.debug(`  Output: ${options.out}`);
    if (options.siteUrl) {
      logger.debug(`  Site URL: ${options.siteUrl}`);
    }

    const result = await orchestrateBuild(toBuildOptions(options));
    logger.info(`Generated ${result.pages.length} pages into ${result.outDir}`);
  });

  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return;
  }

  program.parseAsync(process.argv).catch(handleError);
}

run();
