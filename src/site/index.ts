/**
 * Static HTML generation module
 */

import { SiteGenerator, type BuildResult, type SiteGeneratorOptions } from './generator.js';
import { getLogger } from '../utils/logger.js';

export async function generateSite(options: SiteGeneratorOptions): Promise<BuildResult> {
  const logger = getLogger();
  logger.info(`Generating static site in ${options.outDir}`);

  try {
    const generator = new SiteGenerator(options);
    return await generator.generate();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.debug(`Site generation aborted: ${message}`);
    throw error;
  }
}

export { SiteGenerator, type BuildResult, type SiteGeneratorOptions } from './generator.js';
export { clampTitle, DEFAULT_TITLE_MAX_CHARS } from './title.js';
export { assemblePage, renderSection, renderBlock, toContentBlocks, type PageInput } from './assembler.js';
export { renderDocument, renderNav, type LayoutContext } from './layout.js';
export { buildHomePage, buildCostPage, buildHowToPage, buildCityPage, renderCostCallout } from './pages.js';
export { robotsTxt, sitemapXml, resolveLocation } from './sitemap.js';
export type { NavKey, ContentBlock, PageSpec, PageKind, RenderedPage } from './types.js';
