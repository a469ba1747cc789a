import { citiesFromList, loadCitiesFromCsv, type CityRecord } from '../cities/index.js';
import { loadSiteContent, type SiteContent } from '../content/index.js';
import { generateSite, type BuildResult } from '../site/index.js';
import { InvalidInputError, getLogger, isWithinDir, readBinaryAsset, readTextAsset } from '../utils/index.js';

export interface BuildOptions {
  contentPath: string;
  /** City CSV; falls back to the content file's static list */
  citiesPath?: string;
  imagePath: string;
  stylesheetPath: string;
  outDir: string;
  siteUrl?: string;
}

async function resolveCities(content: SiteContent, citiesPath?: string): Promise<CityRecord[]> {
  if (citiesPath) {
    return loadCitiesFromCsv(citiesPath);
  }
  if (content.cities) {
    return citiesFromList(content.cities);
  }
  throw InvalidInputError.fromNoCities();
}

/**
 * The output directory is wiped before writing, so it must not hold any input
 */
function assertOutputSeparate(options: BuildOptions): void {
  const inputs = [options.contentPath, options.citiesPath, options.imagePath, options.stylesheetPath];
  for (const input of inputs) {
    if (input !== undefined && isWithinDir(options.outDir, input)) {
      throw InvalidInputError.fromInvalidOption('--out', options.outDir, `must not contain the input file ${input}`);
    }
  }
}

/**
 * Load and validate every input, then generate the site.
 * Input errors surface before the output directory is touched.
 */
export async function orchestrateBuild(options: BuildOptions): Promise<BuildResult> {
  const logger = getLogger();
  logger.info(`Building site into ${options.outDir}`);

  assertOutputSeparate(options);

  logger.phaseStart('load inputs');
  const content = await loadSiteContent(options.contentPath);
  const cities = await resolveCities(content, options.citiesPath);
  if (cities.length === 0) {
    logger.warn('City source is empty; only the fixed pages will be generated');
  }
  const image = await readBinaryAsset('site image', options.imagePath);
  const stylesheet = await readTextAsset('stylesheet', options.stylesheetPath);
  logger.phaseComplete('Load inputs', `${cities.length} cities`);

  const result = await generateSite({
    content,
    cities,
    stylesheet,
    image,
    outDir: options.outDir,
    siteUrl: options.siteUrl,
  });

  logger.summary({
    pages: { fixed: result.pages.length - cities.length, cities: cities.length },
    files: { written: result.filesWritten, outDir: options.outDir },
  });

  return result;
}
