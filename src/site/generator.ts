import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname, join, parse, resolve } from 'path';
import type { CityRecord } from '../cities/types.js';
import type { SiteContent } from '../content/types.js';
import { InvalidInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
  cityStateSlug,
  getPageFilePath,
  getRobotsPath,
  getSitemapPath,
  isValidSlug,
  isWithinDir,
} from '../utils/paths.js';
import { renderDocument } from './layout.js';
import { buildCityPage, buildCostPage, buildHomePage, buildHowToPage } from './pages.js';
import { robotsTxt, sitemapXml } from './sitemap.js';
import type { PageKind, PageSpec, RenderedPage } from './types.js';

export interface SiteGeneratorOptions {
  content: SiteContent;
  cities: readonly CityRecord[];
  stylesheet: string;
  /** Bytes of the shared image written into the output root */
  image: Buffer;
  outDir: string;
  /** Makes sitemap and robots locations absolute */
  siteUrl?: string;
}

export interface BuildResult {
  outDir: string;
  /** Canonical paths of every emitted page, in sitemap order */
  pages: string[];
  filesWritten: number;
}

export class SiteGenerator {
  private readonly options: SiteGeneratorOptions;

  constructor(options: SiteGeneratorOptions) {
    this.options = options;
  }

  public async generate(): Promise<BuildResult> {
    const logger = getLogger();
    logger.info('Starting site generation...');

    const pages = this.plan();
    const result = await this.write(pages);

    logger.info('Site generation complete.');
    return result;
  }

  /**
   * Render every page in memory. Rejects cities whose slug is empty, too long
   * or collides with an earlier page, so nothing is written for bad input.
   */
  public plan(): RenderedPage[] {
    const { content, cities } = this.options;
    const seen = new Set<string>();
    const pages: RenderedPage[] = [];

    const add = (kind: PageKind, spec: PageSpec): void => {
      seen.add(spec.canonicalPath);
      pages.push({ kind, canonicalPath: spec.canonicalPath, html: this.render(spec) });
    };

    add('home', buildHomePage(content, cities));
    add('cost', buildCostPage(content));
    add('howto', buildHowToPage(content));

    for (const city of cities) {
      const slug = cityStateSlug(city.city, city.state);
      if (!isValidSlug(slug)) {
        throw InvalidInputError.fromInvalidSlug(city.city, city.state, slug);
      }
      const spec = buildCityPage(content, city);
      if (seen.has(spec.canonicalPath)) {
        throw InvalidInputError.fromDuplicatePage(spec.canonicalPath, city.city, city.state);
      }
      add('city', spec);
    }

    getLogger().debug(`Planned ${pages.length} pages`);
    return pages;
  }

  public async write(pages: readonly RenderedPage[]): Promise<BuildResult> {
    const { outDir, siteUrl, image, content } = this.options;
    const logger = getLogger();

    await this.resetOutputDir();
    await writeFile(join(outDir, content.image.filename), image);
    let filesWritten = 1;

    logger.progress({ phase: 'Writing pages', current: 0, total: pages.length });
    for (const [index, page] of pages.entries()) {
      const filePath = getPageFilePath(outDir, page.canonicalPath);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, page.html, 'utf-8');
      filesWritten++;
      logger.debug(`Wrote ${page.canonicalPath}`);
      logger.progress({ phase: 'Writing pages', current: index + 1, total: pages.length });
    }

    const paths = pages.map((page) => page.canonicalPath);
    await writeFile(getRobotsPath(outDir), robotsTxt(siteUrl), 'utf-8');
    await writeFile(getSitemapPath(outDir), sitemapXml(paths, siteUrl), 'utf-8');
    filesWritten += 2;

    return { outDir, pages: paths, filesWritten };
  }

  private render(spec: PageSpec): string {
    return renderDocument(spec, { content: this.options.content, stylesheet: this.options.stylesheet });
  }

  /**
   * Delete and recreate the output directory. Refuses the working directory,
   * any of its ancestors, and the filesystem root.
   */
  private async resetOutputDir(): Promise<void> {
    const target = resolve(this.options.outDir);
    if (target === parse(target).root || isWithinDir(target, process.cwd())) {
      throw InvalidInputError.fromInvalidOption('--out', this.options.outDir, 'must not be the working directory, one of its parents or the filesystem root');
    }

    await rm(target, { recursive: true, force: true });
    await mkdir(target, { recursive: true });
  }
}
