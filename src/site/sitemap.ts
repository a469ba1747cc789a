/**
 * Crawler files: robots.txt and sitemap.xml
 */

import { escapeXml } from '../template/index.js';
import { OUTPUT_LAYOUT } from '../utils/paths.js';

/**
 * Absolute URL when a site URL is configured, otherwise the path itself
 */
export function resolveLocation(path: string, siteUrl?: string): string {
  if (!siteUrl) {
    return path;
  }
  return `${siteUrl.replace(/\/+$/, '')}${path}`;
}

/** Allow-all robots.txt pointing at the sitemap */
export function robotsTxt(siteUrl?: string): string {
  const sitemap = resolveLocation(`/${OUTPUT_LAYOUT.SITEMAP_FILE}`, siteUrl);
  return `User-agent: *\nAllow: /\nSitemap: ${sitemap}\n`;
}

/**
 * One <url><loc> entry per canonical path, in the order given.
 * Repeated paths are listed once.
 */
export function sitemapXml(paths: readonly string[], siteUrl?: string): string {
  const unique = [...new Set(paths)];
  const entries = unique.map((path) => `  <url><loc>${escapeXml(resolveLocation(path, siteUrl))}</loc></url>\n`);

  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n' +
    entries.join('') +
    '</urlset>\n'
  );
}
