/**
 * Path utilities and naming policy for the output layout
 * Defines the canonical output structure and slug generation rules
 */

import { isAbsolute, join, relative, resolve, sep } from 'path';

/**
 * Canonical output layout structure
 */
export const OUTPUT_LAYOUT = {
  /** Page file written into every page directory */
  INDEX_FILE: 'index.html',
  /** Crawler directives */
  ROBOTS_FILE: 'robots.txt',
  /** Sitemap listing every canonical path */
  SITEMAP_FILE: 'sitemap.xml',
  /** Canonical path of the homepage */
  HOME_PATH: '/',
  /** Canonical path of the cost guide */
  COST_PATH: '/cost/',
  /** Canonical path of the how-to guide */
  HOWTO_PATH: '/how-to/',
} as const;

/** Longest slug accepted for a page directory */
export const MAX_SLUG_LENGTH = 200;

/**
 * Normalize a string to a URL-safe slug
 * - Lowercase
 * - "&" becomes "and"
 * - Every run of characters outside [a-z0-9] becomes one hyphen
 * - Trim hyphens from edges
 *
 * Non-ASCII letters are not transliterated: "Québec" becomes "qu-bec".
 *
 * @param text - Text to slugify
 * @returns URL-safe slug, empty for input without ASCII letters or digits
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Slug of a city page: city slug and state slug joined by a hyphen.
 * An empty part is left out so the result never starts or ends with a hyphen.
 */
export function cityStateSlug(city: string, state: string): string {
  return [slugify(city), slugify(state)].filter((part) => part.length > 0).join('-');
}

/**
 * Canonical path of a city page, e.g. "/austin-tx/"
 */
export function cityCanonicalPath(city: string, state: string): string {
  return `/${cityStateSlug(city, state)}/`;
}

/**
 * Get the file a canonical path is written to
 * @param outDir - Output root directory
 * @param canonicalPath - Path such as "/" or "/cost/"
 * @returns Full path to the page's index.html
 */
export function getPageFilePath(outDir: string, canonicalPath: string): string {
  const segments = canonicalPath.split('/').filter((segment) => segment.length > 0);
  return join(outDir, ...segments, OUTPUT_LAYOUT.INDEX_FILE);
}

export function getRobotsPath(outDir: string): string {
  return join(outDir, OUTPUT_LAYOUT.ROBOTS_FILE);
}

export function getSitemapPath(outDir: string): string {
  return join(outDir, OUTPUT_LAYOUT.SITEMAP_FILE);
}

/**
 * Validate that a slug is safe and within constraints
 * @param slug - Slug to validate
 * @returns true if slug is safe
 */
export function isValidSlug(slug: string): boolean {
  if (slug.length === 0 || slug.length > MAX_SLUG_LENGTH) {
    return false;
  }

  return /^[a-z0-9]+(-[a-z0-9]+)*$/.test(slug);
}

/**
 * True when target is dir itself or lies somewhere below it
 */
export function isWithinDir(dir: string, target: string): boolean {
  const fromDir = relative(resolve(dir), resolve(target));
  const escapes = fromDir === '..' || fromDir.startsWith(`..${sep}`);
  return !escapes && !isAbsolute(fromDir);
}
