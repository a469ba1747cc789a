/**
 * Structural validation of site content JSON.
 * Each reader throws InvalidInputError naming the dotted field path.
 */

import { InvalidInputError } from '../utils/errors.js';
import type { CityListEntry } from '../cities/types.js';
import type {
  BlockSequence,
  CityPageContent,
  HomePageContent,
  PageContent,
  Pricing,
  SiteContent,
  SiteImage,
} from './types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fieldPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function readObject(parent: JsonObject, key: string, path: string): JsonObject {
  const value = parent[key];
  if (!isObject(value)) {
    throw InvalidInputError.fromInvalidContent(fieldPath(path, key), 'must be an object');
  }
  return value;
}

function readString(parent: JsonObject, key: string, path: string): string {
  const value = parent[key];
  if (typeof value !== 'string') {
    throw InvalidInputError.fromInvalidContent(fieldPath(path, key), 'must be a string');
  }
  return value;
}

function readNonEmptyString(parent: JsonObject, key: string, path: string): string {
  const value = readString(parent, key, path);
  if (value.trim().length === 0) {
    throw InvalidInputError.fromInvalidContent(fieldPath(path, key), 'must not be empty');
  }
  return value;
}

function readNumber(parent: JsonObject, key: string, path: string): number {
  const value = parent[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw InvalidInputError.fromInvalidContent(fieldPath(path, key), 'must be a finite number');
  }
  return value;
}

function readStringArray(parent: JsonObject, key: string, path: string): string[] {
  const value = parent[key];
  if (!Array.isArray(value)) {
    throw InvalidInputError.fromInvalidContent(fieldPath(path, key), 'must be an array of strings');
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw InvalidInputError.fromInvalidContent(`${fieldPath(path, key)}[${index}]`, 'must be a string');
    }
    return item;
  });
}

function readBlocks(parent: JsonObject, path: string): BlockSequence {
  const blocksPath = fieldPath(path, 'blocks');
  const blocks = readObject(parent, 'blocks', path);
  const headings = readStringArray(blocks, 'headings', blocksPath);
  const paragraphs = readStringArray(blocks, 'paragraphs', blocksPath);

  if (headings.length !== paragraphs.length) {
    throw InvalidInputError.fromInvalidContent(
      blocksPath,
      `has ${headings.length} headings but ${paragraphs.length} paragraphs`
    );
  }

  return { headings, paragraphs };
}

function readPage(parent: JsonObject, key: string): PageContent {
  const page = readObject(parent, key, '');
  return {
    title: readNonEmptyString(page, 'title', key),
    subtitle: readString(page, 'subtitle', key),
    blocks: readBlocks(page, key),
  };
}

function readHomePage(parent: JsonObject): HomePageContent {
  const home = readObject(parent, 'home', '');
  return {
    ...readPage(parent, 'home'),
    cityListHeading: readNonEmptyString(home, 'cityListHeading', 'home'),
    cityListIntro: readString(home, 'cityListIntro', 'home'),
  };
}

function readCityPage(parent: JsonObject): CityPageContent {
  const city = readObject(parent, 'city', '');
  return {
    title: readNonEmptyString(city, 'title', 'city'),
    subtitle: readString(city, 'subtitle', 'city'),
    costHeading: readNonEmptyString(city, 'costHeading', 'city'),
    costParagraph: readString(city, 'costParagraph', 'city'),
    calloutLabel: readNonEmptyString(city, 'calloutLabel', 'city'),
  };
}

function readPricing(parent: JsonObject): Pricing {
  const pricing = readObject(parent, 'pricing', '');
  const low = readNumber(pricing, 'low', 'pricing');
  const high = readNumber(pricing, 'high', 'pricing');

  if (low > high) {
    throw InvalidInputError.fromInvalidContent('pricing.low', `(${low}) must not exceed pricing.high (${high})`);
  }

  const currencySymbol = pricing.currencySymbol === undefined ? '$' : readString(pricing, 'currencySymbol', 'pricing');
  return { low, high, currencySymbol };
}

function readImage(parent: JsonObject): SiteImage {
  const image = readObject(parent, 'image', '');
  const filename = readNonEmptyString(image, 'filename', 'image');

  if (/[\\/]/.test(filename) || filename === '.' || filename === '..') {
    throw InvalidInputError.fromInvalidContent('image.filename', 'must be a bare file name');
  }

  return { filename, alt: readString(image, 'alt', 'image') };
}

function readCityList(parent: JsonObject): CityListEntry[] | undefined {
  const value = parent.cities;
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw InvalidInputError.fromInvalidContent('cities', 'must be an array');
  }

  return value.map((item, index) => {
    const path = `cities[${index}]`;
    if (!isObject(item)) {
      throw InvalidInputError.fromInvalidContent(path, 'must be an object');
    }
    const entry: CityListEntry = {
      city: readNonEmptyString(item, 'city', path),
      state: readNonEmptyString(item, 'state', path),
    };
    if (item.costMultiplier !== undefined) {
      entry.costMultiplier = readNumber(item, 'costMultiplier', path);
    }
    return entry;
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate parsed JSON and return a deep-frozen SiteContent
 */
export function validateSiteContent(value: unknown): SiteContent {
  if (!isObject(value)) {
    throw InvalidInputError.fromInvalidContent('document', 'must be a JSON object');
  }

  const content: SiteContent = {
    brandName: readNonEmptyString(value, 'brandName', ''),
    ctaText: readNonEmptyString(value, 'ctaText', ''),
    ctaHref: readNonEmptyString(value, 'ctaHref', ''),
    image: readImage(value),
    pricing: readPricing(value),
    home: readHomePage(value),
    costPage: readPage(value, 'costPage'),
    howTo: readPage(value, 'howTo'),
    city: readCityPage(value),
    cities: readCityList(value),
  };

  return deepFreeze(content);
}

/**
 * Type guard: check if value is valid site content
 */
export function isValidSiteContent(value: unknown): value is SiteContent {
  try {
    validateSiteContent(value);
    return true;
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return false;
    }
    throw error;
  }
}
