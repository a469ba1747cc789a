/**
 * City source: CSV file or static list → immutable CityRecord list
 */

import { readFile } from 'fs/promises';
import { InvalidInputError, MissingAssetError, isMissingFileError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { parseCsvLine, splitCsvLines } from './csv.js';
import {
  CityColumn,
  CityListEntry,
  CityRecord,
  DEFAULT_COST_MULTIPLIER,
  REQUIRED_CITY_COLUMNS,
} from './types.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function createCityRecord(city: string, state: string, costMultiplier: number): CityRecord {
  return Object.freeze({
    city: city.trim(),
    state: state.trim().toUpperCase(),
    costMultiplier,
  });
}

/**
 * Parse the "col" column. Accepts plain decimal and exponent notation only.
 */
export function parseCostMultiplier(raw: string): number | null {
  if (!DECIMAL_PATTERN.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse city CSV text.
 * The first non-blank line is the header and must contain city, state and col.
 * Line numbers in errors count every physical line, header included.
 */
export function parseCitiesCsv(text: string): CityRecord[] {
  const lines = splitCsvLines(text);
  const [header, ...rows] = lines;

  const headers = header ? parseCsvLine(header.raw).map((h) => h.trim().toLowerCase()) : [];
  const missing = REQUIRED_CITY_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw InvalidInputError.fromMissingHeaders([...missing], headers);
  }

  const columnIndex: Record<CityColumn, number> = {
    city: headers.indexOf('city'),
    state: headers.indexOf('state'),
    col: headers.indexOf('col'),
  };

  return rows.map(({ lineNumber, raw }) => {
    const values = parseCsvLine(raw);
    const field = (column: CityColumn): string => {
      const value = (values[columnIndex[column]] ?? '').trim();
      if (!value) {
        throw InvalidInputError.fromEmptyField(lineNumber, column, raw);
      }
      return value;
    };

    const city = field('city');
    const state = field('state');
    const colRaw = field('col');

    const costMultiplier = parseCostMultiplier(colRaw);
    if (costMultiplier === null) {
      throw InvalidInputError.fromInvalidNumber(lineNumber, 'col', colRaw);
    }

    return createCityRecord(city, state, costMultiplier);
  });
}

/**
 * Read and parse a city CSV file
 */
export async function loadCitiesFromCsv(path: string): Promise<CityRecord[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw MissingAssetError.fromPath('city CSV', path);
    }
    throw error;
  }

  const cities = parseCitiesCsv(text);
  getLogger().debug(`Loaded ${cities.length} cities from ${path}`);
  return cities;
}

/**
 * Normalize a static city list
 */
export function citiesFromList(entries: readonly CityListEntry[]): CityRecord[] {
  return entries.map((entry) =>
    createCityRecord(entry.city, entry.state, entry.costMultiplier ?? DEFAULT_COST_MULTIPLIER)
  );
}
