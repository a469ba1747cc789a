/**
 * City source: CSV parsing and static lists
 */

export {
  DEFAULT_COST_MULTIPLIER,
  REQUIRED_CITY_COLUMNS,
  type CityColumn,
  type CityRecord,
  type CityListEntry,
} from './types.js';

export { parseCsvLine, splitCsvLines, type CsvLine } from './csv.js';

export { parseCitiesCsv, parseCostMultiplier, loadCitiesFromCsv, citiesFromList } from './loader.js';
