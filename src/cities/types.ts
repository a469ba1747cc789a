/**
 * City records feeding one landing page each
 */

export const DEFAULT_COST_MULTIPLIER = 1.0;

/** Columns the city CSV header must contain */
export const REQUIRED_CITY_COLUMNS = ['city', 'state', 'col'] as const;

export type CityColumn = (typeof REQUIRED_CITY_COLUMNS)[number];

export interface CityRecord {
  readonly city: string;
  /** Upper-case state abbreviation, e.g. "TX" */
  readonly state: string;
  /** Cost-of-living multiplier applied to the base price range */
  readonly costMultiplier: number;
}

/**
 * Entry of a static city list; state case and a missing multiplier are normalized on load
 */
export interface CityListEntry {
  city: string;
  state: string;
  costMultiplier?: number;
}
