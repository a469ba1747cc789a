import type { CityRecord } from '../cities/types.js';
import type { TokenValues } from './tokens.js';

export interface CostRange {
  low: number;
  high: number;
}

export interface BasePricing {
  readonly low: number;
  readonly high: number;
  readonly currencySymbol: string;
}

/**
 * Localize the base range. Amounts are truncated toward zero, never rounded.
 */
export function computeCostRange(low: number, high: number, multiplier: number): CostRange {
  return {
    low: Math.trunc(low * multiplier),
    high: Math.trunc(high * multiplier),
  };
}

export function formatCurrency(amount: number, symbol: string = '$'): string {
  return `${symbol}${amount}`;
}

/**
 * Named token values for a city page
 */
export function cityTokenValues(city: CityRecord, pricing: BasePricing): TokenValues {
  const range = computeCostRange(pricing.low, pricing.high, city.costMultiplier);

  return {
    'City, State': `${city.city}, ${city.state}`,
    cost_lo: formatCurrency(range.low, pricing.currencySymbol),
    cost_hi: formatCurrency(range.high, pricing.currencySymbol),
  };
}
