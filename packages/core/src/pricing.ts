/**
 * Price aggregation and value classification
 */

import { ValueDecision } from './types.js';

/** Below this fraction of the quoted odds a bet is value */
export const VALUE_FACTOR = 0.9999;
/** Up to this fraction of the quoted odds a bet is within two percent */
export const TWO_PERCENT_FACTOR = 1.0199;

// Float noise such as 12.000000000000002 must not push a ceiling up a step
const CEIL_TOLERANCE = 1e-9;

/**
 * Round half away from zero to a number of decimals
 * Goes through the decimal string so 1.005 rounds to 1.01.
 */
export function roundTo(value: number, decimals: number): number {
  const shifted = Number(`${Math.abs(value)}e${decimals}`);
  if (!Number.isFinite(shifted)) {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
  }
  const rounded = Number(`${Math.round(shifted)}e-${decimals}`);
  return value < 0 ? -rounded : rounded;
}

/**
 * Round up to the next tenth
 *
 * ceilToTenth(1.21) -> 1.3
 */
export function ceilToTenth(value: number): number {
  return Math.ceil(value * 10 - CEIL_TOLERANCE) / 10;
}

/**
 * Combine prices for mutually exclusive outcomes into one price:
 * 1 / sum(1 / price), rounded up to one decimal. Null for no prices.
 *
 * combinePrices([2.0, 3.0]) -> 1.2
 */
export function combinePrices(prices: readonly number[]): number | null {
  const valid = prices.filter((p) => Number.isFinite(p) && p > 0);
  if (valid.length === 0) return null;

  const totalProbability = valid.reduce((sum, p) => sum + 1 / p, 0);
  return ceilToTenth(1 / totalProbability);
}

export interface PriceProduct {
  /** Unrounded product; used for classification */
  raw: number;
  /** Product rounded to 3 then 2 decimals; used for display */
  rounded: number;
}

/**
 * Multiply per-leg prices of an accumulator
 */
export function multiplyPrices(prices: readonly number[]): PriceProduct {
  const raw = prices.reduce((product, p) => product * p, 1);
  return { raw, rounded: roundTo(roundTo(raw, 3), 2) };
}

/**
 * Compare an exchange price against the bettor's odds
 * - VALUE: price < 0.9999 * odds
 * - 2PC: price <= 1.0199 * odds
 * - NOT VALUE otherwise
 */
export function classifyValue(price: number, odds: number): ValueDecision {
  if (price < VALUE_FACTOR * odds) {
    return ValueDecision.VALUE;
  }
  if (price <= TWO_PERCENT_FACTOR * odds) {
    return ValueDecision.TWO_PERCENT;
  }
  return ValueDecision.NOT_VALUE;
}

const UPPERCASE_SPORTS = new Set(['nba', 'nfl', 'nhl']);

/**
 * Display label for a sport: leagues in capitals, anything else capitalized
 *
 * formatSportLabel('nba') -> "NBA"
 * formatSportLabel('FOOTBALL') -> "Football"
 */
export function formatSportLabel(sport: string): string {
  const lower = sport.trim().toLowerCase();
  if (UPPERCASE_SPORTS.has(lower)) {
    return lower.toUpperCase();
  }
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

export interface SavedBet {
  bookmaker: string;
  sport: string;
  betText: string;
  odds: number;
  price: number;
  decision: ValueDecision;
}

/**
 * "<bookmaker> - <Sport> - <bet> - <odds> / <price>", plus " 2pc" for 2PC bets
 *
 * formatSavedLine({bookmaker: 'bookie', sport: 'nba', betText: 'lakers', odds: 2.5, price: 2.4, decision: VALUE})
 *   -> "bookie - NBA - lakers - 2.5 / 2.4"
 */
export function formatSavedLine(bet: SavedBet): string {
  const line = `${bet.bookmaker.trim()} - ${formatSportLabel(bet.sport)} - ${bet.betText.trim()} - ${bet.odds} / ${bet.price}`;
  return bet.decision === ValueDecision.TWO_PERCENT ? `${line} 2pc` : line;
}
