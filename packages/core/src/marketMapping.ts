/**
 * Market type mapping
 *
 * Translates canonical market names into exchange market-type codes.
 */

import type { ParserConfig } from './config.js';

export const WIN_TO_NIL_MARKET = 'to win to nil';
export const MATCH_ODDS_MARKET = 'match odds';

export type MarketMappingConfig = Pick<
  ParserConfig,
  'marketNameToTypes' | 'primarySport' | 'primaryFallbackType' | 'genericFallbackType'
>;

/**
 * Type codes for a market name in a sport. Never fails.
 * - empty name means match odds
 * - "to win to nil" maps to [] (the side-specific code is picked per event)
 * - unknown names fall back to one code for the primary sport, another elsewhere
 *
 * mapMarketNameToType('match odds', 'football') -> ['MATCH_ODDS']
 * mapMarketNameToType('anything', 'nba') -> ['MONEY_LINE']
 */
export function mapMarketNameToType(
  marketName: string,
  sport: string,
  config: MarketMappingConfig
): string[] {
  const name = marketName.trim().toLowerCase() || MATCH_ODDS_MARKET;

  if (name === WIN_TO_NIL_MARKET) {
    return [];
  }

  const mapped = config.marketNameToTypes[name];
  if (mapped) {
    return [...mapped];
  }

  if (sport.trim().toLowerCase() === config.primarySport) {
    return [config.primaryFallbackType];
  }
  return [config.genericFallbackType];
}

/**
 * Infer a sport from league markers in a market name; football otherwise
 *
 * inferSportFromMarket('moneyline_nba') -> 'nba'
 */
export function inferSportFromMarket(market: string): string {
  const name = market.toLowerCase();
  if (name.includes('nba')) return 'nba';
  if (name.includes('nfl')) return 'nfl';
  if (name.includes('nhl')) return 'nhl';
  return 'football';
}

/**
 * Market assumed when a bet names none
 */
export function defaultMarketForSport(
  sport: string,
  config: Pick<ParserConfig, 'defaultMarkets'>
): string {
  return config.defaultMarkets[sport.toLowerCase()] ?? MATCH_ODDS_MARKET;
}
