/**
 * markets:map - Show the exchange type codes each market resolves to
 */

import {
  inferSportFromMarket,
  mapMarketNameToType,
  type EntityDirectory,
  type ParserConfig,
} from '@valuebet/core';

export interface MarketsMapOptions {
  directory: EntityDirectory;
  config: ParserConfig;
  /** Map only this name instead of every known market */
  name?: string;
  /** Overrides the market's own sport */
  sport?: string;
}

export interface MarketMapRow {
  market: string;
  sport: string;
  typeCodes: string[];
  /** True when the name came from market_name_to_types */
  mapped: boolean;
}

/**
 * Run markets:map command
 */
export function runMarketsMap(options: MarketsMapOptions): MarketMapRow[] {
  const { directory, config } = options;
  const records = directory.markets();
  const names = options.name ? [options.name.trim().toLowerCase()] : Object.keys(records).sort();

  const rows = names.map((market) => {
    const sport = (options.sport || records[market]?.sport || inferSportFromMarket(market)).toLowerCase();
    return {
      market,
      sport,
      typeCodes: mapMarketNameToType(market, sport, config),
      mapped: Object.hasOwn(config.marketNameToTypes, market),
    };
  });

  console.log(`[markets:map] ${rows.length} market(s)`);
  for (const row of rows) {
    const codes = row.typeCodes.length > 0 ? row.typeCodes.join(', ') : '(picked per event)';
    console.log(`  ${row.market.padEnd(30)} ${row.sport.padEnd(10)} ${codes}${row.mapped ? '' : '  [fallback]'}`);
  }
  return rows;
}
