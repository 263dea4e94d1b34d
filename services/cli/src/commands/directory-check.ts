/**
 * directory:check - Report alias conflicts and unmapped markets
 *
 * Conflicts are collected without failing, whatever the configured policy,
 * so every clash shows up in one run.
 */

import {
  AliasDirectory,
  type AliasConflict,
  type EntityDirectory,
  type ParserConfig,
} from '@valuebet/core';

export interface DirectoryCheckOptions {
  directory: EntityDirectory;
  config: ParserConfig;
}

export interface DirectoryCheckResult {
  counts: { teams: number; markets: number; players: number };
  conflicts: { teams: AliasConflict[]; markets: AliasConflict[]; players: AliasConflict[] };
  /** Markets with no entry in market_name_to_types */
  unmappedMarkets: string[];
  ok: boolean;
}

function printConflicts(label: string, conflicts: readonly AliasConflict[]): void {
  console.log(`\n[${label}] ${conflicts.length} conflict(s)`);
  for (const c of conflicts) {
    console.log(`  "${c.alias}": ${c.kept} (kept) vs ${c.dropped}`);
  }
}

/**
 * Run directory:check command
 */
export function runDirectoryCheck(options: DirectoryCheckOptions): DirectoryCheckResult {
  const { directory, config } = options;
  const policy = config.aliasConflictPolicy === 'first-wins' ? 'first-wins' : 'last-wins';

  const teams = AliasDirectory.build(directory.teams(), policy).conflicts;
  const markets = AliasDirectory.build(directory.markets(), policy).conflicts;
  const players = AliasDirectory.build(directory.players(), policy).conflicts;

  const unmappedMarkets = Object.keys(directory.markets()).filter(
    (name) => !Object.hasOwn(config.marketNameToTypes, name)
  );

  const counts = {
    teams: Object.keys(directory.teams()).length,
    markets: Object.keys(directory.markets()).length,
    players: Object.keys(directory.players()).length,
  };

  console.log(`\n${'='.repeat(60)}`);
  console.log(`[directory:check] teams=${counts.teams} markets=${counts.markets} players=${counts.players}`);
  console.log(`${'='.repeat(60)}`);

  printConflicts('Teams', teams);
  printConflicts('Markets', markets);
  printConflicts('Players', players);

  console.log(`\n[Unmapped markets] ${unmappedMarkets.length}`);
  for (const name of unmappedMarkets) {
    console.log(`  ${name}`);
  }

  const ok = teams.length === 0 && markets.length === 0 && players.length === 0;
  return { counts, conflicts: { teams: [...teams], markets: [...markets], players: [...players] }, unmappedMarkets, ok };
}
