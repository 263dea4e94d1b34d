/**
 * JSON-backed Entity Directory
 *
 * teams.json, markets.json and players.json under one data directory.
 * Every mutation rewrites all three files.
 */

import * as path from 'node:path';
import { MemoryEntityDirectory, type DirectoryData } from '@valuebet/core';
import { marketsFileSchema, playersFileSchema, teamsFileSchema, type MarketsFile, type PlayersFile, type TeamsFile } from './schemas.js';
import { JsonFileStore } from './store.js';

export interface DirectoryStores {
  teams: JsonFileStore<TeamsFile>;
  markets: JsonFileStore<MarketsFile>;
  players: JsonFileStore<PlayersFile>;
}

export function createDirectoryStores(dataPath: string): DirectoryStores {
  return {
    teams: new JsonFileStore(path.join(dataPath, 'teams.json'), teamsFileSchema, { label: '[teams]' }),
    markets: new JsonFileStore(path.join(dataPath, 'markets.json'), marketsFileSchema, { label: '[markets]' }),
    players: new JsonFileStore(path.join(dataPath, 'players.json'), playersFileSchema, {
      label: '[players]',
      optional: true,
    }),
  };
}

async function loadAll(stores: DirectoryStores): Promise<DirectoryData> {
  const [teams, markets, players] = await Promise.all([
    stores.teams.load(),
    stores.markets.load(),
    stores.players.load(),
  ]);
  return { teams: teams ?? {}, markets: markets ?? {}, players: players ?? {} };
}

export class JsonEntityDirectory extends MemoryEntityDirectory {
  private constructor(
    readonly dataPath: string,
    private readonly stores: DirectoryStores,
    data: DirectoryData
  ) {
    super(data);
  }

  static async open(dataPath: string): Promise<JsonEntityDirectory> {
    const stores = createDirectoryStores(dataPath);
    const data = await loadAll(stores);
    console.log(
      `[directory] Loaded ${Object.keys(data.teams ?? {}).length} teams, ` +
        `${Object.keys(data.markets ?? {}).length} markets, ` +
        `${Object.keys(data.players ?? {}).length} players from ${dataPath}`
    );
    return new JsonEntityDirectory(dataPath, stores, data);
  }

  protected async persist(): Promise<void> {
    const { teams, markets, players } = this.snapshot();
    const results = await Promise.all([
      this.stores.teams.save(teams),
      this.stores.markets.save(markets),
      this.stores.players.save(players),
    ]);
    if (results.includes(false)) {
      console.error(`[directory] Changes kept in memory only; not all files under ${this.dataPath} were written`);
    }
  }
}
