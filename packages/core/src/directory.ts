/**
 * In-memory Entity Directory
 *
 * Holds teams, markets and players keyed by lowercase canonical name.
 * Subclasses persist changes by overriding `persist()`; the version is
 * bumped before persisting so readers never keep a stale alias map.
 */

import type { EntityDirectory, EntityKind, MarketRecord, PlayerRecord, TeamRecord } from './types.js';

export interface DirectoryData {
  teams?: Record<string, TeamRecord>;
  markets?: Record<string, MarketRecord>;
  players?: Record<string, PlayerRecord>;
}

export const USER_MARKET_DESCRIPTION = 'User-added market';

function cleanName(name: string): string {
  return name.toLowerCase().trim();
}

function cleanAliases(aliases: readonly string[] | undefined): string[] {
  return (aliases ?? []).map(cleanName).filter((a) => a.length > 0);
}

function findByAlias(records: Record<string, { aliases: string[] }>, alias: string): string | null {
  const wanted = cleanName(alias);
  for (const [name, record] of Object.entries(records)) {
    if (name.toLowerCase() === wanted || record.aliases.some((a) => a.toLowerCase() === wanted)) {
      return name;
    }
  }
  return null;
}

export class MemoryEntityDirectory implements EntityDirectory {
  protected teamRecords: Record<string, TeamRecord>;
  protected marketRecords: Record<string, MarketRecord>;
  protected playerRecords: Record<string, PlayerRecord>;
  private versionCounter = 0;

  constructor(data: DirectoryData = {}) {
    this.teamRecords = structuredClone(data.teams ?? {});
    this.marketRecords = structuredClone(data.markets ?? {});
    this.playerRecords = structuredClone(data.players ?? {});
  }

  get version(): number {
    return this.versionCounter;
  }

  teams(): Readonly<Record<string, TeamRecord>> {
    return this.teamRecords;
  }

  markets(): Readonly<Record<string, MarketRecord>> {
    return this.marketRecords;
  }

  players(): Readonly<Record<string, PlayerRecord>> {
    return this.playerRecords;
  }

  findTeamByAlias(alias: string): string | null {
    return findByAlias(this.teamRecords, alias);
  }

  findMarketByAlias(alias: string): string | null {
    return findByAlias(this.marketRecords, alias);
  }

  /**
   * Add a team. Existing teams are left untouched (returns false).
   */
  async addTeam(name: string, sport: string, aliases: string[] = []): Promise<boolean> {
    const teamName = cleanName(name);
    if (!teamName || Object.hasOwn(this.teamRecords, teamName)) return false;
    if (!sport) {
      console.warn(`[directory] No sport specified for team '${teamName}'`);
    }

    this.teamRecords[teamName] = { sport, aliases: cleanAliases(aliases) };
    await this.commit();
    return true;
  }

  /**
   * Add a market; its own name is always among its aliases
   */
  async addMarket(name: string, sport: string, type: string, aliases: string[] = []): Promise<boolean> {
    const marketName = cleanName(name);
    if (!marketName || Object.hasOwn(this.marketRecords, marketName)) return false;
    if (!sport) {
      console.warn(`[directory] No sport specified for market '${marketName}'`);
    }
    if (!type) {
      console.warn(`[directory] No market type specified for '${marketName}'`);
    }

    const all = cleanAliases(aliases);
    if (!all.includes(marketName)) all.push(marketName);

    this.marketRecords[marketName] = {
      sport,
      aliases: all,
      type,
      description: USER_MARKET_DESCRIPTION,
    };
    await this.commit();
    return true;
  }

  /**
   * Add a player, linking it into its team's roster when the team exists
   */
  async addPlayer(name: string, sport: string, team: string | null = null, aliases: string[] = []): Promise<boolean> {
    const playerName = cleanName(name);
    if (!playerName || Object.hasOwn(this.playerRecords, playerName)) return false;
    if (!sport) {
      console.warn(`[directory] No sport specified for player '${playerName}'`);
    }

    const teamName = team ? cleanName(team) : null;
    this.playerRecords[playerName] = { sport, team: teamName || null, aliases: cleanAliases(aliases) };

    if (teamName && Object.hasOwn(this.teamRecords, teamName)) {
      const record = this.teamRecords[teamName];
      const players = record.players ?? [];
      if (!players.includes(playerName)) {
        record.players = [...players, playerName];
      }
    }

    await this.commit();
    return true;
  }

  /**
   * Attach an alias to an existing entity.
   * False when the entity is unknown or already answers to the alias.
   */
  async addAlias(kind: EntityKind, canonical: string, alias: string): Promise<boolean> {
    const records = this.recordsOf(kind);
    const value = cleanName(alias);
    if (!value || !Object.hasOwn(records, canonical)) return false;

    const record = records[canonical];
    if (canonical.toLowerCase() === value || record.aliases.some((a) => a.toLowerCase() === value)) {
      return false;
    }

    record.aliases.push(value);
    await this.commit();
    return true;
  }

  /**
   * Current contents, for saving
   */
  snapshot(): Required<DirectoryData> {
    return {
      teams: structuredClone(this.teamRecords),
      markets: structuredClone(this.marketRecords),
      players: structuredClone(this.playerRecords),
    };
  }

  protected async persist(): Promise<void> {
    // in-memory only
  }

  private recordsOf(kind: EntityKind): Record<string, { aliases: string[] }> {
    switch (kind) {
      case 'team':
        return this.teamRecords;
      case 'market':
        return this.marketRecords;
      case 'player':
        return this.playerRecords;
    }
  }

  private async commit(): Promise<void> {
    this.versionCounter++;
    await this.persist();
  }
}
