/**
 * Entity kinds held by the directory
 */
export type EntityKind = 'team' | 'market' | 'player';

/**
 * Team record as stored by the directory, keyed by canonical name
 */
export interface TeamRecord {
  sport: string;
  aliases: string[];
  players?: string[];
}

/**
 * Market record as stored by the directory, keyed by canonical name
 */
export interface MarketRecord {
  sport: string;
  aliases: string[];
  /** Market type code (e.g. MATCH_ODDS), or 'regular' for user-added markets */
  type?: string;
  description?: string;
}

/**
 * Player record as stored by the directory, keyed by canonical name
 */
export interface PlayerRecord {
  sport: string;
  team: string | null;
  aliases: string[];
}

/**
 * Entity Directory collaborator
 *
 * Reads are snapshots of the current state. Every successful mutation bumps
 * `version`, which is how readers notice that their alias maps are stale.
 */
export interface EntityDirectory {
  readonly version: number;
  teams(): Readonly<Record<string, TeamRecord>>;
  markets(): Readonly<Record<string, MarketRecord>>;
  players(): Readonly<Record<string, PlayerRecord>>;
  findTeamByAlias(alias: string): string | null;
  findMarketByAlias(alias: string): string | null;
  addTeam(name: string, sport: string, aliases?: string[]): Promise<boolean>;
  addMarket(name: string, sport: string, type: string, aliases?: string[]): Promise<boolean>;
  addPlayer(name: string, sport: string, team?: string | null, aliases?: string[]): Promise<boolean>;
  addAlias(kind: EntityKind, canonical: string, alias: string): Promise<boolean>;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Outcome of classifying an unresolved token
 * - existing: the token now resolves to an existing entity (alias attached)
 * - new: a new entity was created
 * - ignore: leave the token unresolved
 * - retry: the decision could not be made (e.g. bad menu input); ask again
 */
export type ClassificationResult =
  | { kind: 'existing'; entity: EntityKind; name: string }
  | { kind: 'new'; entity: EntityKind; name: string }
  | { kind: 'ignore' }
  | { kind: 'retry'; reason: string };

export interface ClassificationStrategy {
  classify(token: string, directory: EntityDirectory, expected?: EntityKind): Promise<ClassificationResult>;
}

// ============================================================================
// PARSE RESULT
// ============================================================================

/**
 * Correct-score prediction as (home, away) goals
 */
export type Score = readonly [home: number, away: number];

/**
 * Structured result of interpreting a free-text bet
 */
export interface ParsedBet {
  readonly teams: readonly string[];
  readonly markets: readonly string[];
  readonly scores: readonly Score[];
  readonly unrecognized: readonly string[];
}

// ============================================================================
// MARKET DATA
// ============================================================================

export interface ExchangeEvent {
  id: string;
  name: string;
  /** ISO-8601 start time */
  openDate: string;
}

export interface ExchangeRunner {
  selectionId: number;
  runnerName: string;
}

export interface MarketCatalogue {
  marketId: string;
  marketName: string;
  marketStartTime?: string;
  runners: ExchangeRunner[];
}

/**
 * Market Data Provider collaborator
 */
export interface MarketDataProvider {
  findEvents(teamQuery: string, sportId: string): Promise<ExchangeEvent[]>;
  listMarketCatalogue(eventId: string, typeCodes: readonly string[]): Promise<MarketCatalogue[]>;
  /** Best available lay price, or null when nothing is offered */
  bestLayPrice(marketId: string, selectionId: number): Promise<number | null>;
}

// ============================================================================
// VALUE
// ============================================================================

export enum ValueDecision {
  NOT_VALUE = 'NOT VALUE',
  TWO_PERCENT = '2PC',
  VALUE = 'VALUE',
}
