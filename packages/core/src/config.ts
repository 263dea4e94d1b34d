import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

/**
 * What to do when two canonical entities normalize to the same alias
 * - last-wins: later entity overwrites the mapping (with a warning)
 * - first-wins: earlier entity keeps the mapping (with a warning)
 * - reject: building the alias map fails with AliasConflictError
 */
export type AliasConflictPolicy = 'last-wins' | 'first-wins' | 'reject';

/**
 * Parser and evaluation configuration.
 * Built once at startup and passed to every component; never mutated.
 */
export interface ParserConfig {
  /** Directory holding teams.json / markets.json / players.json */
  readonly dataPath: string;
  /** Minimum similarity (0-100) for a market alias to be accepted */
  readonly fuzzyThreshold: number;
  readonly fillerWords: ReadonlySet<string>;
  /** Sport/league words stripped before market recognition */
  readonly sportKeywords: ReadonlySet<string>;
  readonly sportEventTypeIds: Readonly<Record<string, string>>;
  readonly marketNameToTypes: Readonly<Record<string, readonly string[]>>;
  /** Market used when a bet names no market, per sport */
  readonly defaultMarkets: Readonly<Record<string, string>>;
  readonly primarySport: string;
  readonly primaryFallbackType: string;
  readonly genericFallbackType: string;
  readonly aliasConflictPolicy: AliasConflictPolicy;
  readonly maxClassificationAttempts: number;
  /** Re-parse passes allowed after the directory changes mid-parse */
  readonly maxReparses: number;
  readonly verbose: boolean;
}

export const DEFAULT_PARSER_CONFIG: ParserConfig = {
  dataPath: 'data',
  fuzzyThreshold: 80,
  fillerWords: new Set(['and', 'or', 'the', 'a', 'an', 'v']),
  sportKeywords: new Set(['nfl', 'nba', 'nhl', 'football', 'soccer']),
  sportEventTypeIds: {
    football: '1',
    nba: '7522',
    nfl: '6423',
    nhl: '7524',
  },
  marketNameToTypes: {
    'match odds': ['MATCH_ODDS'],
    'correct score': ['CORRECT_SCORE'],
  },
  defaultMarkets: {
    football: 'match odds',
    nba: 'moneyline_nba',
    nfl: 'moneyline_nfl',
    nhl: 'moneyline_nhl',
  },
  primarySport: 'football',
  primaryFallbackType: 'MATCH_ODDS',
  genericFallbackType: 'MONEY_LINE',
  aliasConflictPolicy: 'last-wins',
  maxClassificationAttempts: 3,
  maxReparses: 2,
  verbose: false,
};

/**
 * Shape of config.json
 */
export const configFileSchema = z.object({
  data_path: z.string().min(1).optional(),
  fuzzy_threshold: z.number().min(0).max(100).optional(),
  common_filler_words: z.array(z.string()).optional(),
  sport_keywords: z.array(z.string()).optional(),
  sport_event_type_ids: z.record(z.string()).optional(),
  market_name_to_types: z.record(z.array(z.string())).optional(),
  default_markets: z.record(z.string()).optional(),
  alias_conflict_policy: z.enum(['last-wins', 'first-wins', 'reject']).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Parse float from env with fallback
 */
function parseFloat(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseConflictPolicy(value: string | undefined, fallback: AliasConflictPolicy): AliasConflictPolicy {
  if (value === 'last-wins' || value === 'first-wins' || value === 'reject') {
    return value;
  }
  return fallback;
}

function lowerKeys<T>(record: Record<string, T>): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key.trim().toLowerCase()] = value;
  }
  return out;
}

/**
 * Merge a validated config file over the defaults
 */
export function buildParserConfig(
  file: ConfigFile = {},
  env: NodeJS.ProcessEnv = {},
  base: ParserConfig = DEFAULT_PARSER_CONFIG
): ParserConfig {
  const config: ParserConfig = {
    ...base,
    dataPath: env.VALUEBET_DATA_PATH || file.data_path || base.dataPath,
    fuzzyThreshold: parseFloat(env.FUZZY_THRESHOLD, file.fuzzy_threshold ?? base.fuzzyThreshold),
    fillerWords: file.common_filler_words
      ? new Set(file.common_filler_words.map((w) => w.toLowerCase()))
      : base.fillerWords,
    sportKeywords: file.sport_keywords
      ? new Set(file.sport_keywords.map((w) => w.toLowerCase()))
      : base.sportKeywords,
    sportEventTypeIds: file.sport_event_type_ids ?? base.sportEventTypeIds,
    marketNameToTypes: file.market_name_to_types
      ? lowerKeys(file.market_name_to_types)
      : base.marketNameToTypes,
    defaultMarkets: file.default_markets ?? base.defaultMarkets,
    aliasConflictPolicy: parseConflictPolicy(
      env.ALIAS_CONFLICT_POLICY,
      file.alias_conflict_policy ?? base.aliasConflictPolicy
    ),
    verbose: env.VALUEBET_VERBOSE === 'true' || base.verbose,
  };
  return Object.freeze(config);
}

/**
 * Read and validate a config file.
 * Missing or invalid files yield null; nothing is thrown.
 */
export function readConfigFile(configPath: string): ConfigFile | null {
  if (!fs.existsSync(configPath)) {
    console.warn(`[config] ${configPath} not found, using defaults`);
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    console.error(`[config] Failed to read ${configPath}: ${err}`);
    return null;
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    console.error(`[config] Invalid ${configPath}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    return null;
  }
  return parsed.data;
}

/**
 * Load parser config from CONFIG_PATH (default data/config.json) and env
 */
export function loadParserConfig(env: NodeJS.ProcessEnv = process.env): ParserConfig {
  const configPath = env.CONFIG_PATH || path.join('data', 'config.json');
  const file = readConfigFile(configPath) ?? {};
  return buildParserConfig(file, env);
}

/**
 * Format config for logging
 */
export function formatParserConfig(config: ParserConfig): string {
  return [
    '[config] Parser config:',
    `  dataPath: ${config.dataPath}`,
    `  fuzzyThreshold: ${config.fuzzyThreshold}`,
    `  fillerWords: ${[...config.fillerWords].join(', ')}`,
    `  sportKeywords: ${[...config.sportKeywords].join(', ')}`,
    `  sports: ${Object.entries(config.sportEventTypeIds).map(([s, id]) => `${s}=${id}`).join(', ')}`,
    `  marketMappings: ${Object.keys(config.marketNameToTypes).length}`,
    `  aliasConflictPolicy: ${config.aliasConflictPolicy}`,
    `  verbose: ${config.verbose}`,
  ].join('\n');
}
