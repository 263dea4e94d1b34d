/**
 * Unknown-entity classification helpers
 *
 * The parser hands unresolved tokens to a ClassificationStrategy. These
 * helpers are shared by strategies: fuzzy suggestions over known aliases,
 * a bounded retry loop, and a non-interactive strategy for batch runs.
 */

import type {
  ClassificationResult,
  ClassificationStrategy,
  EntityDirectory,
  EntityKind,
} from './types.js';
import { closestMatches } from './similarity.js';

export type SettledClassification = Exclude<ClassificationResult, { kind: 'retry' }>;

export interface AliasedRecord {
  aliases: readonly string[];
}

export interface AliasSuggestion {
  /** Known alias or canonical name that matched */
  alias: string;
  /** Canonical entity it belongs to */
  canonical: string;
  /** Similarity on a 0-1 scale */
  score: number;
}

/**
 * Canonical names and aliases closest to a token
 * Defaults: at most 5 suggestions, similarity at least 0.6.
 */
export function closestKnownAliases(
  token: string,
  records: Readonly<Record<string, AliasedRecord>>,
  limit = 5,
  cutoff = 0.6
): AliasSuggestion[] {
  const owners = new Map<string, string>();
  for (const name of Object.keys(records)) {
    owners.set(name.toLowerCase().trim(), name);
  }
  for (const [name, record] of Object.entries(records)) {
    for (const alias of record.aliases) {
      const key = alias.toLowerCase().trim();
      if (!owners.has(key)) owners.set(key, name);
    }
  }

  return closestMatches(token.toLowerCase().trim(), owners.keys(), limit, cutoff).map((match) => ({
    alias: match.candidate,
    canonical: owners.get(match.candidate) ?? match.candidate,
    score: match.score,
  }));
}

function recordsFor(directory: EntityDirectory, kind: EntityKind): Readonly<Record<string, AliasedRecord>> {
  switch (kind) {
    case 'team':
      return directory.teams();
    case 'market':
      return directory.markets();
    case 'player':
      return directory.players();
  }
}

export interface ClassifyOptions {
  maxAttempts: number;
  expected?: EntityKind;
}

/**
 * Ask a strategy to classify a token, asking again on 'retry'.
 * After maxAttempts retries the token is left unresolved.
 */
export async function classifyWithRetry(
  strategy: ClassificationStrategy,
  token: string,
  directory: EntityDirectory,
  options: ClassifyOptions
): Promise<SettledClassification> {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const result = await strategy.classify(token, directory, options.expected);
    if (result.kind !== 'retry') {
      return result;
    }
    console.warn(`[classify] "${token}" attempt ${attempt}/${options.maxAttempts}: ${result.reason}`);
  }

  console.warn(`[classify] Giving up on "${token}" after ${options.maxAttempts} attempts, leaving it unresolved`);
  return { kind: 'ignore' };
}

export interface AutoAcceptOptions {
  /** Minimum similarity (0-1) for attaching a token to an existing entity */
  minScore?: number;
  /** Sport for created entities; when unset nothing is created */
  createWithSport?: string;
}

/**
 * Non-interactive strategy
 * Attaches the token as an alias of the closest known entity when similar
 * enough, optionally creates a new one otherwise, and ignores the rest.
 */
export class AutoAcceptClassifier implements ClassificationStrategy {
  private readonly minScore: number;

  constructor(private readonly options: AutoAcceptOptions = {}) {
    this.minScore = options.minScore ?? 0.85;
  }

  async classify(
    token: string,
    directory: EntityDirectory,
    expected: EntityKind = 'team'
  ): Promise<ClassificationResult> {
    const [best] = closestKnownAliases(token, recordsFor(directory, expected), 1, this.minScore);

    if (best) {
      await directory.addAlias(expected, best.canonical, token.toLowerCase().trim());
      return { kind: 'existing', entity: expected, name: best.canonical };
    }

    const sport = this.options.createWithSport;
    if (sport && expected !== 'player') {
      const name = token.toLowerCase().trim();
      const created =
        expected === 'team'
          ? await directory.addTeam(name, sport)
          : await directory.addMarket(name, sport, 'regular');
      if (created) {
        return { kind: 'new', entity: expected, name };
      }
    }

    return { kind: 'ignore' };
  }
}
