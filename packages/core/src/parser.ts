/**
 * Bet Parser
 *
 * Turns free-text bet descriptions into a ParsedBet:
 *   normalize -> teams (longest match) -> drop sport keywords
 *   -> markets (fuzzy reduction) -> "win" heuristic -> correct scores
 *
 * Alias maps are cached per directory version. When classifying an unknown
 * team mutates the directory, the whole text is parsed again from the top.
 */

import type { ParserConfig } from './config.js';
import type { ClassificationStrategy, EntityDirectory, ParsedBet, Score } from './types.js';
import { AliasDirectory } from './aliasDirectory.js';
import { classifyWithRetry } from './classification.js';
import { MATCH_ODDS_MARKET } from './marketMapping.js';
import { buildMarketCandidates, reduceMarkets, type MarketCandidate } from './markets.js';
import { fullyNormalize, splitTokens } from './normalize.js';
import { CORRECT_SCORE_MARKET, extractScores } from './scores.js';
import { findTeamsInSegment, removeTeamMatches } from './teams.js';

export type RecognitionOptions = Pick<ParserConfig, 'fuzzyThreshold' | 'fillerWords' | 'sportKeywords'>;

export interface Recognition {
  bet: ParsedBet;
  /** Scoring passes used by market reduction */
  marketIterations: number;
}

/**
 * Immutable ParsedBet
 */
export function freezeParsedBet(bet: {
  teams: readonly string[];
  markets: readonly string[];
  scores: readonly Score[];
  unrecognized: readonly string[];
}): ParsedBet {
  return Object.freeze({
    teams: Object.freeze([...bet.teams]),
    markets: Object.freeze([...bet.markets]),
    scores: Object.freeze(bet.scores.map((s) => Object.freeze([s[0], s[1]] as const))),
    unrecognized: Object.freeze([...bet.unrecognized]),
  });
}

/**
 * Recognize teams, markets and scores against prebuilt alias data.
 * Pure: no classification, no directory access.
 */
export function recognizeBet(
  input: string,
  teamAliases: AliasDirectory,
  marketCandidates: readonly MarketCandidate[],
  options: RecognitionOptions
): Recognition {
  const text = fullyNormalize(input);

  const teamMatches = findTeamsInSegment(text, teamAliases);
  const teams = teamMatches.map((m) => m.canonical);

  const leftover = splitTokens(removeTeamMatches(text, teamMatches))
    .filter((w) => !options.sportKeywords.has(w))
    .join(' ');

  const reduction = reduceMarkets(leftover, marketCandidates, {
    threshold: options.fuzzyThreshold,
    fillerWords: options.fillerWords,
  });
  const markets = [...reduction.markets];
  let tokens = reduction.leftover;

  if (markets.length === 0 && teams.length > 0 && tokens.includes('win')) {
    markets.push(MATCH_ODDS_MARKET);
    tokens = tokens.filter((t) => t !== 'win' && t !== 'to');
  }

  const { scores, leftover: afterScores } = extractScores(tokens);
  if (scores.length > 0 && !markets.includes(CORRECT_SCORE_MARKET)) {
    markets.push(CORRECT_SCORE_MARKET);
  }

  return {
    bet: freezeParsedBet({
      teams,
      markets,
      scores,
      unrecognized: afterScores.length > 0 ? [afterScores.join(' ')] : [],
    }),
    marketIterations: reduction.iterations,
  };
}

interface AliasSnapshot {
  version: number;
  teams: AliasDirectory;
  markets: MarketCandidate[];
}

export class BetParser {
  private snapshot: AliasSnapshot | null = null;

  constructor(
    private readonly directory: EntityDirectory,
    private readonly config: ParserConfig,
    private readonly strategy?: ClassificationStrategy
  ) {}

  /**
   * Alias data for the current directory version
   */
  private aliases(): AliasSnapshot {
    const version = this.directory.version;
    if (this.snapshot && this.snapshot.version === version) {
      return this.snapshot;
    }

    const teamRecords = this.directory.teams();
    const marketRecords = this.directory.markets();

    if (Object.keys(teamRecords).length === 0) {
      console.warn('[parser] No teams loaded, teams will not be recognized');
    }
    if (Object.keys(marketRecords).length === 0) {
      console.warn('[parser] No markets loaded, markets will not be recognized');
    }

    const teams = AliasDirectory.build(teamRecords, this.config.aliasConflictPolicy);
    for (const conflict of teams.conflicts) {
      console.warn(
        `[parser] Team alias "${conflict.alias}" claimed by "${conflict.kept}" and "${conflict.dropped}", using "${conflict.kept}"`
      );
    }

    this.snapshot = { version, teams, markets: buildMarketCandidates(marketRecords) };
    return this.snapshot;
  }

  /**
   * Parse without classifying unknown teams
   */
  recognize(input: string): ParsedBet {
    const { teams, markets } = this.aliases();
    return recognizeBet(input, teams, markets, this.config).bet;
  }

  /**
   * Parse a bet, classifying teams the directory doesn't hold.
   * A directory change during classification restarts the parse, at most
   * maxReparses times.
   */
  async parse(input: string): Promise<ParsedBet> {
    for (let pass = 0; ; pass++) {
      const snapshot = this.aliases();
      const { bet, marketIterations } = recognizeBet(input, snapshot.teams, snapshot.markets, this.config);

      if (this.config.verbose) {
        console.log(
          `[parser] "${input}" -> teams=${JSON.stringify(bet.teams)} markets=${JSON.stringify(bet.markets)} ` +
            `scores=${JSON.stringify(bet.scores)} unrecognized=${JSON.stringify(bet.unrecognized)} (${marketIterations} market passes)`
        );
      }
      if (bet.teams.length === 0 && bet.markets.length === 0) {
        console.warn(`[parser] Nothing recognized in "${input}"`);
      }

      const known = this.directory.teams();
      const unknown = bet.teams.filter((t) => !Object.hasOwn(known, t));
      if (unknown.length === 0 || !this.strategy) {
        return bet;
      }

      const resolved = new Map<string, string>();
      let changed = false;
      for (const team of new Set(unknown)) {
        await classifyWithRetry(this.strategy, team, this.directory, {
          maxAttempts: this.config.maxClassificationAttempts,
          expected: 'team',
        });
        if (this.directory.version !== snapshot.version) {
          changed = true;
        }
        resolved.set(team, this.directory.findTeamByAlias(team) ?? team.toLowerCase().trim());
      }

      if (changed && pass < this.config.maxReparses) {
        if (this.config.verbose) {
          console.log(`[parser] Directory changed during classification, parsing "${input}" again`);
        }
        continue;
      }

      return freezeParsedBet({
        ...bet,
        teams: bet.teams.map((t) => resolved.get(t) ?? t),
      });
    }
  }
}
