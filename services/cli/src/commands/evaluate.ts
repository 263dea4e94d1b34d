/**
 * evaluate - Price one bet and print the value decision
 *
 * Non-interactive: unknown teams are left unresolved, or with autoAlias
 * attached to a close known team.
 */

import {
  AutoAcceptClassifier,
  BetEvaluator,
  BetParser,
  parseBetLine,
  prepareBetText,
  type BetLine,
  type EntityDirectory,
  type EvaluationOutcome,
  type MarketDataProvider,
  type ParsedBet,
  type ParserConfig,
} from '@valuebet/core';
import { isWorthSaving, printOutcome, printParsed, savedLineFor } from './outcome.js';

export interface EvaluateOptions {
  bet: string;
  /** Used when the line isn't in "bookmaker - sport - bet - odds" form */
  odds?: number;
  bookmaker?: string;
  /** Sport for the saved line when the line names none */
  sport?: string;
  autoAlias?: boolean;
  directory: EntityDirectory;
  config: ParserConfig;
  provider: MarketDataProvider;
}

export interface EvaluateResult {
  line: BetLine;
  odds: number;
  parsed: ParsedBet;
  outcome: EvaluationOutcome;
  /** Formatted line for VALUE/2PC bets with a known bookmaker */
  savedLine: string | null;
}

/**
 * Run evaluate command
 */
export async function runEvaluate(options: EvaluateOptions): Promise<EvaluateResult> {
  const { directory, config, provider } = options;

  const line = parseBetLine(options.bet);
  if (line.warning) {
    console.warn(`[evaluate] ${line.warning}`);
  }
  const odds = line.odds ?? options.odds;
  if (odds === undefined || !(odds > 0)) {
    throw new Error('Odds required: pass --odds or use "bookmaker - sport - bet - odds"');
  }

  const parser = new BetParser(directory, config, options.autoAlias ? new AutoAcceptClassifier() : undefined);
  const parsed = await parser.parse(prepareBetText(line.betText));
  printParsed(parsed);

  const outcome = await new BetEvaluator(provider, directory, config).evaluate(parsed, odds);
  printOutcome(outcome);

  const bookmaker = line.bookmaker ?? options.bookmaker ?? null;
  let savedLine: string | null = null;
  if (bookmaker && isWorthSaving(outcome)) {
    savedLine = savedLineFor(
      { ...line, sport: line.sport || options.sport || null },
      odds,
      outcome,
      bookmaker,
      config.primarySport
    );
    console.log(`Saved line: ${savedLine}`);
  }

  return { line, odds, parsed, outcome, savedLine };
}
