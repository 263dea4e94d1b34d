/**
 * Console output shared by evaluate and interactive
 */

import {
  formatSavedLine,
  ValueDecision,
  type BetLine,
  type EvaluationOutcome,
  type ParsedBet,
} from '@valuebet/core';

export type PricedOutcome = Extract<EvaluationOutcome, { status: 'priced' }>;

export function printParsed(parsed: ParsedBet): void {
  console.log(`Parsed: teams=${JSON.stringify(parsed.teams)} markets=${JSON.stringify(parsed.markets)}`);
  if (parsed.scores.length > 0) {
    console.log(`  scores=${parsed.scores.map(([h, a]) => `${h}-${a}`).join(', ')}`);
  }
  if (parsed.unrecognized.length > 0) {
    console.log(`  unrecognized=${JSON.stringify(parsed.unrecognized)}`);
  }
}

export function printOutcome(outcome: EvaluationOutcome): void {
  switch (outcome.status) {
    case 'empty':
      console.log(outcome.reason);
      return;
    case 'aborted':
      console.log(outcome.reason);
      console.log('Stopping further processing.');
      return;
    case 'priced':
      for (const leg of outcome.legs) {
        console.log(
          `  ${leg.team} | ${leg.eventName} | ${leg.market} (${leg.typeCodes.join('/')}) | ${leg.runners.join(', ')} @ ${leg.price}`
        );
      }
      console.log(`Multiplied Lay Price: ${outcome.aggregatedPrice}`);
      console.log(outcome.decision);
      return;
  }
}

/**
 * Whether a priced bet is worth saving
 */
export function isWorthSaving(outcome: EvaluationOutcome): outcome is PricedOutcome {
  return outcome.status === 'priced' && outcome.decision !== ValueDecision.NOT_VALUE;
}

/**
 * Saved-line text for a priced bet.
 * Sport: the line's own, else the sport every team shares, else the fallback.
 */
export function savedLineFor(
  line: BetLine,
  odds: number,
  outcome: PricedOutcome,
  bookmaker: string,
  fallbackSport: string
): string {
  return formatSavedLine({
    bookmaker,
    sport: line.sport || outcome.sport || fallbackSport,
    betText: line.betText,
    odds,
    price: outcome.aggregatedPrice,
    decision: outcome.decision,
  });
}
