/**
 * Bet line input
 *
 * Console lines are either a bare bet ("man utd v chelsea match odds") or
 * the full form "bookmaker - sport - bet - odds".
 */

import { collapseWhitespace, preprocessInput, removeWholeWord } from './normalize.js';

export interface BetLine {
  bookmaker: string | null;
  sport: string | null;
  betText: string;
  /** Null when the line carries no usable odds */
  odds: number | null;
  /** True only for the full four-part form with positive odds */
  explicit: boolean;
  /** Why four-part odds were rejected */
  warning?: string;
}

const PART_SEPARATOR = /\s-\s/;
const PART_SEPARATOR_GLOBAL = /\s-\s/g;
const TIME_ANNOTATION = /\(\d{1,2}:\d{2}\)/g;

/**
 * Parse odds text as a positive decimal, or null
 */
export function parseOdds(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * Split a console line into its parts.
 * Only lines with exactly three " - " separators use the full form.
 *
 * parseBetLine('bookie - football - ajax to win - 1.85')
 *   -> { bookmaker: 'bookie', sport: 'football', betText: 'ajax to win', odds: 1.85, explicit: true }
 */
export function parseBetLine(input: string): BetLine {
  const occurrences = input.match(PART_SEPARATOR_GLOBAL)?.length ?? 0;
  if (occurrences !== 3) {
    return { bookmaker: null, sport: null, betText: input, odds: null, explicit: false };
  }

  const [bookmaker, sport, betText, oddsText] = input.split(PART_SEPARATOR).map((p) => p.trim());
  const odds = parseOdds(oddsText);
  if (odds === null) {
    const numeric = Number(oddsText.trim());
    return {
      bookmaker,
      sport,
      betText,
      odds: null,
      explicit: false,
      warning: oddsText.trim() !== '' && Number.isFinite(numeric)
        ? 'Odds must be positive'
        : 'Odds not recognized as a positive decimal number',
    };
  }

  return { bookmaker, sport, betText, odds, explicit: true };
}

/**
 * Teams on one side of each "Home v Away" fixture in a list.
 * Fixtures are separated by "," or "&"; "(HH:MM)" kickoff times are dropped;
 * segments without " v " are skipped.
 *
 * parseMultipleMatches('Ajax v Lazio & Rangers v Tottenham') -> ['Ajax', 'Rangers']
 */
export function parseMultipleMatches(input: string, pick: 'home' | 'away' = 'home'): string[] {
  const segments = input
    .replace(/&/g, ',')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  const teams: string[] = [];
  for (const segment of segments) {
    const fixture = segment.replace(TIME_ANNOTATION, '').trim();
    const index = fixture.indexOf(' v ');
    if (index === -1) continue;

    const home = fixture.slice(0, index).trim();
    const away = fixture.slice(index + 3).trim();
    teams.push(pick === 'home' ? home : away);
  }
  return teams;
}

/**
 * Lines naming more than one fixture are bets on the home sides
 */
export function hasMultipleMatches(input: string): boolean {
  return input.toLowerCase().split(' v ').length - 1 > 1;
}

/**
 * Rewrite a multi-fixture line as "<home teams> <remaining text>", preprocessed
 *
 * simplifyMultipleMatches('Ajax v Lazio & Rangers v Tottenham, over 2.5 goals')
 *   -> 'ajax rangers over 2.5 goals'
 */
export function simplifyMultipleMatches(input: string): string {
  const home = parseMultipleMatches(input, 'home');
  const away = parseMultipleMatches(input, 'away');

  let leftover = input.replace(TIME_ANNOTATION, ' ');
  const names = [...home, ...away].filter((n) => n.length > 0).sort((a, b) => b.length - a.length);
  for (const name of names) {
    leftover = removeWholeWord(leftover, name);
  }
  leftover = removeWholeWord(leftover, 'v');
  leftover = leftover.replace(/^[,\s]+|[,\s]+$/g, '');

  return preprocessInput(collapseWhitespace([...home, leftover].join(' ')));
}

/**
 * Bet text as handed to the parser: multi-fixture lines are simplified,
 * everything else only preprocessed
 */
export function prepareBetText(betText: string): string {
  return hasMultipleMatches(betText) ? simplifyMultipleMatches(betText) : preprocessInput(betText);
}
