/**
 * Event, market and runner selection
 *
 * Scoring heuristics that pick, for one team, the exchange event it plays in,
 * the market to trade and the runner (outcome) that represents the bet.
 */

import type { ExchangeEvent, ExchangeRunner, MarketCatalogue, Score } from './types.js';
import { similarityRatio } from './similarity.js';
import { formatScoreRunnerName } from './scores.js';

export type TeamSide = 'home' | 'away';

export const EXACT_SIDE_SCORE = 300;
export const PREFIX_SIDE_SCORE = 250;

export const TEAM_A_WIN_TO_NIL = 'TEAM_A_WIN_TO_NIL';
export const TEAM_B_WIN_TO_NIL = 'TEAM_B_WIN_TO_NIL';

const VERSUS_SEPARATOR = /\s+v\s+|\s+vs\s+|\s+@\s+/i;
const HOME_AWAY_SEPARATOR = /\sv\s/i;

// ============================================================================
// EVENTS
// ============================================================================

/**
 * How well one side of an event name matches a team
 * - exact (case-insensitive): 300
 * - side starts with team: 250 minus 10 per extra character, at least 1
 * - otherwise similarity ratio (0-100)
 */
export function scoreTeamInName(sideName: string, teamName: string): number {
  const side = sideName.toLowerCase().trim();
  const team = teamName.toLowerCase().trim();

  if (side === team) {
    return EXACT_SIDE_SCORE;
  }
  if (side.startsWith(team)) {
    return Math.max(1, PREFIX_SIDE_SCORE - 10 * (side.length - team.length));
  }
  return similarityRatio(team, side);
}

/**
 * Split an event name into its two sides, or null if it isn't "A v B"
 */
export function splitEventSides(eventName: string, separator: RegExp = VERSUS_SEPARATOR): [string, string] | null {
  const parts = eventName.split(separator);
  if (parts.length !== 2) return null;
  return [parts[0].trim(), parts[1].trim()];
}

export function scoreEvent(eventName: string, teamName: string): number {
  const sides = splitEventSides(eventName);
  if (!sides) {
    return scoreTeamInName(eventName, teamName);
  }
  return Math.max(scoreTeamInName(sides[0], teamName), scoreTeamInName(sides[1], teamName));
}

function startTimeOf(event: ExchangeEvent): number {
  const time = Date.parse(event.openDate);
  return Number.isNaN(time) ? Number.POSITIVE_INFINITY : time;
}

/**
 * Best event for a team: highest score, then soonest start.
 * Null when there are no events or nothing scores at least 1.
 */
export function pickBestEvent(events: readonly ExchangeEvent[], teamName: string): ExchangeEvent | null {
  if (events.length === 0) return null;

  const scored = events.map((event) => ({
    event,
    score: scoreEvent(event.name, teamName),
    start: startTimeOf(event),
  }));

  scored.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    if (a.start === b.start) return 0;
    return a.start < b.start ? -1 : 1;
  });

  const best = scored[0];
  return best.score < 1 ? null : best.event;
}

/**
 * Which side of "Home v Away" a team plays on; home when undeterminable
 */
export function resolveTeamSide(eventName: string, teamName: string): TeamSide {
  const sides = splitEventSides(eventName, HOME_AWAY_SEPARATOR);
  if (!sides) return 'home';

  const home = scoreTeamInName(sides[0], teamName);
  const away = scoreTeamInName(sides[1], teamName);
  return home >= away ? 'home' : 'away';
}

/**
 * Side-specific code for the "to win to nil" market
 */
export function resolveWinToNilType(eventName: string, teamName: string): string {
  return resolveTeamSide(eventName, teamName) === 'home' ? TEAM_A_WIN_TO_NIL : TEAM_B_WIN_TO_NIL;
}

// ============================================================================
// MARKETS
// ============================================================================

/**
 * First catalogue entry; the exchange filter already narrows by type code
 */
export function pickBestMarket(catalogues: readonly MarketCatalogue[]): MarketCatalogue | null {
  return catalogues[0] ?? null;
}

// ============================================================================
// RUNNERS
// ============================================================================

export interface RunnerQuery {
  teamName: string;
  marketTypes: readonly string[];
  marketName: string;
  eventName: string;
}

function runnerKey(runner: ExchangeRunner): string {
  return runner.runnerName.toLowerCase().trim();
}

function findRunner(
  runners: readonly ExchangeRunner[],
  predicate: (name: string) => boolean
): ExchangeRunner | null {
  return runners.find((r) => predicate(runnerKey(r))) ?? null;
}

/**
 * Runner with the highest similarity to the team; first wins ties
 */
function mostSimilarRunner(runners: readonly ExchangeRunner[], team: string): ExchangeRunner | null {
  let best: ExchangeRunner | null = null;
  let bestScore = -1;
  for (const runner of runners) {
    const score = similarityRatio(team, runnerKey(runner));
    if (score > bestScore) {
      bestScore = score;
      best = runner;
    }
  }
  return best;
}

function halfTimeFullTimeRunner(runners: readonly ExchangeRunner[], query: RunnerQuery): ExchangeRunner | null {
  const team = query.teamName.toLowerCase().trim();
  const sides = splitEventSides(query.eventName, HOME_AWAY_SEPARATOR);
  const side = resolveTeamSide(query.eventName, query.teamName);

  let teamSide = team;
  let otherSide: string | null = null;
  if (sides) {
    const [home, away] = sides.map((s) => s.toLowerCase());
    teamSide = side === 'home' ? home : away;
    otherSide = side === 'home' ? away : home;
  }

  const candidates = [
    `${teamSide}/${teamSide}`,
    `${teamSide}/draw`,
    otherSide ? `${teamSide}/${otherSide}` : null,
    `draw/${teamSide}`,
    otherSide ? `${otherSide}/${teamSide}` : null,
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    const runner = findRunner(runners, (name) => name === candidate);
    if (runner) return runner;
  }
  return null;
}

function goalLineFromMarketName(marketName: string): string | null {
  const match = /over\s*(\d+(?:\.\d+)?)/.exec(marketName.toLowerCase());
  return match ? match[1] : null;
}

/**
 * Pick the runner that represents backing a team in a market.
 * Rules apply in order; each falls through when it finds nothing.
 * Null only when there are no runners.
 */
export function pickBestRunner(runners: readonly ExchangeRunner[], query: RunnerQuery): ExchangeRunner | null {
  if (runners.length === 0) return null;

  const team = query.teamName.toLowerCase().trim();
  const types = query.marketTypes;
  const hasType = (code: string) => types.includes(code);
  const hasTypeLike = (test: (code: string) => boolean) => types.some(test);

  // 1. half-time/full-time
  if (hasType('HALF_TIME_FULL_TIME')) {
    const runner = halfTimeFullTimeRunner(runners, query);
    if (runner) return runner;
  }

  // 2. match odds
  if (hasType('MATCH_ODDS')) {
    const runner = findRunner(runners, (name) => name === team) ?? mostSimilarRunner(runners, team);
    if (runner) return runner;
  }

  // 3. match odds and both teams to score
  if (hasType('MATCH_ODDS_AND_BTTS')) {
    const runner =
      findRunner(runners, (name) => name === `${team}/yes`) ??
      findRunner(runners, (name) => name.includes(team) && (name.includes('yes') || name.includes('over')));
    if (runner) return runner;
  }

  // 4. match odds and over/under
  if (hasTypeLike((code) => code.startsWith('MATCH_ODDS_AND_OU_'))) {
    const line = goalLineFromMarketName(query.marketName);
    const runner =
      (line ? findRunner(runners, (name) => name === `${team}/over ${line}`) : null) ??
      findRunner(runners, (name) => name.includes(team) && name.includes('over'));
    if (runner) return runner;
  }

  // 5. over/under goals, corners, first half goals
  if (
    hasTypeLike((code) => {
      const lower = code.toLowerCase();
      return code.startsWith('OVER_UNDER_') || lower.includes('cornr') || lower.includes('first_half_goals');
    })
  ) {
    const runner = findRunner(runners, (name) => name.includes('over'));
    if (runner) return runner;
  }

  // 6. win to nil
  if (hasType(TEAM_A_WIN_TO_NIL) || hasType(TEAM_B_WIN_TO_NIL)) {
    const runner = findRunner(runners, (name) => name === 'yes');
    if (runner) return runner;
  }

  // 7. generic
  return (
    findRunner(runners, (name) => name.includes('yes') || name.includes('over')) ??
    mostSimilarRunner(runners, team)
  );
}

/**
 * Runner for a correct-score prediction given from the team's side
 */
export function findCorrectScoreRunner(
  runners: readonly ExchangeRunner[],
  score: Score,
  side: TeamSide
): ExchangeRunner | null {
  const wanted = formatScoreRunnerName(score, side).toLowerCase();
  return findRunner(runners, (name) => name === wanted);
}
