/**
 * Team recognition
 *
 * Greedy longest-match over whitespace tokens: every window length is tried
 * from the whole text down to a single token, scanning left to right, so the
 * longest alias at any position wins and matches never overlap.
 */

import type { AliasDirectory } from './aliasDirectory.js';
import { cleanToken, normalize, splitTokens } from './normalize.js';

export interface TeamMatch {
  /** Canonical team name */
  canonical: string;
  /** Surface text that matched, as it appears in the input */
  matched: string;
  /** Token index where the match starts */
  start: number;
  /** Number of tokens covered */
  length: number;
}

/**
 * Find teams mentioned in a normalized segment
 * Results are ordered by match start.
 */
export function findTeamsInSegment(segment: string, aliases: AliasDirectory): TeamMatch[] {
  const tokens = splitTokens(segment).map(cleanToken);
  const used = new Set<number>();
  const found: TeamMatch[] = [];

  for (let length = tokens.length; length >= 1; length--) {
    let i = 0;
    while (i + length <= tokens.length) {
      if (overlapsUsed(used, i, length)) {
        i++;
        continue;
      }

      const candidate = tokens.slice(i, i + length).join(' ');
      const canonical = aliases.canonicalOf(normalize(candidate));

      if (canonical !== null) {
        found.push({ canonical, matched: candidate, start: i, length });
        for (let x = 0; x < length; x++) {
          used.add(i + x);
        }
        i += length;
      } else {
        i++;
      }
    }
  }

  return found.sort((a, b) => a.start - b.start);
}

function overlapsUsed(used: Set<number>, start: number, length: number): boolean {
  for (let x = 0; x < length; x++) {
    if (used.has(start + x)) return true;
  }
  return false;
}

/**
 * Segment text without the tokens covered by a match.
 * Works on token positions, so a short team's name inside a longer
 * team's span is never removed on its own.
 *
 * removeTeamMatches('madrid v real madrid odds', matches) -> 'v odds'
 */
export function removeTeamMatches(segment: string, matches: readonly TeamMatch[]): string {
  const covered = new Set<number>();
  for (const match of matches) {
    for (let x = 0; x < match.length; x++) {
      covered.add(match.start + x);
    }
  }
  return splitTokens(segment)
    .filter((_, i) => !covered.has(i))
    .join(' ');
}
