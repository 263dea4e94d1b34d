import type { Score } from './types.js';

export const CORRECT_SCORE_MARKET = 'correct score';

const SCORE_PATTERN = /(\d+)-(\d+)/g;

export interface ScoreExtraction {
  scores: Score[];
  leftover: string[];
}

/**
 * Pull "H-A" correct-score predictions out of leftover tokens.
 * Each found score removes one token spelled exactly "H-A".
 *
 * ['2-1', 'or', '3-1'] -> scores [[2, 1], [3, 1]], leftover ['or']
 */
export function extractScores(tokens: readonly string[]): ScoreExtraction {
  const scores: Score[] = [];
  for (const match of tokens.join(' ').matchAll(SCORE_PATTERN)) {
    scores.push([Number(match[1]), Number(match[2])]);
  }

  const leftover = [...tokens];
  for (const [home, away] of scores) {
    const index = leftover.indexOf(`${home}-${away}`);
    if (index !== -1) {
      leftover.splice(index, 1);
    }
  }

  return { scores, leftover };
}

/**
 * Format a score the way exchange runners name it
 * Scores are given from the team's point of view; away teams flip them.
 *
 * formatScoreRunnerName([2, 1], 'away') -> "1 - 2"
 */
export function formatScoreRunnerName(score: Score, side: 'home' | 'away'): string {
  const [home, away] = side === 'away' ? [score[1], score[0]] : score;
  return `${home} - ${away}`;
}
