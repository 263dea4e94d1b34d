/**
 * Market recognition
 *
 * Iterative fuzzy reduction: each pass compares the whole leftover text
 * against every market alias, accepts the best one above the threshold and
 * removes its tokens. One market per pass, no backtracking.
 *
 * The loop stops when nothing meaningful remains, when the best score is
 * below threshold, or when a pass consumes nothing. Every accepted pass
 * removes at least one token, so passes never exceed the entry token count;
 * that count is also enforced as a hard cap.
 */

import type { MarketRecord } from './types.js';
import { normalize, splitTokens } from './normalize.js';
import { similarityRatio } from './similarity.js';

export interface MarketCandidate {
  canonical: string;
  rawAlias: string;
  normalizedAlias: string;
}

export interface MarketReduction {
  /** Canonical market names, in acceptance order, without duplicates */
  markets: string[];
  /** Tokens left after reduction and filler removal */
  leftover: string[];
  /** Scoring passes performed */
  iterations: number;
}

export interface MarketReductionOptions {
  threshold: number;
  fillerWords: ReadonlySet<string>;
}

/**
 * Every (canonical, alias) pair for a market directory.
 * The canonical name is always included as an alias.
 */
export function buildMarketCandidates(
  markets: Readonly<Record<string, Pick<MarketRecord, 'aliases'>>>
): MarketCandidate[] {
  const candidates: MarketCandidate[] = [];

  for (const [canonical, record] of Object.entries(markets)) {
    const aliases = [...(record.aliases ?? [])];
    if (!aliases.includes(canonical)) {
      aliases.push(canonical);
    }
    for (const rawAlias of aliases) {
      candidates.push({ canonical, rawAlias, normalizedAlias: normalize(rawAlias) });
    }
  }

  return candidates;
}

/**
 * Start index of a contiguous token sequence, or -1
 *
 * findSequence(['team', 'wins', 'the', 'match'], ['the', 'match']) -> 2
 */
export function findSequence(haystack: readonly string[], needle: readonly string[]): number {
  if (needle.length === 0) return -1;

  for (let i = 0; i + needle.length <= haystack.length; i++) {
    let hit = true;
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) {
        hit = false;
        break;
      }
    }
    if (hit) return i;
  }
  return -1;
}

export function stripFillerWords(tokens: readonly string[], fillerWords: ReadonlySet<string>): string[] {
  return tokens.filter((t) => !fillerWords.has(t));
}

/**
 * Remove matched alias tokens: contiguous run first, then token-bag
 */
export function removeAliasTokens(tokens: readonly string[], aliasTokens: readonly string[]): string[] {
  const normalizedTokens = tokens.map(normalize);
  const normalizedAlias = aliasTokens.map(normalize);

  const index = findSequence(normalizedTokens, normalizedAlias);
  if (index !== -1) {
    return [...tokens.slice(0, index), ...tokens.slice(index + aliasTokens.length)];
  }

  const remaining = [...normalizedAlias];
  const kept: string[] = [];
  for (const token of tokens) {
    const pos = remaining.indexOf(normalize(token));
    if (pos !== -1) {
      remaining.splice(pos, 1);
    } else {
      kept.push(token);
    }
  }
  return kept;
}

/**
 * Best-scoring candidate for a text; first seen wins ties.
 * A zero score never wins.
 */
export function bestMarketCandidate(
  text: string,
  candidates: readonly MarketCandidate[]
): { candidate: MarketCandidate; score: number } | null {
  let best: MarketCandidate | null = null;
  let bestScore = 0;

  for (const candidate of candidates) {
    const score = similarityRatio(text, candidate.normalizedAlias);
    if (score > bestScore) {
      bestScore = score;
      best = candidate;
    }
  }

  return best ? { candidate: best, score: bestScore } : null;
}

export function reduceMarkets(
  leftoverText: string,
  candidates: readonly MarketCandidate[],
  options: MarketReductionOptions
): MarketReduction {
  const markets: string[] = [];
  let tokens = splitTokens(leftoverText);
  const maxIterations = tokens.length;
  let iterations = 0;

  while (tokens.length > 0 && iterations < maxIterations) {
    tokens = stripFillerWords(tokens, options.fillerWords);
    if (tokens.length === 0) break;

    const text = tokens.join(' ');
    if (text.length < 2) break;

    iterations++;
    const best = bestMarketCandidate(text, candidates);
    if (!best || best.score < options.threshold) break;

    if (!markets.includes(best.candidate.canonical)) {
      markets.push(best.candidate.canonical);
    }

    const next = removeAliasTokens(tokens, splitTokens(best.candidate.rawAlias.toLowerCase()));
    if (next.join(' ') === text) break;
    tokens = next;
  }

  return {
    markets,
    leftover: stripFillerWords(tokens, options.fillerWords),
    iterations,
  };
}
