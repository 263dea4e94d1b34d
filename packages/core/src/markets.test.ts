/**
 * Unit tests for market recognition
 * Run with: node --import tsx --test packages/core/src/markets.test.ts
 */
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import {
  buildMarketCandidates,
  findSequence,
  reduceMarkets,
  removeAliasTokens,
  stripFillerWords,
} from './markets.js';
import { splitTokens } from './normalize.js';

const fillerWords = new Set(['and', 'or', 'the', 'a', 'an', 'v']);

describe('buildMarketCandidates', () => {
  it('should include the canonical name after the declared aliases', () => {
    assert.deepStrictEqual(buildMarketCandidates({ 'match odds': { aliases: ['Full Time Result'] } }), [
      { canonical: 'match odds', rawAlias: 'Full Time Result', normalizedAlias: 'full time result' },
      { canonical: 'match odds', rawAlias: 'match odds', normalizedAlias: 'match odds' },
    ]);
  });

  it('should not duplicate a canonical name already listed', () => {
    const candidates = buildMarketCandidates({ btts: { aliases: ['btts'] } });
    assert.strictEqual(candidates.length, 1);
  });
});

describe('findSequence', () => {
  it('should find a contiguous run', () => {
    assert.strictEqual(findSequence(['team', 'wins', 'the', 'match'], ['the', 'match']), 2);
  });

  it('should return -1 when absent or out of order', () => {
    assert.strictEqual(findSequence(['the', 'x', 'match'], ['the', 'match']), -1);
    assert.strictEqual(findSequence(['match', 'the'], ['the', 'match']), -1);
    assert.strictEqual(findSequence(['a'], []), -1);
  });
});

describe('removeAliasTokens', () => {
  it('should remove a contiguous match', () => {
    assert.deepStrictEqual(removeAliasTokens(['btts', 'over', '2.5', 'goals'], ['over', '2.5', 'goals']), ['btts']);
  });

  it('should fall back to token-bag removal', () => {
    assert.deepStrictEqual(removeAliasTokens(['goals', '2.5', 'x', 'over'], ['over', '2.5', 'goals']), ['x']);
  });

  it('should remove each alias token only once', () => {
    assert.deepStrictEqual(removeAliasTokens(['odds', 'x', 'odds'], ['odds', 'match']), ['x', 'odds']);
  });
});

describe('stripFillerWords', () => {
  it('should drop filler words', () => {
    assert.deepStrictEqual(stripFillerWords(['v', 'match', 'and', 'odds'], fillerWords), ['match', 'odds']);
  });
});

describe('reduceMarkets', () => {
  const candidates = buildMarketCandidates({
    'match odds': { aliases: [] },
    'both teams to score': { aliases: ['btts'] },
    'draw no bet': { aliases: ['dnb'] },
  });

  it('should consume an exact alias', () => {
    assert.deepStrictEqual(reduceMarkets('v match odds', candidates, { threshold: 80, fillerWords }), {
      markets: ['match odds'],
      leftover: [],
      iterations: 1,
    });
  });

  it('should accept a close match and leave the rest', () => {
    assert.deepStrictEqual(reduceMarkets('match odds x', candidates, { threshold: 80, fillerWords }), {
      markets: ['match odds'],
      leftover: ['x'],
      iterations: 1,
    });
  });

  it('should consume one market per pass', () => {
    assert.deepStrictEqual(reduceMarkets('btts dnb', candidates, { threshold: 50, fillerWords }), {
      markets: ['both teams to score', 'draw no bet'],
      leftover: [],
      iterations: 2,
    });
  });

  it('should stop below the threshold without consuming anything', () => {
    assert.deepStrictEqual(reduceMarkets('player to be booked', candidates, { threshold: 80, fillerWords }), {
      markets: [],
      leftover: ['player', 'to', 'be', 'booked'],
      iterations: 1,
    });
  });

  it('should stop when a match consumes no tokens', () => {
    assert.deepStrictEqual(reduceMarkets('matchodds', candidates, { threshold: 80, fillerWords }), {
      markets: ['match odds'],
      leftover: ['matchodds'],
      iterations: 1,
    });
  });

  it('should stop on filler-only or one-character leftovers', () => {
    assert.deepStrictEqual(reduceMarkets('and the v', candidates, { threshold: 80, fillerWords }), {
      markets: [],
      leftover: [],
      iterations: 0,
    });
    assert.deepStrictEqual(reduceMarkets('x', candidates, { threshold: 80, fillerWords }), {
      markets: [],
      leftover: ['x'],
      iterations: 0,
    });
  });

  it('should never take more passes than entry tokens', () => {
    const inputs = [
      'match match match odds odds odds',
      'odds match odds match btts btts dnb dnb',
      'matchodds match odds matchodds',
      'a a a a a a a a',
      'btts btts btts btts btts',
      'dnb v dnb and dnb or dnb',
      'x y z match odds btts draw no bet q',
    ];
    for (const threshold of [0, 1, 50, 80, 100]) {
      for (const input of inputs) {
        const result = reduceMarkets(input, candidates, { threshold, fillerWords });
        assert.ok(
          result.iterations <= splitTokens(input).length,
          `"${input}" at ${threshold}: ${result.iterations} passes`
        );
      }
    }
  });

  it('should terminate with a zero threshold and no candidates', () => {
    const result = reduceMarkets('anything goes here', [], { threshold: 0, fillerWords });
    assert.deepStrictEqual(result.markets, []);
    assert.strictEqual(result.iterations, 1);
  });
});
