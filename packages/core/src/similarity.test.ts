/**
 * Unit tests for similarity helpers
 * Run with: node --import tsx --test packages/core/src/similarity.test.ts
 */
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { closestMatches, longestCommonSubsequence, similarityRatio } from './similarity.js';

describe('similarityRatio', () => {
  it('should return 100 for identical strings', () => {
    assert.strictEqual(similarityRatio('match odds', 'match odds'), 100);
  });

  it('should return 100 for two empty strings', () => {
    assert.strictEqual(similarityRatio('', ''), 100);
  });

  it('should return 0 against an empty string', () => {
    assert.strictEqual(similarityRatio('abc', ''), 0);
  });

  it('should count a substitution as a deletion plus an insertion', () => {
    const ratio = similarityRatio('abc', 'abd');
    assert.ok(Math.abs(ratio - 200 / 3) < 1e-9, `got ${ratio}`);
  });

  it('should scale by the combined length', () => {
    const ft = similarityRatio('match odds ft', 'match odds');
    assert.ok(Math.abs(ft - 2000 / 23) < 1e-9, `got ${ft}`);
    assert.strictEqual(ft.toFixed(2), '86.96');

    const score = similarityRatio('correct score 2-1', 'correct score');
    assert.strictEqual(score.toFixed(2), '86.67');
  });

  it('should be symmetric', () => {
    assert.strictEqual(similarityRatio('chelsea', 'chelsey fc'), similarityRatio('chelsey fc', 'chelsea'));
  });
});

describe('longestCommonSubsequence', () => {
  it('should count shared characters in order', () => {
    assert.strictEqual(longestCommonSubsequence('gunners', 'pensioners'), 5);
    assert.strictEqual(longestCommonSubsequence('pensioners', 'gunners'), 5);
  });

  it('should return 0 against an empty string', () => {
    assert.strictEqual(longestCommonSubsequence('', 'abc'), 0);
  });
});

describe('closestMatches', () => {
  it('should keep only candidates above the cutoff', () => {
    const matches = closestMatches('chelsey', ['arsenal', 'chelsea', 'chelsea fc'], 5, 0.75);
    assert.deepStrictEqual(matches.map((m) => m.candidate), ['chelsea']);
    assert.ok(Math.abs(matches[0].score - 6 / 7) < 1e-9);
  });

  it('should order best first and keep input order on ties', () => {
    const matches = closestMatches('abcd', ['abcx', 'abcy', 'abcd']);
    assert.deepStrictEqual(matches.map((m) => m.candidate), ['abcd', 'abcx', 'abcy']);
  });

  it('should respect the limit', () => {
    const matches = closestMatches('abcd', ['abcx', 'abcy', 'abcd'], 2);
    assert.deepStrictEqual(matches.map((m) => m.candidate), ['abcd', 'abcx']);
  });

  it('should return nothing for no candidates', () => {
    assert.deepStrictEqual(closestMatches('abcd', []), []);
  });
});
