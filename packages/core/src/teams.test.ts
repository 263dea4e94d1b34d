/**
 * Unit tests for team recognition
 * Run with: node --import tsx --test packages/core/src/teams.test.ts
 */
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { AliasDirectory } from './aliasDirectory.js';
import { findTeamsInSegment, removeTeamMatches } from './teams.js';

const aliases = AliasDirectory.build({
  'real madrid': { aliases: [] },
  madrid: { aliases: [] },
  'manchester united': { aliases: ['man utd', 'man united'] },
  chelsea: { aliases: ['cfc'] },
});

describe('findTeamsInSegment', () => {
  it('should prefer the longest span', () => {
    assert.deepStrictEqual(findTeamsInSegment('real madrid win', aliases), [
      { canonical: 'real madrid', matched: 'real madrid', start: 0, length: 2 },
    ]);
  });

  it('should still match the shorter alias elsewhere', () => {
    const matches = findTeamsInSegment('real madrid v madrid', aliases);
    assert.deepStrictEqual(
      matches.map((m) => [m.canonical, m.start]),
      [
        ['real madrid', 0],
        ['madrid', 3],
      ]
    );
  });

  it('should order matches by position, not by span length', () => {
    const matches = findTeamsInSegment('cfc v man utd', aliases);
    assert.deepStrictEqual(
      matches.map((m) => m.canonical),
      ['chelsea', 'manchester united']
    );
  });

  it('should resolve aliases to canonical names and keep the surface text', () => {
    const [match] = findTeamsInSegment('man utd to win', aliases);
    assert.strictEqual(match.canonical, 'manchester united');
    assert.strictEqual(match.matched, 'man utd');
  });

  it('should clean punctuation around tokens', () => {
    const matches = findTeamsInSegment('chelsea, man utd.', aliases);
    assert.deepStrictEqual(
      matches.map((m) => m.matched),
      ['chelsea', 'man utd']
    );
  });

  it('should return nothing for empty text or an empty directory', () => {
    assert.deepStrictEqual(findTeamsInSegment('', aliases), []);
    assert.deepStrictEqual(findTeamsInSegment('chelsea', AliasDirectory.build({})), []);
  });

  it('should give identical results on repeated runs', () => {
    const text = 'real madrid v madrid and man utd v chelsea';
    assert.deepStrictEqual(findTeamsInSegment(text, aliases), findTeamsInSegment(text, aliases));
  });
});

describe('removeTeamMatches', () => {
  it('should remove matched text and collapse whitespace', () => {
    const text = 'man utd v chelsea match odds';
    const matches = findTeamsInSegment(text, aliases);
    assert.strictEqual(removeTeamMatches(text, matches), 'v match odds');
  });

  it('should leave other words containing the name alone', () => {
    const text = 'madrid madridista';
    const matches = findTeamsInSegment(text, aliases);
    assert.strictEqual(removeTeamMatches(text, matches), 'madridista');
  });

  it('should keep a longer team intact when a shorter one comes first', () => {
    const text = 'madrid v real madrid match odds';
    const matches = findTeamsInSegment(text, aliases);
    assert.deepStrictEqual(
      matches.map((m) => m.canonical),
      ['madrid', 'real madrid']
    );
    assert.strictEqual(removeTeamMatches(text, matches), 'v match odds');
  });
});
