/**
 * Unit tests for the in-memory entity directory
 * Run with: node --import tsx --test packages/core/src/directory.test.ts
 */
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { MemoryEntityDirectory, USER_MARKET_DESCRIPTION } from './directory.js';

function directory(): MemoryEntityDirectory {
  return new MemoryEntityDirectory({
    teams: { chelsea: { sport: 'football', aliases: ['cfc'] } },
  });
}

describe('MemoryEntityDirectory', () => {
  it('should copy its input', () => {
    const teams = { chelsea: { sport: 'football', aliases: ['cfc'] } };
    const dir = new MemoryEntityDirectory({ teams });
    teams.chelsea.aliases.push('blues');
    assert.deepStrictEqual(dir.teams()['chelsea'].aliases, ['cfc']);
  });

  it('should find entities by name or alias', () => {
    const dir = directory();
    assert.strictEqual(dir.findTeamByAlias(' CFC '), 'chelsea');
    assert.strictEqual(dir.findTeamByAlias('Chelsea'), 'chelsea');
    assert.strictEqual(dir.findTeamByAlias('arsenal'), null);
  });

  it('should add teams once and bump the version', async () => {
    const dir = directory();
    assert.strictEqual(await dir.addTeam('Arsenal ', 'football', ['Gunners']), true);
    assert.strictEqual(await dir.addTeam('arsenal', 'football'), false);
    assert.strictEqual(dir.version, 1);
    assert.deepStrictEqual(dir.teams()['arsenal'], { sport: 'football', aliases: ['gunners'] });
  });

  it('should add markets with their own name as an alias', async () => {
    const dir = directory();
    assert.strictEqual(await dir.addMarket('Over 2.5 Goals', 'football', 'OVER_UNDER_25'), true);
    assert.deepStrictEqual(dir.markets()['over 2.5 goals'], {
      sport: 'football',
      aliases: ['over 2.5 goals'],
      type: 'OVER_UNDER_25',
      description: USER_MARKET_DESCRIPTION,
    });
  });

  it('should link players to their team', async () => {
    const dir = directory();
    assert.strictEqual(await dir.addPlayer('Cole Palmer', 'football', 'Chelsea'), true);
    assert.deepStrictEqual(dir.players()['cole palmer'], { sport: 'football', team: 'chelsea', aliases: [] });
    assert.deepStrictEqual(dir.teams()['chelsea'].players, ['cole palmer']);
  });

  it('should add new aliases only', async () => {
    const dir = directory();
    assert.strictEqual(await dir.addAlias('team', 'chelsea', 'The Blues'), true);
    assert.strictEqual(await dir.addAlias('team', 'chelsea', 'the blues'), false);
    assert.strictEqual(await dir.addAlias('team', 'chelsea', 'Chelsea'), false);
    assert.strictEqual(await dir.addAlias('team', 'arsenal', 'gunners'), false);
    assert.deepStrictEqual(dir.teams()['chelsea'].aliases, ['cfc', 'the blues']);
    assert.strictEqual(dir.version, 1);
  });

  it('should snapshot a copy', async () => {
    const dir = directory();
    const snapshot = dir.snapshot();
    await dir.addAlias('team', 'chelsea', 'blues');
    assert.deepStrictEqual(snapshot.teams['chelsea'].aliases, ['cfc']);
    assert.deepStrictEqual(snapshot.markets, {});
  });
});
