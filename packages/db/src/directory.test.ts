/**
 * Unit tests for the JSON-backed entity directory
 * Run with: node --import tsx --test packages/db/src/directory.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { closeDirectory, getDirectory } from './client.js';
import { JsonEntityDirectory } from './directory.js';

describe('JsonEntityDirectory', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'valuebet-directory-'));
  });

  afterEach(() => {
    closeDirectory();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, value: unknown): void {
    fs.writeFileSync(path.join(dir, name), JSON.stringify(value));
  }

  function readJson(name: string): unknown {
    return JSON.parse(fs.readFileSync(path.join(dir, name), 'utf-8'));
  }

  it('should open an empty data path', async () => {
    const directory = await JsonEntityDirectory.open(dir);
    assert.deepStrictEqual(directory.teams(), {});
    assert.deepStrictEqual(directory.markets(), {});
    assert.strictEqual(directory.version, 0);
  });

  it('should load existing files', async () => {
    writeJson('teams.json', { chelsea: { sport: 'football', aliases: ['cfc'] } });
    writeJson('markets.json', { 'match odds': { sport: 'football', aliases: ['mo'], type: 'MATCH_ODDS' } });

    const directory = await JsonEntityDirectory.open(dir);
    assert.strictEqual(directory.findTeamByAlias('CFC'), 'chelsea');
    assert.strictEqual(directory.findMarketByAlias('mo'), 'match odds');
    assert.deepStrictEqual(directory.players(), {});
  });

  it('should keep other files when one is invalid', async () => {
    writeJson('teams.json', ['chelsea']);
    writeJson('markets.json', { 'match odds': { sport: 'football', aliases: [] } });

    const directory = await JsonEntityDirectory.open(dir);
    assert.deepStrictEqual(directory.teams(), {});
    assert.deepStrictEqual(Object.keys(directory.markets()), ['match odds']);
  });

  it('should write every file after a change', async () => {
    writeJson('teams.json', { chelsea: { sport: 'football', aliases: [] } });
    const directory = await JsonEntityDirectory.open(dir);

    await directory.addAlias('team', 'chelsea', 'The Blues');
    await directory.addPlayer('Cole Palmer', 'football', 'chelsea');

    assert.deepStrictEqual(readJson('teams.json'), {
      chelsea: { sport: 'football', aliases: ['the blues'], players: ['cole palmer'] },
    });
    assert.deepStrictEqual(readJson('players.json'), {
      'cole palmer': { sport: 'football', team: 'chelsea', aliases: [] },
    });
    assert.deepStrictEqual(readJson('markets.json'), {});
  });

  it('should share one instance per data path', async () => {
    const first = await getDirectory(dir);
    assert.strictEqual(await getDirectory(dir), first);

    closeDirectory();
    assert.notStrictEqual(await getDirectory(dir), first);
  });
});
