/**
 * Unit tests for the JSON file store
 * Run with: node --import tsx --test packages/db/src/store.test.ts
 */
import { describe, it, before, after } from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { teamsFileSchema, type TeamsFile } from './schemas.js';
import { JsonFileStore, sortByKey } from './store.js';

describe('JsonFileStore', () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'valuebet-store-'));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function store(name: string, sortKeys = false): JsonFileStore<TeamsFile> {
    return new JsonFileStore(path.join(dir, name), teamsFileSchema, { label: '[test]', optional: true, sortKeys });
  }

  it('should load a missing file as null', async () => {
    assert.strictEqual(await store('missing.json').load(), null);
  });

  it('should load malformed JSON as null', async () => {
    fs.writeFileSync(path.join(dir, 'broken.json'), '{ "chelsea": ');
    assert.strictEqual(await store('broken.json').load(), null);
  });

  it('should load records of the wrong shape as null', async () => {
    fs.writeFileSync(path.join(dir, 'shape.json'), JSON.stringify({ chelsea: { sport: 1 } }));
    assert.strictEqual(await store('shape.json').load(), null);
  });

  it('should fill in missing fields', async () => {
    fs.writeFileSync(path.join(dir, 'partial.json'), JSON.stringify({ chelsea: { aliases: ['cfc'] } }));
    assert.deepStrictEqual(await store('partial.json').load(), { chelsea: { sport: '', aliases: ['cfc'] } });
  });

  it('should write sorted keys when asked', async () => {
    const target = store(path.join('nested', 'sorted.json'), true);
    const ok = await target.save({ wolves: { sport: 'football', aliases: [] }, arsenal: { sport: 'football', aliases: [] } });

    assert.strictEqual(ok, true);
    const text = fs.readFileSync(target.filePath, 'utf-8');
    assert.deepStrictEqual(Object.keys(JSON.parse(text)), ['arsenal', 'wolves']);
    assert.ok(text.endsWith('}\n'));
  });

  it('should report failed writes', async () => {
    fs.writeFileSync(path.join(dir, 'blocker'), '');
    const ok = await store(path.join('blocker', 'teams.json')).save({});
    assert.strictEqual(ok, false);
  });
});

describe('sortByKey', () => {
  it('should order keys', () => {
    assert.deepStrictEqual(Object.keys(sortByKey({ b: 1, c: 2, a: 3 })), ['a', 'b', 'c']);
  });
});
