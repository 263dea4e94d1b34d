/**
 * Unit tests for the bet parser
 * Run with: node --import tsx --test packages/core/src/parser.test.ts
 */
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { DEFAULT_PARSER_CONFIG } from './config.js';
import { MemoryEntityDirectory, type DirectoryData } from './directory.js';
import { BetParser } from './parser.js';
import type { ClassificationResult, ClassificationStrategy, TeamRecord } from './types.js';

const data: DirectoryData = {
  teams: {
    'manchester united': { sport: 'football', aliases: ['man utd', 'man united'] },
    chelsea: { sport: 'football', aliases: ['cfc'] },
    'real madrid': { sport: 'football', aliases: [] },
    madrid: { sport: 'football', aliases: [] },
    lakers: { sport: 'nba', aliases: ['la lakers'] },
  },
  markets: {
    'match odds': { sport: 'football', aliases: ['full time result'], type: 'MATCH_ODDS' },
    'correct score': { sport: 'football', aliases: ['cs'], type: 'CORRECT_SCORE' },
    'both teams to score': { sport: 'football', aliases: ['btts'], type: 'BOTH_TEAMS_TO_SCORE' },
    moneyline_nba: { sport: 'nba', aliases: ['moneyline'], type: 'MONEY_LINE' },
  },
};

function parser(): BetParser {
  return new BetParser(new MemoryEntityDirectory(data), DEFAULT_PARSER_CONFIG);
}

describe('BetParser.parse', () => {
  it('should recognize both teams and the market', async () => {
    const bet = await parser().parse('manchester united v chelsea match odds');
    assert.deepStrictEqual(bet, {
      teams: ['manchester united', 'chelsea'],
      markets: ['match odds'],
      scores: [],
      unrecognized: [],
    });
  });

  it('should resolve aliases and punctuation', async () => {
    const bet = await parser().parse("Man Utd v CFC - Full Time Result!");
    assert.deepStrictEqual(bet.teams, ['manchester united', 'chelsea']);
    assert.deepStrictEqual(bet.markets, ['match odds']);
    assert.deepStrictEqual(bet.unrecognized, ['-']);
  });

  it('should match the longest team name and treat "win" as match odds', async () => {
    const bet = await parser().parse('real madrid win');
    assert.deepStrictEqual(bet.teams, ['real madrid']);
    assert.deepStrictEqual(bet.markets, ['match odds']);
    assert.deepStrictEqual(bet.unrecognized, []);
  });

  it('should find the market after a short team named before a longer one', async () => {
    const bet = await parser().parse('madrid v real madrid match odds');
    assert.deepStrictEqual(bet, {
      teams: ['madrid', 'real madrid'],
      markets: ['match odds'],
      scores: [],
      unrecognized: [],
    });
  });

  it('should accept a market alias with a short suffix', async () => {
    const bet = await parser().parse('chelsea match odds ft');
    assert.deepStrictEqual(bet.markets, ['match odds']);
    assert.deepStrictEqual(bet.unrecognized, ['ft']);
  });

  it('should drop "to" along with "win"', async () => {
    const bet = await parser().parse('chelsea to win');
    assert.deepStrictEqual(bet.markets, ['match odds']);
    assert.deepStrictEqual(bet.unrecognized, []);
  });

  it('should detect correct scores and add the correct score market', async () => {
    const bet = await parser().parse('chelsea 2-1 or 3-1');
    assert.deepStrictEqual(bet.teams, ['chelsea']);
    assert.deepStrictEqual(bet.markets, ['correct score']);
    assert.deepStrictEqual(bet.scores, [
      [2, 1],
      [3, 1],
    ]);
    assert.deepStrictEqual(bet.unrecognized, []);
  });

  it('should ignore sport keywords before market recognition', async () => {
    const bet = await parser().parse('lakers nba moneyline');
    assert.deepStrictEqual(bet.teams, ['lakers']);
    assert.deepStrictEqual(bet.markets, ['moneyline_nba']);
    assert.deepStrictEqual(bet.unrecognized, []);
  });

  it('should report leftover text as one unrecognized fragment', async () => {
    const bet = await parser().parse('chelsea player to be booked');
    assert.deepStrictEqual(bet.markets, []);
    assert.deepStrictEqual(bet.unrecognized, ['player to be booked']);
  });

  it('should treat everything as unrecognized with an empty directory', async () => {
    const empty = new BetParser(new MemoryEntityDirectory(), DEFAULT_PARSER_CONFIG);
    const bet = await empty.parse('chelsea match odds');
    assert.deepStrictEqual(bet, {
      teams: [],
      markets: [],
      scores: [],
      unrecognized: ['chelsea match odds'],
    });
  });

  it('should return frozen results', async () => {
    const bet = await parser().parse('chelsea 1-0');
    assert.ok(Object.isFrozen(bet));
    assert.ok(Object.isFrozen(bet.teams));
    assert.ok(Object.isFrozen(bet.scores[0]));
  });

  it('should give the same result for the same text', async () => {
    const p = parser();
    const text = 'real madrid v madrid btts';
    assert.deepStrictEqual(await p.parse(text), await p.parse(text));
  });
});

describe('BetParser alias cache', () => {
  it('should pick up aliases added after the first parse', async () => {
    const directory = new MemoryEntityDirectory(data);
    const p = new BetParser(directory, DEFAULT_PARSER_CONFIG);

    assert.deepStrictEqual(p.recognize('blues to win').teams, []);
    assert.strictEqual(await directory.addAlias('team', 'chelsea', 'blues'), true);
    assert.deepStrictEqual(p.recognize('blues to win').teams, ['chelsea']);
  });
});

/**
 * Directory whose team list loses one team after the first read,
 * as if it were removed while a parse was running
 */
class DriftingDirectory extends MemoryEntityDirectory {
  private reads = 0;

  constructor(
    seed: DirectoryData,
    private readonly vanishing: string
  ) {
    super(seed);
  }

  override teams(): Readonly<Record<string, TeamRecord>> {
    this.reads++;
    const all = super.teams();
    if (this.reads === 1) return all;
    return Object.fromEntries(Object.entries(all).filter(([name]) => name !== this.vanishing));
  }
}

class ScriptedStrategy implements ClassificationStrategy {
  readonly calls: string[] = [];

  constructor(private readonly decide: (token: string, directory: MemoryEntityDirectory) => Promise<ClassificationResult>) {}

  async classify(token: string, directory: unknown): Promise<ClassificationResult> {
    this.calls.push(token);
    if (!(directory instanceof MemoryEntityDirectory)) {
      throw new Error('unexpected directory');
    }
    return this.decide(token, directory);
  }
}

describe('BetParser unknown teams', () => {
  const seed: DirectoryData = {
    teams: {
      'ghost fc': { sport: 'football', aliases: [] },
      chelsea: { sport: 'football', aliases: [] },
    },
    markets: {},
  };

  it('should ask the strategy and keep the team when it is ignored', async () => {
    const strategy = new ScriptedStrategy(async () => ({ kind: 'ignore' }));
    const p = new BetParser(new DriftingDirectory(seed, 'ghost fc'), DEFAULT_PARSER_CONFIG, strategy);

    const bet = await p.parse('ghost fc v chelsea');
    assert.deepStrictEqual(strategy.calls, ['ghost fc']);
    assert.deepStrictEqual(bet.teams, ['ghost fc', 'chelsea']);
  });

  it('should stop asking after the configured number of retries', async () => {
    const strategy = new ScriptedStrategy(async () => ({ kind: 'retry', reason: 'bad menu choice' }));
    const p = new BetParser(new DriftingDirectory(seed, 'ghost fc'), DEFAULT_PARSER_CONFIG, strategy);

    await p.parse('ghost fc v chelsea');
    assert.strictEqual(strategy.calls.length, DEFAULT_PARSER_CONFIG.maxClassificationAttempts);
  });

  it('should parse again from the top after the directory changes', async () => {
    const strategy = new ScriptedStrategy(async (_token, directory) => {
      await directory.addAlias('team', 'chelsea', 'the blues');
      return { kind: 'existing', entity: 'team', name: 'chelsea' };
    });
    const p = new BetParser(new DriftingDirectory(seed, 'ghost fc'), DEFAULT_PARSER_CONFIG, strategy);

    const bet = await p.parse('ghost fc v chelsea');
    assert.deepStrictEqual(strategy.calls, ['ghost fc']);
    assert.deepStrictEqual(bet.teams, ['chelsea']);
    assert.deepStrictEqual(bet.unrecognized, ['ghost fc']);
  });

  it('should return the recognition as-is without a strategy', async () => {
    const p = new BetParser(new DriftingDirectory(seed, 'ghost fc'), DEFAULT_PARSER_CONFIG);
    const bet = await p.parse('ghost fc v chelsea');
    assert.deepStrictEqual(bet.teams, ['ghost fc', 'chelsea']);
  });
});
