/**
 * interactive - Console loop for entering and pricing bets
 *
 * Each line is parsed, unknown text can be classified on the spot (which
 * updates the directory and triggers a re-parse), the bet is priced on the
 * exchange, and VALUE/2PC bets can be saved as a formatted line.
 */

import * as fs from 'node:fs/promises';
import {
  BetEvaluator,
  BetParser,
  classifyWithRetry,
  parseBetLine,
  parseOdds,
  prepareBetText,
  type BetLine,
  type EntityDirectory,
  type EvaluationOutcome,
  type MarketDataProvider,
  type ParsedBet,
  type ParserConfig,
} from '@valuebet/core';
import { ConsoleClassifier } from '../console/classifier.js';
import type { Prompter } from '../console/prompt.js';
import { isWorthSaving, printOutcome, printParsed, savedLineFor } from './outcome.js';

const QUIT_WORDS = new Set(['quit', 'exit']);

export interface InteractiveOptions {
  prompter: Prompter;
  directory: EntityDirectory;
  config: ParserConfig;
  provider: MarketDataProvider;
  /** Saved lines are appended here when set */
  saveFile?: string;
}

export interface BetRecord {
  input: string;
  line: BetLine;
  odds: number;
  parsed: ParsedBet;
  outcome: EvaluationOutcome | null;
}

export interface InteractiveResult {
  bets: BetRecord[];
  savedLines: string[];
}

type SegmentAction = 'select' | 'ignore' | 'done' | 'quit';

function toSegmentAction(answer: string): SegmentAction | null {
  switch (answer.toLowerCase()) {
    case 's':
      return 'select';
    case 'i':
      return 'ignore';
    case 'd':
      return 'done';
    case 'q':
      return 'quit';
    default:
      return null;
  }
}

export class InteractiveSession {
  private readonly parser: BetParser;
  private readonly evaluator: BetEvaluator;
  private readonly classifier: ConsoleClassifier;
  private readonly result: InteractiveResult = { bets: [], savedLines: [] };

  constructor(private readonly options: InteractiveOptions) {
    this.classifier = new ConsoleClassifier(options.prompter);
    this.parser = new BetParser(options.directory, options.config, this.classifier);
    this.evaluator = new BetEvaluator(options.provider, options.directory, options.config);
  }

  private get prompter(): Prompter {
    return this.options.prompter;
  }

  async run(): Promise<InteractiveResult> {
    for (;;) {
      const input = await this.prompter.ask("Enter a bet (or 'quit' to exit): ");
      if (QUIT_WORDS.has(input.trim().toLowerCase())) break;
      if (!input.trim()) continue;

      try {
        await this.processLine(input);
      } catch (err) {
        console.error(`[interactive] Failed to process "${input}": ${err instanceof Error ? err.message : err}`);
      }
    }
    return this.result;
  }

  async processLine(input: string): Promise<BetRecord> {
    const line = parseBetLine(input);
    if (line.warning) {
      console.log(`Warning: ${line.warning}.`);
    }
    if (line.explicit) {
      console.log(`Detected format: bookmaker=${line.bookmaker}, sport=${line.sport}, odds=${line.odds}`);
    }

    const odds = line.odds ?? (await this.askOdds());
    const text = prepareBetText(line.betText);

    let parsed = await this.parser.parse(text);
    printParsed(parsed);

    if (parsed.unrecognized.length > 0) {
      parsed = await this.handleUnrecognized(text, parsed);
    }

    const record: BetRecord = { input, line, odds, parsed, outcome: null };
    this.result.bets.push(record);

    const outcome = await this.evaluator.evaluate(parsed, odds);
    record.outcome = outcome;
    printOutcome(outcome);

    if (!line.explicit && isWorthSaving(outcome)) {
      const answer = await this.prompter.ask('Do you want to save this bet? (y/n): ');
      if (answer.toLowerCase() === 'y') {
        const bookmaker = line.bookmaker || (await this.prompter.ask('Enter the bookmaker name: '));
        await this.save(savedLineFor(line, odds, outcome, bookmaker, this.options.config.primarySport));
      }
    }

    return record;
  }

  /**
   * Ask until the answer is a positive decimal
   */
  async askOdds(): Promise<number> {
    for (;;) {
      const odds = parseOdds(await this.prompter.ask('Enter odds (must be a positive decimal): '));
      if (odds !== null) return odds;
      console.log('Invalid odds. Please enter a positive decimal number.');
    }
  }

  /**
   * Let the user classify parts of each unrecognized fragment.
   * Re-parses when the directory changed, unless the user quit.
   */
  async handleUnrecognized(text: string, parsed: ParsedBet): Promise<ParsedBet> {
    const { directory, config } = this.options;
    const startVersion = directory.version;

    for (const segment of parsed.unrecognized) {
      console.log(`Unrecognized text: '${segment}'`);

      for (let done = false; !done; ) {
        const action = toSegmentAction(
          await this.prompter.ask('Select action: (S)elect substring/(I)gnore remainder/(D)one/(Q)uit handling: ')
        );

        switch (action) {
          case 'select': {
            const substring = (await this.prompter.ask('Enter the substring to classify: ')).trim();
            if (!substring) {
              console.log('No substring entered.');
              break;
            }
            if (!segment.includes(substring.toLowerCase())) {
              console.log(`'${substring}' is not part of '${segment}'.`);
              break;
            }
            const result = await classifyWithRetry(this.classifier, substring, directory, {
              maxAttempts: config.maxClassificationAttempts,
            });
            if (result.kind !== 'ignore') {
              console.log(`'${substring}' is now known as ${result.entity} '${result.name}'.`);
            }
            break;
          }
          case 'ignore':
          case 'done':
            done = true;
            break;
          case 'quit':
            console.log('Stopped handling unrecognized text.');
            return parsed;
          case null:
            console.log('Invalid choice, please select S/I/D/Q.');
            break;
        }
      }
    }

    if (directory.version === startVersion) {
      return parsed;
    }

    const reparsed = await this.parser.parse(text);
    console.log('Parsed after re-parsing:');
    printParsed(reparsed);
    return reparsed;
  }

  private async save(savedLine: string): Promise<void> {
    this.result.savedLines.push(savedLine);
    console.log(`Saved line: ${savedLine}`);

    const file = this.options.saveFile;
    if (!file) return;
    try {
      await fs.appendFile(file, savedLine + '\n', 'utf-8');
    } catch (err) {
      console.error(`[interactive] Failed to append to ${file}: ${err instanceof Error ? err.message : err}`);
    }
  }
}

/**
 * Run interactive command
 */
export async function runInteractive(options: InteractiveOptions): Promise<InteractiveResult> {
  console.log('[interactive] Enter bets as "bookmaker - sport - bet - odds" or just the bet text.');
  try {
    return await new InteractiveSession(options).run();
  } finally {
    options.prompter.close();
  }
}
