#!/usr/bin/env -S node --import tsx

import 'dotenv/config';
import { Command } from 'commander';
import { buildParserConfig, formatParserConfig, loadParserConfig, readConfigFile, type ParserConfig } from '@valuebet/core';
import { closeDirectory, getDirectory } from '@valuebet/db';
import { ExchangeAdapter, formatExchangeConfig, loadExchangeConfig } from './adapters/index.js';
import { ReadlinePrompter } from './console/prompt.js';
import {
  runBootstrapTeams,
  runDirectoryCheck,
  runEvaluate,
  runInteractive,
  runMarketsMap,
  runParse,
} from './commands/index.js';

const program = new Command();

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

/**
 * Parser config from --config / CONFIG_PATH and the environment
 */
function loadConfig(): ParserConfig {
  const opts = program.opts<GlobalOptions>();
  const env = { ...process.env };
  if (opts.verbose) env.VALUEBET_VERBOSE = 'true';

  const config = opts.config ? buildParserConfig(readConfigFile(opts.config) ?? {}, env) : loadParserConfig(env);
  if (config.verbose) {
    console.log(formatParserConfig(config));
  }
  return config;
}

function fail(label: string, error: unknown): never {
  console.error(`${label} error:`, error instanceof Error ? error.message : error);
  process.exit(1);
}

program
  .name('valuebet')
  .description('Interpret free-text bets and check them against exchange lay prices')
  .version('1.0.0')
  .option('-c, --config <path>', 'Config file (default: CONFIG_PATH or data/config.json)')
  .option('--verbose', 'Log parsing and selection steps');

// Interactive loop
program
  .command('interactive', { isDefault: true })
  .description('Enter bets one per line, classify unknown text and price them')
  .option('-s, --save-file <path>', 'Append saved lines to this file')
  .action(async (opts: { saveFile?: string }) => {
    try {
      const config = loadConfig();
      const exchangeConfig = loadExchangeConfig();
      if (config.verbose) console.log(formatExchangeConfig(exchangeConfig));

      await runInteractive({
        prompter: new ReadlinePrompter(),
        directory: await getDirectory(config.dataPath),
        config,
        provider: new ExchangeAdapter(exchangeConfig),
        saveFile: opts.saveFile,
      });
    } catch (error) {
      fail('Interactive', error);
    } finally {
      closeDirectory();
    }
  });

// One-shot evaluation
program
  .command('evaluate')
  .description('Price one bet, e.g. "bookie - football - chelsea to win - 2.6"')
  .argument('<bet>', 'Bet line')
  .option('-o, --odds <number>', 'Bookmaker odds when the line has none')
  .option('-b, --bookmaker <name>', 'Bookmaker for the saved line')
  .option('-s, --sport <sport>', 'Sport for the saved line')
  .option('--auto-alias', 'Attach unknown teams to a close known team')
  .action(async (bet: string, opts: { odds?: string; bookmaker?: string; sport?: string; autoAlias?: boolean }) => {
    try {
      const config = loadConfig();
      const result = await runEvaluate({
        bet,
        odds: opts.odds ? parseFloat(opts.odds) : undefined,
        bookmaker: opts.bookmaker,
        sport: opts.sport,
        autoAlias: opts.autoAlias,
        directory: await getDirectory(config.dataPath),
        config,
        provider: new ExchangeAdapter(loadExchangeConfig()),
      });
      if (result.outcome.status !== 'priced') {
        process.exitCode = 2;
      }
    } catch (error) {
      fail('Evaluate', error);
    } finally {
      closeDirectory();
    }
  });

// Parse only
program
  .command('parse')
  .description('Show how a bet line is recognized')
  .argument('<bet>', 'Bet text')
  .action(async (bet: string) => {
    try {
      const config = loadConfig();
      runParse({ bet, directory: await getDirectory(config.dataPath), config });
    } catch (error) {
      fail('Parse', error);
    } finally {
      closeDirectory();
    }
  });

// Seed teams.json from fixtures
program
  .command('teams:bootstrap')
  .description('Add teams from a fixture list ("Home v Away" or "Away @ Home" per line)')
  .requiredOption('-f, --file <path>', 'Fixture list')
  .option('-s, --sport <sport>', 'Sport of every team in the list', 'football')
  .option('-d, --data-path <path>', 'Data directory (default: from config)')
  .action(async (opts: { file: string; sport: string; dataPath?: string }) => {
    try {
      const config = loadConfig();
      const result = await runBootstrapTeams({
        file: opts.file,
        sport: opts.sport,
        dataPath: opts.dataPath || config.dataPath,
      });
      if (!result.saved) process.exit(1);
    } catch (error) {
      fail('Bootstrap', error);
    }
  });

// Directory health
program
  .command('directory:check')
  .description('Report alias conflicts and markets without a type mapping')
  .action(async () => {
    try {
      const config = loadConfig();
      const result = runDirectoryCheck({ directory: await getDirectory(config.dataPath), config });
      if (!result.ok) process.exitCode = 1;
    } catch (error) {
      fail('Directory check', error);
    } finally {
      closeDirectory();
    }
  });

// Market type mapping
program
  .command('markets:map')
  .description('Show exchange type codes for known markets')
  .option('-n, --name <market>', 'Map one market name')
  .option('-s, --sport <sport>', 'Sport to map for')
  .action(async (opts: { name?: string; sport?: string }) => {
    try {
      const config = loadConfig();
      runMarketsMap({ directory: await getDirectory(config.dataPath), config, name: opts.name, sport: opts.sport });
    } catch (error) {
      fail('Markets map', error);
    } finally {
      closeDirectory();
    }
  });

program.parseAsync().catch((error: unknown) => fail('CLI', error));
