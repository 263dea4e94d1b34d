/**
 * parse - Show how a bet line is recognized, without prices
 */

import {
  BetParser,
  parseBetLine,
  prepareBetText,
  type EntityDirectory,
  type ParsedBet,
  type ParserConfig,
} from '@valuebet/core';

export interface ParseOptions {
  bet: string;
  directory: EntityDirectory;
  config: ParserConfig;
}

/**
 * Run parse command
 */
export function runParse(options: ParseOptions): ParsedBet {
  const line = parseBetLine(options.bet);
  const text = prepareBetText(line.betText);
  const parsed = new BetParser(options.directory, options.config).recognize(text);

  console.log(`[parse] Input: "${text}"`);
  console.log(JSON.stringify(parsed, null, 2));
  return parsed;
}
