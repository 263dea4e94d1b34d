/**
 * In-process stand-ins for the console and the exchange, used by tests
 */

import type { ExchangeEvent, MarketCatalogue, MarketDataProvider } from '@valuebet/core';
import type { Prompter } from '../console/prompt.js';

/**
 * Prompter answering from a script; running out of answers is an error
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`unexpected question: ${question}`);
    return answer;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * One football fixture, Arsenal v Chelsea, with a match odds market.
 * Chelsea lays at `chelseaLay`; nothing else is offered.
 */
export class FakeMarketData implements MarketDataProvider {
  readonly eventQueries: string[] = [];

  constructor(private readonly chelseaLay = 2.5) {}

  async findEvents(teamQuery: string): Promise<ExchangeEvent[]> {
    this.eventQueries.push(teamQuery);
    const event = { id: 'e1', name: 'Arsenal v Chelsea', openDate: '2026-10-25T15:00:00.000Z' };
    return event.name.toLowerCase().includes(teamQuery.toLowerCase()) ? [event] : [];
  }

  async listMarketCatalogue(eventId: string, typeCodes: readonly string[]): Promise<MarketCatalogue[]> {
    if (eventId !== 'e1' || !typeCodes.includes('MATCH_ODDS')) return [];
    return [
      {
        marketId: 'm1',
        marketName: 'Match Odds',
        runners: [
          { selectionId: 1, runnerName: 'Arsenal' },
          { selectionId: 2, runnerName: 'Chelsea' },
          { selectionId: 3, runnerName: 'The Draw' },
        ],
      },
    ];
  }

  async bestLayPrice(marketId: string, selectionId: number): Promise<number | null> {
    return marketId === 'm1' && selectionId === 2 ? this.chelseaLay : null;
  }
}
