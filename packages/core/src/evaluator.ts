/**
 * Bet Evaluator
 *
 * Prices a parsed bet on the exchange and classifies it against the
 * bettor's odds. Teams are priced one after another in recognition order;
 * the first team without an event or a price stops the whole bet.
 */

import type { ParserConfig } from './config.js';
import type { EntityDirectory, ExchangeEvent, MarketDataProvider, ParsedBet, Score, ValueDecision } from './types.js';
import { defaultMarketForSport, mapMarketNameToType, WIN_TO_NIL_MARKET } from './marketMapping.js';
import { classifyValue, combinePrices, multiplyPrices } from './pricing.js';
import {
  findCorrectScoreRunner,
  pickBestEvent,
  pickBestMarket,
  pickBestRunner,
  resolveTeamSide,
  resolveWinToNilType,
} from './selection.js';

export interface PricedLeg {
  team: string;
  sport: string;
  market: string;
  typeCodes: string[];
  eventId: string;
  eventName: string;
  marketId: string;
  /** Runner names priced for this leg */
  runners: string[];
  price: number;
}

export type EvaluationOutcome =
  | {
      status: 'priced';
      legs: PricedLeg[];
      /** Product of leg prices, unrounded */
      rawProduct: number;
      /** Product rounded for display */
      aggregatedPrice: number;
      decision: ValueDecision;
      /** Sport shared by every team, or null when they differ */
      sport: string | null;
    }
  | {
      status: 'aborted';
      reason: string;
      legs: PricedLeg[];
    }
  | {
      status: 'empty';
      reason: string;
    };

interface LegPrice {
  marketId: string;
  typeCodes: string[];
  runners: string[];
  price: number;
}

export class BetEvaluator {
  constructor(
    private readonly provider: MarketDataProvider,
    private readonly directory: EntityDirectory,
    private readonly config: ParserConfig
  ) {}

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[evaluate] ${message}`);
    }
  }

  /**
   * Sport of a team from the directory, primary sport when unknown
   */
  sportOf(team: string): string {
    return this.directory.teams()[team]?.sport?.toLowerCase() || this.config.primarySport;
  }

  private sportIdFor(sport: string): string {
    return (
      this.config.sportEventTypeIds[sport] ??
      this.config.sportEventTypeIds[this.config.primarySport] ??
      '1'
    );
  }

  /**
   * Markets requested for a team: those of its sport, or its sport's default
   */
  compatibleMarkets(markets: readonly string[], sport: string): string[] {
    const records = this.directory.markets();
    const compatible = markets.filter((m) => records[m]?.sport?.toLowerCase() === sport);
    return compatible.length > 0 ? compatible : [defaultMarketForSport(sport, this.config)];
  }

  async evaluate(parsed: ParsedBet, odds: number): Promise<EvaluationOutcome> {
    if (parsed.teams.length === 0) {
      return { status: 'empty', reason: 'No lay prices found or no valid bets parsed.' };
    }

    const teamSports = new Map(parsed.teams.map((t) => [t, this.sportOf(t)]));
    const sports = new Set(teamSports.values());
    const sharedSport = sports.size === 1 ? [...sports][0] : null;

    let markets = [...parsed.markets];
    if (markets.length === 0 && sharedSport) {
      markets = [defaultMarketForSport(sharedSport, this.config)];
      this.log(`No markets identified, defaulting to: ${markets[0]}`);
    }

    const seenEvents = new Set<string>();
    const legs: PricedLeg[] = [];

    for (const team of parsed.teams) {
      const sport = teamSports.get(team) ?? this.config.primarySport;
      const candidates = this.compatibleMarkets(markets, sport);

      const events = await this.provider.findEvents(team, this.sportIdFor(sport));
      const event = pickBestEvent(events, team);
      if (!event) {
        return { status: 'aborted', reason: `No suitable event found for team '${team}'.`, legs };
      }
      this.log(`Selected Event: '${event.name}' (ID=${event.id}, Start=${event.openDate})`);

      if (seenEvents.has(event.id)) {
        this.log(`Skipping duplicate match for event ${event.id}.`);
        continue;
      }
      seenEvents.add(event.id);

      let priced: { market: string; leg: LegPrice } | null = null;
      for (const market of candidates) {
        const leg = await this.priceLegForEvent(team, market, sport, event, parsed.scores);
        if (leg) {
          priced = { market, leg };
          break;
        }
      }

      if (!priced) {
        return {
          status: 'aborted',
          reason: `Could not find a suitable lay price for the given team/market: ${team}/${candidates[0]}`,
          legs,
        };
      }

      legs.push({
        team,
        sport,
        market: priced.market,
        typeCodes: priced.leg.typeCodes,
        eventId: event.id,
        eventName: event.name,
        marketId: priced.leg.marketId,
        runners: priced.leg.runners,
        price: priced.leg.price,
      });
    }

    if (legs.length === 0) {
      return { status: 'empty', reason: 'No lay prices found or no valid bets parsed.' };
    }

    const product = multiplyPrices(legs.map((l) => l.price));
    return {
      status: 'priced',
      legs,
      rawProduct: product.raw,
      aggregatedPrice: product.rounded,
      decision: classifyValue(product.raw, odds),
      sport: sharedSport,
    };
  }

  /**
   * Price one team/market pair within an already selected event.
   * Null when the market, a runner or a price is missing.
   */
  async priceLegForEvent(
    team: string,
    market: string,
    sport: string,
    event: ExchangeEvent,
    scores: readonly Score[]
  ): Promise<LegPrice | null> {
    let typeCodes = mapMarketNameToType(market, sport, this.config);
    if (market.trim().toLowerCase() === WIN_TO_NIL_MARKET) {
      typeCodes = [resolveWinToNilType(event.name, team)];
    }

    const catalogues = await this.provider.listMarketCatalogue(event.id, typeCodes);
    const catalogue = pickBestMarket(catalogues);
    if (!catalogue) {
      this.log(`No suitable market found for '${market}' in event ${event.name}.`);
      return null;
    }
    this.log(`Selected Market: '${catalogue.marketName}' (ID=${catalogue.marketId})`);

    if (catalogue.runners.length === 0) {
      this.log(`No runners in market ${catalogue.marketId}.`);
      return null;
    }

    if (typeCodes.includes('CORRECT_SCORE') && scores.length > 0) {
      const side = resolveTeamSide(event.name, team);
      const prices: number[] = [];
      const runners: string[] = [];

      for (const score of scores) {
        const runner = findCorrectScoreRunner(catalogue.runners, score, side);
        if (!runner) {
          this.log(`No runner for score ${score[0]}-${score[1]} in correct score market.`);
          continue;
        }
        const price = await this.provider.bestLayPrice(catalogue.marketId, runner.selectionId);
        if (price === null) {
          this.log(`No lay price for ${runner.runnerName}.`);
          continue;
        }
        this.log(`Best Lay Price for ${runner.runnerName}: ${price}`);
        prices.push(price);
        runners.push(runner.runnerName);
      }

      const combined = combinePrices(prices);
      if (combined === null) return null;
      this.log(`Combined correct score price (rounded up): ${combined}`);
      return { marketId: catalogue.marketId, typeCodes, runners, price: combined };
    }

    const runner = pickBestRunner(catalogue.runners, {
      teamName: team,
      marketTypes: typeCodes,
      marketName: market,
      eventName: event.name,
    });
    if (!runner) return null;
    this.log(`Selected Runner: '${runner.runnerName}' (SelectionId=${runner.selectionId})`);

    const price = await this.provider.bestLayPrice(catalogue.marketId, runner.selectionId);
    if (price === null) {
      this.log(`No lay price for runner ${runner.selectionId} in market ${catalogue.marketId}.`);
      return null;
    }
    return { marketId: catalogue.marketId, typeCodes, runners: [runner.runnerName], price };
  }
}
