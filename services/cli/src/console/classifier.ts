/**
 * Console classification strategy
 *
 * Asks the user what an unresolved token is (team, player, market or
 * nothing), offers close matches for teams and markets, and creates new
 * entities on request. Invalid input yields 'retry'; the caller decides
 * how many times to ask again.
 */

import {
  closestKnownAliases,
  closestMatches,
  type ClassificationResult,
  type ClassificationStrategy,
  type EntityDirectory,
  type EntityKind,
} from '@valuebet/core';
import { parseList, type Prompter } from './prompt.js';

type CatalogKind = Exclude<EntityKind, 'player'>;

const SUGGESTION_LIMIT = 5;
const SUGGESTION_CUTOFF = 0.6;

export class ConsoleClassifier implements ClassificationStrategy {
  constructor(private readonly prompter: Prompter) {}

  async classify(token: string, directory: EntityDirectory, expected?: EntityKind): Promise<ClassificationResult> {
    const kind = expected ?? (await this.askKind(token));
    switch (kind) {
      case null:
        return { kind: 'retry', reason: 'Invalid choice, please select T/P/M/I.' };
      case 'ignore':
        return { kind: 'ignore' };
      case 'player':
        return this.addPlayer(token, directory);
      default:
        return this.classifyEntity(token, kind, directory);
    }
  }

  private async askKind(token: string): Promise<EntityKind | 'ignore' | null> {
    console.log(`Unrecognized token: '${token}'`);
    const answer = (await this.prompter.ask('Options: (T)eam/(P)layer/(M)arket/(I)gnore? ')).toLowerCase();
    switch (answer) {
      case 't':
        return 'team';
      case 'p':
        return 'player';
      case 'm':
        return 'market';
      case 'i':
        return 'ignore';
      default:
        return null;
    }
  }

  private async addPlayer(token: string, directory: EntityDirectory): Promise<ClassificationResult> {
    const name = token.toLowerCase().trim();
    const sport = (await this.prompter.ask(`Enter the sport for player '${token}': `)).toLowerCase();
    const team = await this.prompter.ask("Enter the player's team name or leave blank if none: ");
    const aliases = parseList(await this.prompter.ask('Enter aliases for this player (comma-separated) or leave blank: '));

    const created = await directory.addPlayer(name, sport, team || null, aliases);
    return { kind: created ? 'new' : 'existing', entity: 'player', name };
  }

  private async classifyEntity(token: string, kind: CatalogKind, directory: EntityDirectory): Promise<ClassificationResult> {
    const records = kind === 'team' ? directory.teams() : directory.markets();
    const alias = token.toLowerCase().trim();

    const candidates = [
      ...new Set(closestKnownAliases(alias, records, SUGGESTION_LIMIT, SUGGESTION_CUTOFF).map((s) => s.canonical)),
    ];

    if (candidates.length > 0) {
      console.log(`Close ${kind} matches found:`);
      candidates.forEach((name, i) => {
        const record = records[name];
        const type = kind === 'market' && 'type' in record ? `, Type: ${record.type ?? 'regular'}` : '';
        console.log(`${i + 1}. ${name} (Sport: ${record.sport || 'unknown sport'}${type})`);
      });

      const choice = (
        await this.prompter.ask(`Select a matching ${kind} by number, or (N)one to add as new ${kind}: `)
      ).toLowerCase();
      if (/^\d+$/.test(choice)) {
        const chosen = candidates[Number(choice) - 1];
        if (!chosen) {
          return { kind: 'retry', reason: 'Invalid choice number.' };
        }
        return this.attachAlias(kind, chosen, alias, directory);
      }
      if (choice !== 'n') {
        return { kind: 'retry', reason: 'Invalid choice, returning to main classification options.' };
      }
    } else {
      console.log(`No close ${kind} matches found.`);
    }

    const mode = (await this.prompter.ask(`No suitable match. Enter (M)anual ${kind} name or (N)ew ${kind}: `)).toLowerCase();
    if (mode === 'm') {
      const manualName = (await this.prompter.ask(`Type the canonical ${kind} name exactly: `)).toLowerCase();
      if (!manualName) {
        return { kind: 'retry', reason: `No ${kind} name given.` };
      }
      const [match] = closestMatches(manualName, Object.keys(records), 1, SUGGESTION_CUTOFF);
      if (match) {
        return this.attachAlias(kind, match.candidate, alias, directory);
      }
      return this.createEntity(kind, manualName, alias, directory);
    }

    return this.createEntity(kind, alias, alias, directory);
  }

  private async attachAlias(
    kind: CatalogKind,
    canonical: string,
    alias: string,
    directory: EntityDirectory
  ): Promise<ClassificationResult> {
    if (await directory.addAlias(kind, canonical, alias)) {
      console.log(`Added '${alias}' as an alias to existing ${kind} '${canonical}'.`);
    }
    return { kind: 'existing', entity: kind, name: canonical };
  }

  private async createEntity(
    kind: CatalogKind,
    name: string,
    token: string,
    directory: EntityDirectory
  ): Promise<ClassificationResult> {
    const sport = (await this.prompter.ask(`Enter the sport for ${kind} '${name}': `)).toLowerCase();
    const aliases = parseList(await this.prompter.ask(`Enter aliases for this ${kind} (comma-separated) or leave blank: `));
    if (token !== name && !aliases.includes(token)) {
      aliases.push(token);
    }

    const created =
      kind === 'team'
        ? await directory.addTeam(name, sport, aliases)
        : await directory.addMarket(name, sport, 'regular', aliases);
    if (!created) {
      return { kind: 'existing', entity: kind, name };
    }

    console.log(token === name ? `New ${kind} '${name}' added.` : `New ${kind} '${name}' added (with '${token}' as alias).`);
    return { kind: 'new', entity: kind, name };
  }
}
