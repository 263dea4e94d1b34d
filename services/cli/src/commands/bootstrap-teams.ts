/**
 * teams:bootstrap - Seed teams.json from a fixture list
 *
 * Each line holds one fixture, "Home v Away" or "Away @ Home", optionally
 * followed by a kickoff time. New teams are keyed by their lowercased name;
 * a team already known by that name or alias keeps its record and gains
 * the name as an alias when missing.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { JsonFileStore, teamsFileSchema, type TeamsFile } from '@valuebet/db';

export interface FixtureTeams {
  home: string;
  away: string;
}

export type MergeAction = 'added' | 'aliased' | 'unchanged';

export interface MergeResult {
  teams: TeamsFile;
  added: number;
  aliased: number;
  skippedLines: number;
}

export interface BootstrapTeamsOptions {
  file: string;
  sport: string;
  dataPath: string;
}

export interface BootstrapTeamsResult {
  added: number;
  aliased: number;
  skippedLines: number;
  total: number;
  saved: boolean;
  durationMs: number;
}

/**
 * Strip kickoff times and trailing annotations from a team name.
 * Women's sides ending in "(W)" are kept whole.
 *
 * cleanTeamName('Chelsea  (20:00)') -> 'Chelsea'
 */
export function cleanTeamName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.endsWith('(W)')) return trimmed;
  return trimmed.split(/\s{2,}|\(/)[0].trim();
}

/**
 * Both team names of a fixture line, or null when it isn't one
 */
export function parseFixtureLine(line: string): FixtureTeams | null {
  let parts: string[];
  if (line.includes(' v ')) {
    parts = line.split(' v ');
  } else if (line.includes(' @')) {
    parts = line.split(' @ ');
  } else {
    return null;
  }
  if (parts.length !== 2) return null;

  const home = cleanTeamName(parts[0]);
  const away = cleanTeamName(parts[1]);
  if (!home || !away) return null;
  return { home, away };
}

/**
 * Add one team name to a teams file (mutates `teams`)
 */
export function mergeTeam(teams: TeamsFile, name: string, sport: string): MergeAction {
  const key = name.toLowerCase();

  for (const [canonical, record] of Object.entries(teams)) {
    const aliases = record.aliases.map((a) => a.toLowerCase());
    if (canonical.toLowerCase() !== key && !aliases.includes(key)) continue;

    if (aliases.includes(key)) return 'unchanged';
    record.aliases.push(key);
    return 'aliased';
  }

  teams[key] = { sport, aliases: [key] };
  return 'added';
}

/**
 * Merge every fixture line into a copy of `teams`
 */
export function mergeFixtureTeams(teams: TeamsFile, lines: readonly string[], sport: string): MergeResult {
  const result: MergeResult = { teams: structuredClone(teams), added: 0, aliased: 0, skippedLines: 0 };

  for (const line of lines) {
    if (!line.trim()) continue;

    const fixture = parseFixtureLine(line.trim());
    if (!fixture) {
      result.skippedLines++;
      continue;
    }

    for (const name of [fixture.home, fixture.away]) {
      const action = mergeTeam(result.teams, name, sport);
      if (action === 'added') result.added++;
      if (action === 'aliased') result.aliased++;
    }
  }

  return result;
}

/**
 * Run teams:bootstrap command
 */
export async function runBootstrapTeams(options: BootstrapTeamsOptions): Promise<BootstrapTeamsResult> {
  const { file, sport, dataPath } = options;
  const startTime = Date.now();
  console.log(`[teams:bootstrap] Reading fixtures from ${file} (sport=${sport})`);

  const text = await fs.readFile(file, 'utf-8');
  const store = new JsonFileStore(path.join(dataPath, 'teams.json'), teamsFileSchema, {
    label: '[teams]',
    sortKeys: true,
  });
  const existing = (await store.load()) ?? {};

  const merged = mergeFixtureTeams(existing, text.split(/\r?\n/), sport.toLowerCase());
  const saved = await store.save(merged.teams);

  const total = Object.keys(merged.teams).length;
  const durationMs = Date.now() - startTime;
  console.log(
    `[teams:bootstrap] added=${merged.added} aliased=${merged.aliased} skipped=${merged.skippedLines} ` +
      `total=${total} in ${durationMs}ms`
  );
  if (merged.skippedLines > 0) {
    console.warn(`[teams:bootstrap] ${merged.skippedLines} line(s) were not fixtures`);
  }

  return {
    added: merged.added,
    aliased: merged.aliased,
    skippedLines: merged.skippedLines,
    total,
    saved,
    durationMs,
  };
}
