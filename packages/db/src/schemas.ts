import { z } from 'zod';

/**
 * On-disk shapes of the directory files.
 * Fields missing from hand-edited files get their empty defaults.
 */

export const teamRecordSchema = z.object({
  sport: z.string().default(''),
  aliases: z.array(z.string()).default([]),
  players: z.array(z.string()).optional(),
});

export const marketRecordSchema = z.object({
  sport: z.string().default(''),
  aliases: z.array(z.string()).default([]),
  type: z.string().optional(),
  description: z.string().optional(),
});

export const playerRecordSchema = z.object({
  sport: z.string().default(''),
  team: z.string().nullable().default(null),
  aliases: z.array(z.string()).default([]),
});

export const teamsFileSchema = z.record(teamRecordSchema);
export const marketsFileSchema = z.record(marketRecordSchema);
export const playersFileSchema = z.record(playerRecordSchema);

export type TeamsFile = z.infer<typeof teamsFileSchema>;
export type MarketsFile = z.infer<typeof marketsFileSchema>;
export type PlayersFile = z.infer<typeof playersFileSchema>;
