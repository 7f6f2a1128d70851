/**
 * Zod schemas for the parts of ESPN's scoreboard payload the engine reads.
 * Unknown keys are stripped; anything optional in practice is optional here.
 */

import { z } from 'zod';

const teamSchema = z.object({
  abbreviation: z.string().optional(),
  displayName: z.string().optional(),
  shortDisplayName: z.string().optional(),
  name: z.string().optional(),
});

const competitorSchema = z.object({
  homeAway: z.enum(['home', 'away']),
  score: z.union([z.string(), z.number()]).optional(),
  team: teamSchema.optional(),
});

const teamOddsSchema = z.object({
  favorite: z.boolean().optional(),
});

const oddsSchema = z.object({
  details: z.string().optional(),
  spread: z.number().optional(),
  homeTeamOdds: teamOddsSchema.optional(),
  awayTeamOdds: teamOddsSchema.optional(),
});

const statusSchema = z.object({
  type: z
    .object({
      state: z.string().optional(),
      name: z.string().optional(),
      completed: z.boolean().optional(),
    })
    .optional(),
});

export const espnEventSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  date: z.string(),
  name: z.string().optional(),
  status: statusSchema.optional(),
  competitions: z
    .array(
      z.object({
        competitors: z.array(competitorSchema).default([]),
        odds: z.array(oddsSchema).optional(),
      }),
    )
    .default([]),
});

export const espnScoreboardSchema = z.object({
  season: z.object({ year: z.number().int(), type: z.number().int() }).optional(),
  week: z.object({ number: z.number().int() }).optional(),
  events: z.array(z.unknown()),
});

export type EspnEvent = z.infer<typeof espnEventSchema>;
export type EspnCompetitor = z.infer<typeof competitorSchema>;
export type EspnOdds = z.infer<typeof oddsSchema>;
export type EspnScoreboard = z.infer<typeof espnScoreboardSchema>;
