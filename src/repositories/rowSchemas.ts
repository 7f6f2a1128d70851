/**
 * Row shapes as returned by PostgREST. Timestamps arrive as strings and
 * numerics may arrive as strings; repositories convert them to records.
 */

import { z } from 'zod';
import { GAME_STATUSES } from '../types/domain';

const timestamp = z.string().min(1);
const nullableNumber = z.union([z.number(), z.string()]).nullable().transform((val, ctx) => {
  if (val === null) return null;
  const num = Number(val);
  if (!Number.isFinite(num)) {
    ctx.addIssue({ code: 'custom', message: `Not a number: ${val}` });
    return z.NEVER;
  }
  return num;
});

export const weekRowSchema = z.object({
  week_id: z.string(),
  season_year: z.number().int(),
  week_number: z.number().int(),
  picks_deadline: timestamp,
  is_playoff: z.boolean(),
  graded_at: timestamp.nullable(),
  created_at: timestamp,
});

export const gameRowSchema = z.object({
  game_id: z.string(),
  week_id: z.string(),
  external_id: z.string(),
  home_team: z.string(),
  away_team: z.string(),
  kickoff_at: timestamp,
  status: z.enum(GAME_STATUSES),
  home_score: nullableNumber,
  away_score: nullableNumber,
  favorite_team: z.string().nullable(),
  spread_pts: nullableNumber,
  unresolved_team: z.boolean(),
});

export const participantRowSchema = z.object({
  participant_id: z.string(),
  external_id: z.string(),
  display_name: z.string(),
  created_at: timestamp,
});

export const pickRowSchema = z.object({
  pick_id: z.string(),
  participant_id: z.string(),
  game_id: z.string(),
  selected_team: z.string(),
  created_at: timestamp,
});

export const propBetRowSchema = z.object({
  prop_id: z.string(),
  week_id: z.string(),
  description: z.string(),
  outcome_domain: z.enum(['OVER_UNDER', 'YES_NO']),
  result: z.enum(['OVER', 'UNDER', 'YES', 'NO']).nullable(),
});

export const propPickRowSchema = z.object({
  prop_pick_id: z.string(),
  participant_id: z.string(),
  prop_id: z.string(),
  selection: z.enum(['OVER', 'UNDER', 'YES', 'NO']),
  created_at: timestamp,
});

export function submissionSchema<T>(record: z.ZodType<T>) {
  return z.discriminatedUnion('status', [
    z.object({ status: z.literal('inserted'), record }),
    z.object({ status: z.literal('deadline_passed') }),
    z.object({ status: z.literal('duplicate') }),
    z.object({ status: z.literal('unknown_target') }),
    z.object({ status: z.literal('unknown_participant') }),
  ]);
}

export type WeekRow = z.infer<typeof weekRowSchema>;
export type GameRow = z.infer<typeof gameRowSchema>;
export type ParticipantRow = z.infer<typeof participantRowSchema>;
export type PickRow = z.infer<typeof pickRowSchema>;
export type PropBetRow = z.infer<typeof propBetRowSchema>;
export type PropPickRow = z.infer<typeof propPickRowSchema>;
