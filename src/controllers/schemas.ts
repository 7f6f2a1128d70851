/**
 * Request Validation Schemas
 *
 * Zod schemas for every endpoint's path parameters and request body.
 * Schemas are idempotent (parsing already-parsed data yields the same
 * value) because the route guard and the controller both parse.
 */

import { z } from 'zod';
import { JOB_NAMES, LAST_WEEK_NUMBER } from '../constants/jobs';

// ─────────────────────────────────────────────────────────────────────────────
// Shared primitives
// ─────────────────────────────────────────────────────────────────────────────

/** Canonical UUID v1-v5 pattern. */
const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export const uuidString = z.string().regex(UUID_REGEX, 'Must be a valid UUID');

const nonEmptyString = z.string().trim().min(1);

const seasonYear = z.coerce.number().int().min(1920).max(2200);
const weekNumber = z.coerce.number().int().min(1).max(LAST_WEEK_NUMBER);

const outcomeDomain = z.enum(['OVER_UNDER', 'YES_NO']);

// ─────────────────────────────────────────────────────────────────────────────
// Path parameter schemas
// ─────────────────────────────────────────────────────────────────────────────

export const gameIdParams = z.object({
  gameId: uuidString,
});

export const weekIdParams = z.object({
  weekId: uuidString,
});

export const atsResultParams = z.object({
  gameId: uuidString,
  participantId: uuidString,
});

export const seasonParams = z.object({
  seasonYear,
});

export const seasonWeekParams = z.object({
  seasonYear,
  weekNumber,
});

export const seasonWeekParticipantParams = z.object({
  seasonYear,
  weekNumber,
  participantId: uuidString,
});

export const gameParticipantParams = z.object({
  gameId: uuidString,
  participantId: uuidString,
});

export const weekParticipantParams = z.object({
  weekId: uuidString,
  participantId: uuidString,
});

export const jobNameParams = z.object({
  jobName: z.enum(JOB_NAMES),
});

// ─────────────────────────────────────────────────────────────────────────────
// Body schemas
// ─────────────────────────────────────────────────────────────────────────────

export const registerParticipantBody = z.object({
  external_id: nonEmptyString.max(128),
  display_name: nonEmptyString.max(64),
});

export const submitPickBody = z.object({
  participant_id: uuidString,
  game_id: uuidString,
  team: nonEmptyString.max(64),
});

export const overridePickBody = z.object({
  team: nonEmptyString.max(64),
});

export const submitPropPickBody = z.object({
  participant_id: uuidString,
  prop_id: uuidString,
  selection: nonEmptyString.max(16),
});

export const createPropBody = z.object({
  description: nonEmptyString.max(280),
  outcome_domain: outcomeDomain,
});

/** prop_id → declared outcome; validated against each prop's domain later. */
export const propResultsBody = z.object({
  results: z.record(uuidString, nonEmptyString.max(16)),
});

export const adjustDeadlineBody = z.object({
  picks_deadline: z.iso.datetime({ offset: true }),
});

export const resolveTeamsBody = z.object({
  home_team: nonEmptyString.max(64),
  away_team: nonEmptyString.max(64),
});

