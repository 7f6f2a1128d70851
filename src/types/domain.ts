/**
 * Stored entities. Field names follow the database columns; every
 * timestamp is a UTC instant already normalized by the clock service.
 */

export const GAME_STATUSES = ['scheduled', 'in_progress', 'final', 'postponed', 'canceled'] as const;
export type GameStatus = (typeof GAME_STATUSES)[number];

export interface WeekRecord {
  week_id: string;
  season_year: number;
  week_number: number;
  picks_deadline: Date;
  is_playoff: boolean;
  graded_at: Date | null;
  created_at: Date;
}

export interface GameRecord {
  game_id: string;
  week_id: string;
  external_id: string;
  home_team: string;
  away_team: string;
  kickoff_at: Date;
  status: GameStatus;
  home_score: number | null;
  away_score: number | null;
  favorite_team: string | null;
  /** Magnitude of the favorite's handicap; null until odds are imported. */
  spread_pts: number | null;
  /** Placeholder matchup (e.g. NFC @ AFC) awaiting resolution. */
  unresolved_team: boolean;
}

export interface ParticipantRecord {
  participant_id: string;
  external_id: string;
  display_name: string;
  created_at: Date;
}

export interface PickRecord {
  pick_id: string;
  participant_id: string;
  game_id: string;
  selected_team: string;
  created_at: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Props
// ─────────────────────────────────────────────────────────────────────────────

export const OUTCOME_DOMAINS = {
  OVER_UNDER: ['OVER', 'UNDER'],
  YES_NO: ['YES', 'NO'],
} as const;

export type OutcomeDomain = keyof typeof OUTCOME_DOMAINS;
export type PropOutcome = (typeof OUTCOME_DOMAINS)[OutcomeDomain][number];

export function isOutcomeInDomain(domain: OutcomeDomain, value: string): value is PropOutcome {
  const allowed: readonly string[] = OUTCOME_DOMAINS[domain];
  return allowed.includes(value);
}

export interface PropBetRecord {
  prop_id: string;
  week_id: string;
  description: string;
  outcome_domain: OutcomeDomain;
  result: PropOutcome | null;
}

export interface PropPickRecord {
  prop_pick_id: string;
  participant_id: string;
  prop_id: string;
  selection: PropOutcome;
  created_at: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Reminders
// ─────────────────────────────────────────────────────────────────────────────

export type ReminderKind = 'launch' | 'deadline' | 'results';

export interface ReminderClaim {
  participant_id: string;
  week_id: string;
  game_id: string | null;
  kind: ReminderKind;
}

// ─────────────────────────────────────────────────────────────────────────────
// Grading outcomes
// ─────────────────────────────────────────────────────────────────────────────

export type AtsOutcome = 'WIN' | 'LOSS' | 'PUSH' | 'UNDECIDED';
export type PropGrade = 'WIN' | 'LOSS' | 'UNGRADED';
