/**
 * Persistent store contract used by the engine.
 *
 * Uniqueness is enforced by the store, not assumed by callers:
 *   weeks        (season_year, week_number)
 *   games        (external_id)
 *   participants (external_id)
 *   picks        (participant_id, game_id)
 *   prop_picks   (participant_id, prop_id)
 *   reminders    (participant_id, week_id, game_id, kind)
 *
 * Every write touches a single entity so a failed batch leaves what was
 * already written valid.
 */

import type {
  GameRecord,
  GameStatus,
  OutcomeDomain,
  ParticipantRecord,
  PickRecord,
  PropBetRecord,
  PropOutcome,
  PropPickRecord,
  ReminderClaim,
  WeekRecord,
} from '../types/domain';

export interface NewWeek {
  season_year: number;
  week_number: number;
  picks_deadline: Date;
  is_playoff: boolean;
}

export interface GameScheduleInput {
  external_id: string;
  home_team: string;
  away_team: string;
  kickoff_at: Date;
  status: GameStatus;
  unresolved_team: boolean;
}

export type GamePatch = Partial<
  Pick<
    GameRecord,
    | 'home_team'
    | 'away_team'
    | 'kickoff_at'
    | 'status'
    | 'home_score'
    | 'away_score'
    | 'favorite_team'
    | 'spread_pts'
    | 'unresolved_team'
  >
>;

export type WeekPatch = Partial<Pick<WeekRecord, 'picks_deadline' | 'graded_at'>>;

/** Outcome of the single conditional insert behind pick submission. */
export type PickInsertOutcome<T> =
  | { status: 'inserted'; record: T }
  | { status: 'deadline_passed' }
  | { status: 'duplicate' }
  | { status: 'unknown_target' }
  | { status: 'unknown_participant' };

export interface NewPick {
  participant_id: string;
  game_id: string;
  selected_team: string;
  /** Instant the deadline is evaluated against, from the clock service. */
  now: Date;
}

export interface PickOverride {
  participant_id: string;
  game_id: string;
  selected_team: string;
}

export interface NewPropPick {
  participant_id: string;
  prop_id: string;
  selection: PropOutcome;
  now: Date;
}

export interface LeagueStore {
  // Weeks
  findWeek(seasonYear: number, weekNumber: number): Promise<WeekRecord | null>;
  getWeek(weekId: string): Promise<WeekRecord | null>;
  /** Ordered by week_number ascending. */
  listWeeks(seasonYear: number): Promise<WeekRecord[]>;
  latestSeasonYear(): Promise<number | null>;
  /** Insert-if-absent keyed by (season_year, week_number). */
  createWeekIfAbsent(week: NewWeek): Promise<{ week: WeekRecord; created: boolean }>;
  updateWeek(weekId: string, patch: WeekPatch): Promise<WeekRecord>;

  // Games
  getGame(gameId: string): Promise<GameRecord | null>;
  /** Ordered by kickoff, then external id. */
  listGamesForWeek(weekId: string): Promise<GameRecord[]>;
  listGamesForSeason(seasonYear: number): Promise<GameRecord[]>;
  /** Upsert keyed by external_id. */
  upsertGame(weekId: string, game: GameScheduleInput): Promise<GameRecord>;
  updateGame(gameId: string, patch: GamePatch): Promise<GameRecord>;

  // Participants
  ensureParticipant(externalId: string, displayName: string): Promise<ParticipantRecord>;
  getParticipant(participantId: string): Promise<ParticipantRecord | null>;
  listParticipants(): Promise<ParticipantRecord[]>;

  // Picks
  /** Atomic: inserts only if kickoff is after `now` and no pick exists. */
  insertPickIfOpen(pick: NewPick): Promise<PickInsertOutcome<PickRecord>>;
  getPick(participantId: string, gameId: string): Promise<PickRecord | null>;
  listPicksForGames(gameIds: readonly string[]): Promise<PickRecord[]>;
  /** Unconditional upsert keyed by (participant_id, game_id). */
  upsertPick(pick: PickOverride): Promise<PickRecord>;
  /** Number of picks removed. */
  deletePicks(participantId: string, gameIds: readonly string[]): Promise<number>;

  // Props
  createProp(weekId: string, description: string, outcomeDomain: OutcomeDomain): Promise<PropBetRecord>;
  getProp(propId: string): Promise<PropBetRecord | null>;
  listPropsForWeek(weekId: string): Promise<PropBetRecord[]>;
  setPropResult(propId: string, result: PropOutcome | null): Promise<PropBetRecord>;
  /** Atomic: inserts only if the week's picks deadline is after `now`. */
  insertPropPickIfOpen(pick: NewPropPick): Promise<PickInsertOutcome<PropPickRecord>>;
  listPropPicksForProps(propIds: readonly string[]): Promise<PropPickRecord[]>;

  // Reminders
  /** True when this call recorded the reminder; false if it already existed. */
  claimReminder(claim: ReminderClaim): Promise<boolean>;
}
