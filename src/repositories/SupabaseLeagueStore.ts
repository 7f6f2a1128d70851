/**
 * `LeagueStore` backed by Supabase (PostgREST + the SQL functions in
 * supabase/migrations).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { GameRepository } from './GameRepository';
import { ParticipantRepository } from './ParticipantRepository';
import { PickRepository } from './PickRepository';
import { PropRepository } from './PropRepository';
import { ReminderRepository } from './ReminderRepository';
import { WeekRepository } from './WeekRepository';
import type {
  GamePatch,
  GameScheduleInput,
  LeagueStore,
  NewPick,
  NewPropPick,
  NewWeek,
  PickInsertOutcome,
  PickOverride,
  WeekPatch,
} from './types';
import type {
  GameRecord,
  OutcomeDomain,
  ParticipantRecord,
  PickRecord,
  PropBetRecord,
  PropOutcome,
  PropPickRecord,
  ReminderClaim,
  WeekRecord,
} from '../types/domain';

export class SupabaseLeagueStore implements LeagueStore {
  private readonly weeks: WeekRepository;
  private readonly games: GameRepository;
  private readonly participants: ParticipantRepository;
  private readonly picks: PickRepository;
  private readonly props: PropRepository;
  private readonly reminders: ReminderRepository;

  constructor(supabase: SupabaseClient, legacyZone: string) {
    this.weeks = new WeekRepository(supabase, legacyZone);
    this.games = new GameRepository(supabase, legacyZone);
    this.participants = new ParticipantRepository(supabase, legacyZone);
    this.picks = new PickRepository(supabase, legacyZone);
    this.props = new PropRepository(supabase, legacyZone);
    this.reminders = new ReminderRepository(supabase, legacyZone);
  }

  // ─── Weeks ──────────────────────────────────────────────────────────

  findWeek(seasonYear: number, weekNumber: number): Promise<WeekRecord | null> {
    return this.weeks.findByKey(seasonYear, weekNumber);
  }

  getWeek(weekId: string): Promise<WeekRecord | null> {
    return this.weeks.findById(weekId);
  }

  listWeeks(seasonYear: number): Promise<WeekRecord[]> {
    return this.weeks.listBySeason(seasonYear);
  }

  latestSeasonYear(): Promise<number | null> {
    return this.weeks.latestSeasonYear();
  }

  createWeekIfAbsent(week: NewWeek): Promise<{ week: WeekRecord; created: boolean }> {
    return this.weeks.createIfAbsent(week);
  }

  updateWeek(weekId: string, patch: WeekPatch): Promise<WeekRecord> {
    return this.weeks.update(weekId, patch);
  }

  // ─── Games ──────────────────────────────────────────────────────────

  getGame(gameId: string): Promise<GameRecord | null> {
    return this.games.findById(gameId);
  }

  listGamesForWeek(weekId: string): Promise<GameRecord[]> {
    return this.games.listByWeek(weekId);
  }

  async listGamesForSeason(seasonYear: number): Promise<GameRecord[]> {
    const weeks = await this.weeks.listBySeason(seasonYear);
    return this.games.listByWeeks(weeks.map((week) => week.week_id));
  }

  upsertGame(weekId: string, game: GameScheduleInput): Promise<GameRecord> {
    return this.games.upsertByExternalId(weekId, game);
  }

  updateGame(gameId: string, patch: GamePatch): Promise<GameRecord> {
    return this.games.update(gameId, patch);
  }

  // ─── Participants ───────────────────────────────────────────────────

  ensureParticipant(externalId: string, displayName: string): Promise<ParticipantRecord> {
    return this.participants.ensure(externalId, displayName);
  }

  getParticipant(participantId: string): Promise<ParticipantRecord | null> {
    return this.participants.findById(participantId);
  }

  listParticipants(): Promise<ParticipantRecord[]> {
    return this.participants.list();
  }

  // ─── Picks ──────────────────────────────────────────────────────────

  insertPickIfOpen(pick: NewPick): Promise<PickInsertOutcome<PickRecord>> {
    return this.picks.submit(pick);
  }

  getPick(participantId: string, gameId: string): Promise<PickRecord | null> {
    return this.picks.find(participantId, gameId);
  }

  listPicksForGames(gameIds: readonly string[]): Promise<PickRecord[]> {
    return this.picks.listByGames(gameIds);
  }

  upsertPick(pick: PickOverride): Promise<PickRecord> {
    return this.picks.upsert(pick);
  }

  deletePicks(participantId: string, gameIds: readonly string[]): Promise<number> {
    return this.picks.deleteForGames(participantId, gameIds);
  }

  // ─── Props ──────────────────────────────────────────────────────────

  createProp(weekId: string, description: string, outcomeDomain: OutcomeDomain): Promise<PropBetRecord> {
    return this.props.create(weekId, description, outcomeDomain);
  }

  getProp(propId: string): Promise<PropBetRecord | null> {
    return this.props.findById(propId);
  }

  listPropsForWeek(weekId: string): Promise<PropBetRecord[]> {
    return this.props.listByWeek(weekId);
  }

  setPropResult(propId: string, result: PropOutcome | null): Promise<PropBetRecord> {
    return this.props.setResult(propId, result);
  }

  insertPropPickIfOpen(pick: NewPropPick): Promise<PickInsertOutcome<PropPickRecord>> {
    return this.props.submitPick(pick);
  }

  listPropPicksForProps(propIds: readonly string[]): Promise<PropPickRecord[]> {
    return this.props.listPicksByProps(propIds);
  }

  // ─── Reminders ──────────────────────────────────────────────────────

  claimReminder(claim: ReminderClaim): Promise<boolean> {
    return this.reminders.claim(claim);
  }
}
