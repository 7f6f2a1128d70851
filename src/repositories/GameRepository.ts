/**
 * Game Repository
 *
 * Games are keyed by the provider's external id; schedule imports upsert on
 * it so re-running an import never duplicates a game.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { BaseRepository } from './BaseRepository';
import { gameRowSchema, type GameRow } from './rowSchemas';
import type { GamePatch, GameScheduleInput } from './types';
import type { GameRecord } from '../types/domain';

const GAME_COLUMNS =
  'game_id, week_id, external_id, home_team, away_team, kickoff_at, status, home_score, away_score, favorite_team, spread_pts, unresolved_team';

export class GameRepository extends BaseRepository {
  constructor(supabase: SupabaseClient, legacyZone: string) {
    super(supabase, legacyZone, 'gameRepository');
  }

  private toRecord(row: GameRow): GameRecord {
    return { ...row, kickoff_at: this.toInstant(row.kickoff_at) };
  }

  private toRecords(data: unknown): GameRecord[] {
    return this.parseRows(gameRowSchema, data, 'game')
      .map((row) => this.toRecord(row))
      .sort(
        (a, b) =>
          a.kickoff_at.getTime() - b.kickoff_at.getTime() ||
          (a.external_id < b.external_id ? -1 : a.external_id > b.external_id ? 1 : 0),
      );
  }

  async findById(gameId: string): Promise<GameRecord | null> {
    const { data, error } = await this.supabase
      .from('games')
      .select(GAME_COLUMNS)
      .eq('game_id', gameId)
      .maybeSingle();

    if (error) {
      throw this.wrapError('findById query error', error, { gameId });
    }
    return data ? this.toRecord(this.parseRow(gameRowSchema, data, 'game')) : null;
  }

  async listByWeek(weekId: string): Promise<GameRecord[]> {
    const { data, error } = await this.supabase.from('games').select(GAME_COLUMNS).eq('week_id', weekId);

    if (error) {
      throw this.wrapError('listByWeek query error', error, { weekId });
    }
    return this.toRecords(data);
  }

  async listByWeeks(weekIds: readonly string[]): Promise<GameRecord[]> {
    const rows = await this.selectAllIn(
      weekIds,
      (chunk, from, to) =>
        this.supabase
          .from('games')
          .select(GAME_COLUMNS)
          .in('week_id', chunk)
          .order('game_id', { ascending: true })
          .range(from, to),
      'listByWeeks query error',
      { weeks: weekIds.length },
    );
    return this.toRecords(rows);
  }

  async upsertByExternalId(weekId: string, game: GameScheduleInput): Promise<GameRecord> {
    const { data, error } = await this.supabase
      .from('games')
      .upsert(
        {
          week_id: weekId,
          external_id: game.external_id,
          home_team: game.home_team,
          away_team: game.away_team,
          kickoff_at: game.kickoff_at.toISOString(),
          status: game.status,
          unresolved_team: game.unresolved_team,
        },
        { onConflict: 'external_id' },
      )
      .select(GAME_COLUMNS)
      .single();

    if (error) {
      throw this.wrapError('upsertByExternalId error', error, { weekId, externalId: game.external_id });
    }
    return this.toRecord(this.parseRow(gameRowSchema, data, 'game'));
  }

  async update(gameId: string, patch: GamePatch): Promise<GameRecord> {
    const { kickoff_at: kickoffAt, ...rest } = patch;
    const values = kickoffAt === undefined ? rest : { ...rest, kickoff_at: kickoffAt.toISOString() };

    const { data, error } = await this.supabase
      .from('games')
      .update(values)
      .eq('game_id', gameId)
      .select(GAME_COLUMNS)
      .single();

    if (error) {
      throw this.wrapError('update error', error, { gameId });
    }
    return this.toRecord(this.parseRow(gameRowSchema, data, 'game'));
  }
}
