/**
 * Pick Repository
 *
 * Submission goes through the `submit_pick` database function, which runs
 * the deadline check and the insert as one statement.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { BaseRepository } from './BaseRepository';
import { pickRowSchema, submissionSchema, type PickRow } from './rowSchemas';
import type { NewPick, PickInsertOutcome, PickOverride } from './types';
import type { PickRecord } from '../types/domain';

const PICK_COLUMNS = 'pick_id, participant_id, game_id, selected_team, created_at';
const pickSubmissionSchema = submissionSchema(pickRowSchema);

export class PickRepository extends BaseRepository {
  constructor(supabase: SupabaseClient, legacyZone: string) {
    super(supabase, legacyZone, 'pickRepository');
  }

  private toRecord(row: PickRow): PickRecord {
    return { ...row, created_at: this.toInstant(row.created_at) };
  }

  async submit(pick: NewPick): Promise<PickInsertOutcome<PickRecord>> {
    const { data, error } = await this.supabase.rpc('submit_pick', {
      p_participant_id: pick.participant_id,
      p_game_id: pick.game_id,
      p_selected_team: pick.selected_team,
      p_now: pick.now.toISOString(),
    });

    if (error) {
      throw this.wrapError('submit_pick rpc error', error, {
        participantId: pick.participant_id,
        gameId: pick.game_id,
      });
    }

    const outcome = this.parseRow(pickSubmissionSchema, data, 'pick submission');
    if (outcome.status === 'inserted') {
      return { status: 'inserted', record: this.toRecord(outcome.record) };
    }
    return outcome;
  }

  async find(participantId: string, gameId: string): Promise<PickRecord | null> {
    const { data, error } = await this.supabase
      .from('picks')
      .select(PICK_COLUMNS)
      .eq('participant_id', participantId)
      .eq('game_id', gameId)
      .maybeSingle();

    if (error) {
      throw this.wrapError('find query error', error, { participantId, gameId });
    }
    return data ? this.toRecord(this.parseRow(pickRowSchema, data, 'pick')) : null;
  }

  /** Administrative write: no deadline check, replaces any existing pick. */
  async upsert(pick: PickOverride): Promise<PickRecord> {
    const { data, error } = await this.supabase
      .from('picks')
      .upsert(
        {
          participant_id: pick.participant_id,
          game_id: pick.game_id,
          selected_team: pick.selected_team,
        },
        { onConflict: 'participant_id,game_id' },
      )
      .select(PICK_COLUMNS)
      .single();

    if (error) {
      throw this.wrapError('upsert error', error, { participantId: pick.participant_id, gameId: pick.game_id });
    }
    return this.toRecord(this.parseRow(pickRowSchema, data, 'pick'));
  }

  async deleteForGames(participantId: string, gameIds: readonly string[]): Promise<number> {
    if (gameIds.length === 0) return 0;
    const { data, error } = await this.supabase
      .from('picks')
      .delete()
      .eq('participant_id', participantId)
      .in('game_id', [...gameIds])
      .select('pick_id');

    if (error) {
      throw this.wrapError('deleteForGames error', error, { participantId, games: gameIds.length });
    }
    return Array.isArray(data) ? data.length : 0;
  }

  /** Paged, so pools past PostgREST's row cap still count every pick. */
  async listByGames(gameIds: readonly string[]): Promise<PickRecord[]> {
    const rows = await this.selectAllIn(
      gameIds,
      (chunk, from, to) =>
        this.supabase
          .from('picks')
          .select(PICK_COLUMNS)
          .in('game_id', chunk)
          .order('created_at', { ascending: true })
          .order('pick_id', { ascending: true })
          .range(from, to),
      'listByGames query error',
      { games: gameIds.length },
    );
    return this.parseRows(pickRowSchema, rows, 'pick')
      .map((row) => this.toRecord(row))
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime() || (a.pick_id < b.pick_id ? -1 : 1));
  }
}
