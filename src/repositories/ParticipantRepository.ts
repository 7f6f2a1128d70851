import type { SupabaseClient } from '@supabase/supabase-js';
import { BaseRepository } from './BaseRepository';
import { participantRowSchema, type ParticipantRow } from './rowSchemas';
import type { ParticipantRecord } from '../types/domain';

const PARTICIPANT_COLUMNS = 'participant_id, external_id, display_name, created_at';

export class ParticipantRepository extends BaseRepository {
  constructor(supabase: SupabaseClient, legacyZone: string) {
    super(supabase, legacyZone, 'participantRepository');
  }

  private toRecord(row: ParticipantRow): ParticipantRecord {
    return { ...row, created_at: this.toInstant(row.created_at) };
  }

  /**
   * Register by external id; an existing participant keeps its id and gets
   * the latest display name.
   */
  async ensure(externalId: string, displayName: string): Promise<ParticipantRecord> {
    const { data, error } = await this.supabase
      .from('participants')
      .upsert({ external_id: externalId, display_name: displayName }, { onConflict: 'external_id' })
      .select(PARTICIPANT_COLUMNS)
      .single();

    if (error) {
      throw this.wrapError('ensure upsert error', error, { externalId });
    }
    return this.toRecord(this.parseRow(participantRowSchema, data, 'participant'));
  }

  async findById(participantId: string): Promise<ParticipantRecord | null> {
    const { data, error } = await this.supabase
      .from('participants')
      .select(PARTICIPANT_COLUMNS)
      .eq('participant_id', participantId)
      .maybeSingle();

    if (error) {
      throw this.wrapError('findById query error', error, { participantId });
    }
    return data ? this.toRecord(this.parseRow(participantRowSchema, data, 'participant')) : null;
  }

  async list(): Promise<ParticipantRecord[]> {
    const { data, error } = await this.supabase
      .from('participants')
      .select(PARTICIPANT_COLUMNS)
      .order('participant_id', { ascending: true });

    if (error) {
      throw this.wrapError('list query error', error);
    }
    return this.parseRows(participantRowSchema, data, 'participant').map((row) => this.toRecord(row));
  }
}
