/**
 * Prop Repository
 *
 * Prop bets belong to a week; prop picks close at the week's picks deadline
 * and are submitted through the `submit_prop_pick` database function.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { BaseRepository } from './BaseRepository';
import { propBetRowSchema, propPickRowSchema, submissionSchema, type PropPickRow } from './rowSchemas';
import type { NewPropPick, PickInsertOutcome } from './types';
import type { OutcomeDomain, PropBetRecord, PropOutcome, PropPickRecord } from '../types/domain';

const PROP_COLUMNS = 'prop_id, week_id, description, outcome_domain, result';
const PROP_PICK_COLUMNS = 'prop_pick_id, participant_id, prop_id, selection, created_at';
const propPickSubmissionSchema = submissionSchema(propPickRowSchema);

export class PropRepository extends BaseRepository {
  constructor(supabase: SupabaseClient, legacyZone: string) {
    super(supabase, legacyZone, 'propRepository');
  }

  private toPickRecord(row: PropPickRow): PropPickRecord {
    return { ...row, created_at: this.toInstant(row.created_at) };
  }

  async create(weekId: string, description: string, outcomeDomain: OutcomeDomain): Promise<PropBetRecord> {
    const { data, error } = await this.supabase
      .from('prop_bets')
      .insert({ week_id: weekId, description, outcome_domain: outcomeDomain })
      .select(PROP_COLUMNS)
      .single();

    if (error) {
      throw this.wrapError('create insert error', error, { weekId });
    }
    return this.parseRow(propBetRowSchema, data, 'prop');
  }

  async findById(propId: string): Promise<PropBetRecord | null> {
    const { data, error } = await this.supabase
      .from('prop_bets')
      .select(PROP_COLUMNS)
      .eq('prop_id', propId)
      .maybeSingle();

    if (error) {
      throw this.wrapError('findById query error', error, { propId });
    }
    return data ? this.parseRow(propBetRowSchema, data, 'prop') : null;
  }

  async listByWeek(weekId: string): Promise<PropBetRecord[]> {
    const { data, error } = await this.supabase
      .from('prop_bets')
      .select(PROP_COLUMNS)
      .eq('week_id', weekId)
      .order('prop_id', { ascending: true });

    if (error) {
      throw this.wrapError('listByWeek query error', error, { weekId });
    }
    return this.parseRows(propBetRowSchema, data, 'prop');
  }

  async setResult(propId: string, result: PropOutcome | null): Promise<PropBetRecord> {
    const { data, error } = await this.supabase
      .from('prop_bets')
      .update({ result })
      .eq('prop_id', propId)
      .select(PROP_COLUMNS)
      .single();

    if (error) {
      throw this.wrapError('setResult error', error, { propId });
    }
    return this.parseRow(propBetRowSchema, data, 'prop');
  }

  async submitPick(pick: NewPropPick): Promise<PickInsertOutcome<PropPickRecord>> {
    const { data, error } = await this.supabase.rpc('submit_prop_pick', {
      p_participant_id: pick.participant_id,
      p_prop_id: pick.prop_id,
      p_selection: pick.selection,
      p_now: pick.now.toISOString(),
    });

    if (error) {
      throw this.wrapError('submit_prop_pick rpc error', error, {
        participantId: pick.participant_id,
        propId: pick.prop_id,
      });
    }

    const outcome = this.parseRow(propPickSubmissionSchema, data, 'prop pick submission');
    if (outcome.status === 'inserted') {
      return { status: 'inserted', record: this.toPickRecord(outcome.record) };
    }
    return outcome;
  }

  async listPicksByProps(propIds: readonly string[]): Promise<PropPickRecord[]> {
    const rows = await this.selectAllIn(
      propIds,
      (chunk, from, to) =>
        this.supabase
          .from('prop_picks')
          .select(PROP_PICK_COLUMNS)
          .in('prop_id', chunk)
          .order('created_at', { ascending: true })
          .order('prop_pick_id', { ascending: true })
          .range(from, to),
      'listPicksByProps query error',
      { props: propIds.length },
    );
    return this.parseRows(propPickRowSchema, rows, 'prop pick').map((row) => this.toPickRecord(row));
  }
}
