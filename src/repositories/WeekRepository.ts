/**
 * Week Repository
 *
 * Weeks are unique on (season_year, week_number). Creation is
 * insert-if-absent so concurrent imports of the same week converge.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { BaseRepository } from './BaseRepository';
import { weekRowSchema, type WeekRow } from './rowSchemas';
import type { NewWeek, WeekPatch } from './types';
import type { WeekRecord } from '../types/domain';

const WEEK_COLUMNS = 'week_id, season_year, week_number, picks_deadline, is_playoff, graded_at, created_at';

export class WeekRepository extends BaseRepository {
  constructor(supabase: SupabaseClient, legacyZone: string) {
    super(supabase, legacyZone, 'weekRepository');
  }

  private toRecord(row: WeekRow): WeekRecord {
    return {
      ...row,
      picks_deadline: this.toInstant(row.picks_deadline),
      graded_at: row.graded_at === null ? null : this.toInstant(row.graded_at),
      created_at: this.toInstant(row.created_at),
    };
  }

  async findByKey(seasonYear: number, weekNumber: number): Promise<WeekRecord | null> {
    const { data, error } = await this.supabase
      .from('weeks')
      .select(WEEK_COLUMNS)
      .eq('season_year', seasonYear)
      .eq('week_number', weekNumber)
      .maybeSingle();

    if (error) {
      throw this.wrapError('findByKey query error', error, { seasonYear, weekNumber });
    }
    return data ? this.toRecord(this.parseRow(weekRowSchema, data, 'week')) : null;
  }

  async findById(weekId: string): Promise<WeekRecord | null> {
    const { data, error } = await this.supabase
      .from('weeks')
      .select(WEEK_COLUMNS)
      .eq('week_id', weekId)
      .maybeSingle();

    if (error) {
      throw this.wrapError('findById query error', error, { weekId });
    }
    return data ? this.toRecord(this.parseRow(weekRowSchema, data, 'week')) : null;
  }

  async listBySeason(seasonYear: number): Promise<WeekRecord[]> {
    const { data, error } = await this.supabase
      .from('weeks')
      .select(WEEK_COLUMNS)
      .eq('season_year', seasonYear)
      .order('week_number', { ascending: true });

    if (error) {
      throw this.wrapError('listBySeason query error', error, { seasonYear });
    }
    return this.parseRows(weekRowSchema, data, 'week').map((row) => this.toRecord(row));
  }

  async latestSeasonYear(): Promise<number | null> {
    const { data, error } = await this.supabase
      .from('weeks')
      .select(WEEK_COLUMNS)
      .order('season_year', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) {
      throw this.wrapError('latestSeasonYear query error', error);
    }
    return data ? this.parseRow(weekRowSchema, data, 'week').season_year : null;
  }

  async createIfAbsent(week: NewWeek): Promise<{ week: WeekRecord; created: boolean }> {
    const { data, error } = await this.supabase
      .from('weeks')
      .upsert(
        {
          season_year: week.season_year,
          week_number: week.week_number,
          picks_deadline: week.picks_deadline.toISOString(),
          is_playoff: week.is_playoff,
        },
        { onConflict: 'season_year,week_number', ignoreDuplicates: true },
      )
      .select(WEEK_COLUMNS);

    if (error) {
      throw this.wrapError('createIfAbsent upsert error', error, {
        seasonYear: week.season_year,
        weekNumber: week.week_number,
      });
    }

    const inserted = this.parseRows(weekRowSchema, data, 'week');
    if (inserted.length > 0) {
      return { week: this.toRecord(inserted[0]), created: true };
    }

    const existing = await this.findByKey(week.season_year, week.week_number);
    if (!existing) {
      throw new Error(`Week ${week.season_year} W${week.week_number} vanished after conflict`);
    }
    return { week: existing, created: false };
  }

  async update(weekId: string, patch: WeekPatch): Promise<WeekRecord> {
    const values: Record<string, string | null> = {};
    if (patch.picks_deadline !== undefined) values.picks_deadline = patch.picks_deadline.toISOString();
    if (patch.graded_at !== undefined) values.graded_at = patch.graded_at?.toISOString() ?? null;

    const { data, error } = await this.supabase
      .from('weeks')
      .update(values)
      .eq('week_id', weekId)
      .select(WEEK_COLUMNS)
      .single();

    if (error) {
      throw this.wrapError('update error', error, { weekId });
    }
    return this.toRecord(this.parseRow(weekRowSchema, data, 'week'));
  }
}
