import type { SupabaseClient } from '@supabase/supabase-js';
import { BaseRepository } from './BaseRepository';
import type { ReminderClaim } from '../types/domain';

/**
 * Reminders are claimed by insert; the unique constraint makes a second
 * claim for the same (participant, week, game, kind) a no-op.
 */
export class ReminderRepository extends BaseRepository {
  constructor(supabase: SupabaseClient, legacyZone: string) {
    super(supabase, legacyZone, 'reminderRepository');
  }

  async claim(claim: ReminderClaim): Promise<boolean> {
    const { data, error } = await this.supabase
      .from('reminders')
      .upsert(
        {
          participant_id: claim.participant_id,
          week_id: claim.week_id,
          game_id: claim.game_id,
          kind: claim.kind,
        },
        { onConflict: 'participant_id,week_id,game_id,kind', ignoreDuplicates: true },
      )
      .select('participant_id');

    if (error) {
      throw this.wrapError('claim upsert error', error, { ...claim });
    }
    return Array.isArray(data) && data.length > 0;
  }
}
