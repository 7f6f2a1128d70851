export { BaseRepository } from './BaseRepository';
export { WeekRepository } from './WeekRepository';
export { GameRepository } from './GameRepository';
export { ParticipantRepository } from './ParticipantRepository';
export { PickRepository } from './PickRepository';
export { PropRepository } from './PropRepository';
export { ReminderRepository } from './ReminderRepository';
export { SupabaseLeagueStore } from './SupabaseLeagueStore';
export type * from './types';
