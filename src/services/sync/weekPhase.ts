/**
 * Week lifecycle, derived from stored state:
 *
 *   NOT_IMPORTED → IMPORTED → ODDS_LOADED → IN_PROGRESS → COMPLETE → GRADED
 *
 * A score correction on a complete game clears `graded_at`, moving the week
 * from GRADED back to COMPLETE.
 */

import type { GameRecord, WeekRecord } from '../../types/domain';

export type WeekPhase = 'NOT_IMPORTED' | 'IMPORTED' | 'ODDS_LOADED' | 'IN_PROGRESS' | 'COMPLETE' | 'GRADED';

/** Games that no longer need a result. */
function isSettled(game: Pick<GameRecord, 'status'>): boolean {
  return game.status === 'final' || game.status === 'canceled';
}

export function deriveWeekPhase(
  week: Pick<WeekRecord, 'graded_at'> | null,
  games: readonly Pick<GameRecord, 'status' | 'spread_pts'>[],
): WeekPhase {
  if (!week || games.length === 0) return 'NOT_IMPORTED';
  const complete = games.every(isSettled) && games.some((game) => game.status === 'final');
  if (complete) return week.graded_at ? 'GRADED' : 'COMPLETE';
  if (games.some((game) => game.status === 'in_progress' || game.status === 'final')) return 'IN_PROGRESS';
  if (games.every((game) => game.spread_pts !== null || game.status === 'canceled')) return 'ODDS_LOADED';
  return 'IMPORTED';
}

export function earliestKickoff(games: readonly Pick<GameRecord, 'kickoff_at'>[]): Date | null {
  let earliest: Date | null = null;
  for (const game of games) {
    if (!earliest || game.kickoff_at.getTime() < earliest.getTime()) earliest = game.kickoff_at;
  }
  return earliest;
}
