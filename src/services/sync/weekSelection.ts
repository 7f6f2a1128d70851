/**
 * Which week each job acts on, computed from the latest stored season.
 */

import { LAST_WEEK_NUMBER } from '../../constants/jobs';
import type { LeagueStore } from '../../repositories/types';
import type { GameRecord, WeekRecord } from '../../types/domain';
import type { WeekSelector } from '../nflData/types';
import { acceptsPick } from '../grading/deadlineGate';
import { earliestKickoff } from './weekPhase';

export interface WeekWithGames {
  week: WeekRecord;
  games: GameRecord[];
}

export interface SeasonSnapshot {
  seasonYear: number;
  /** Ordered by week number ascending. */
  weeks: WeekWithGames[];
}

export async function loadLatestSeason(store: LeagueStore): Promise<SeasonSnapshot | null> {
  const seasonYear = await store.latestSeasonYear();
  if (seasonYear === null) return null;

  const [weeks, games] = await Promise.all([store.listWeeks(seasonYear), store.listGamesForSeason(seasonYear)]);
  const byWeek = new Map<string, GameRecord[]>();
  for (const game of games) {
    const list = byWeek.get(game.week_id) ?? [];
    list.push(game);
    byWeek.set(game.week_id, list);
  }
  return {
    seasonYear,
    weeks: weeks
      .slice()
      .sort((a, b) => a.week_number - b.week_number)
      .map((week) => ({ week, games: byWeek.get(week.week_id) ?? [] })),
  };
}

/**
 * The first stored week that has not kicked off yet, else the week after
 * the last stored one. Null when the season is exhausted or nothing is
 * stored; the caller then asks the provider for the current week.
 */
export function pickImportTarget(season: SeasonSnapshot | null, now: Date): WeekSelector | null {
  if (!season || season.weeks.length === 0) return null;

  for (const { week, games } of season.weeks) {
    const first = earliestKickoff(games);
    if (first && first.getTime() > now.getTime()) {
      return { seasonYear: season.seasonYear, weekNumber: week.week_number };
    }
  }

  const last = season.weeks[season.weeks.length - 1].week.week_number;
  if (last >= LAST_WEEK_NUMBER) return null;
  return { seasonYear: season.seasonYear, weekNumber: last + 1 };
}

/** The latest week with at least one game kicked off. */
export function pickActiveWeek(season: SeasonSnapshot | null, now: Date): WeekWithGames | null {
  if (!season) return null;
  for (let i = season.weeks.length - 1; i >= 0; i--) {
    const entry = season.weeks[i];
    if (entry.games.some((game) => !acceptsPick(game.kickoff_at, now))) return entry;
  }
  return null;
}

/** The earliest week that still has a scheduled game before kickoff. */
export function pickUpcomingWeek(season: SeasonSnapshot | null, now: Date): WeekWithGames | null {
  if (!season) return null;
  return (
    season.weeks.find((entry) =>
      entry.games.some((game) => game.status === 'scheduled' && acceptsPick(game.kickoff_at, now)),
    ) ?? null
  );
}
