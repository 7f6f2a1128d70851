/**
 * Canonical records produced at the provider boundary. Each payload kind is
 * a tagged variant; nothing downstream touches raw feed JSON.
 */

import type { DataIntegrityError } from '../../errors';
import type { GameStatus } from '../../types/domain';

export interface WeekSelector {
  seasonYear: number;
  /** Internal week: 1-18 regular season, 19-23 playoff rounds. */
  weekNumber: number;
}

export interface RawGame {
  kind: 'game';
  externalId: string;
  homeTeam: string;
  awayTeam: string;
  kickoffAt: Date;
  status: GameStatus;
  /** Set when either side is a placeholder or an unknown name. */
  unresolvedTeam: boolean;
}

export interface RawScore {
  kind: 'score';
  externalId: string;
  homeScore: number | null;
  awayScore: number | null;
  status: GameStatus;
}

export interface RawOdds {
  kind: 'odds';
  externalId: string;
  /** Canonical code when recognised, otherwise the feed's text. */
  favoriteTeam: string;
  spreadPts: number;
}

export type RawRecord = RawGame | RawScore | RawOdds;

export interface SeasonContext extends WeekSelector {
  seasonType: number;
}

export interface FetchOptions {
  signal?: AbortSignal;
  /** Receives events that were skipped because they could not be normalized. */
  onIssue?: (issue: DataIntegrityError) => void;
}

/**
 * Read side of the external data feed. Implementations retry transient
 * failures themselves and reject with `ProviderError` once they give up.
 */
export interface ScheduleProvider {
  fetchSchedule(selector: WeekSelector, options?: FetchOptions): Promise<RawGame[]>;
  fetchScores(selector: WeekSelector, externalIds: readonly string[], options?: FetchOptions): Promise<RawScore[]>;
  fetchOdds(selector: WeekSelector, options?: FetchOptions): Promise<RawOdds[]>;
  fetchCurrentContext(options?: FetchOptions): Promise<SeasonContext>;
}
