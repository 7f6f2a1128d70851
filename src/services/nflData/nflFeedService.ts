/**
 * NFL feed backed by ESPN's scoreboard.
 *
 * Internal week numbers map onto ESPN's season types: weeks 1-18 are
 * `seasontype=2`, playoff weeks 19-23 are `seasontype=3` weeks 1-5.
 */

import { DataIntegrityError, ProviderError } from '../../errors';
import { LAST_REGULAR_SEASON_WEEK, LAST_WEEK_NUMBER } from '../../constants/jobs';
import { createLogger, type Logger } from '../../utils/logger';
import type { EspnClient, ScoreboardQuery } from '../../utils/nfl/espnClient';
import { normalizeGame, normalizeOdds, normalizeScore, type NormalizeContext } from './normalizer';
import { espnEventSchema, espnScoreboardSchema, type EspnEvent, type EspnScoreboard } from './payloadSchemas';
import type { TeamDirectory } from './teamDirectory';
import type {
  FetchOptions,
  RawGame,
  RawOdds,
  RawScore,
  ScheduleProvider,
  SeasonContext,
  WeekSelector,
} from './types';

const REGULAR_SEASON = 2;
const POSTSEASON = 3;

export function toScoreboardQuery(selector: WeekSelector): ScoreboardQuery {
  const { seasonYear, weekNumber } = selector;
  if (!Number.isInteger(weekNumber) || weekNumber < 1 || weekNumber > LAST_WEEK_NUMBER) {
    throw new RangeError(`Week ${weekNumber} is outside 1-${LAST_WEEK_NUMBER}`);
  }
  if (weekNumber <= LAST_REGULAR_SEASON_WEEK) {
    return { dates: seasonYear, seasontype: REGULAR_SEASON, week: weekNumber };
  }
  return { dates: seasonYear, seasontype: POSTSEASON, week: weekNumber - LAST_REGULAR_SEASON_WEEK };
}

export function toSeasonContext(seasonYear: number, seasonType: number, espnWeek: number): SeasonContext {
  if (seasonType === POSTSEASON) {
    return {
      seasonYear,
      seasonType,
      weekNumber: Math.min(LAST_WEEK_NUMBER, LAST_REGULAR_SEASON_WEEK + Math.max(1, espnWeek)),
    };
  }
  if (seasonType === REGULAR_SEASON) {
    return { seasonYear, seasonType, weekNumber: Math.min(LAST_REGULAR_SEASON_WEEK, Math.max(1, espnWeek)) };
  }
  // Preseason and offseason both point at the start of the regular season.
  return { seasonYear, seasonType, weekNumber: 1 };
}

export class NflFeedService implements ScheduleProvider {
  private readonly ctx: NormalizeContext;

  constructor(
    private readonly client: EspnClient,
    teams: TeamDirectory,
    legacyZone: string,
    private readonly logger: Logger = createLogger('nflFeed'),
  ) {
    this.ctx = { teams, legacyZone };
  }

  async fetchSchedule(selector: WeekSelector, options: FetchOptions = {}): Promise<RawGame[]> {
    const events = await this.loadEvents(toScoreboardQuery(selector), options);
    return this.collect(events, options, (event) => normalizeGame(event, this.ctx));
  }

  async fetchScores(
    selector: WeekSelector,
    externalIds: readonly string[],
    options: FetchOptions = {},
  ): Promise<RawScore[]> {
    const wanted = new Set(externalIds);
    const events = await this.loadEvents(toScoreboardQuery(selector), options);
    return this.collect(
      events.filter((event) => wanted.has(event.id)),
      options,
      (event) => normalizeScore(event),
    );
  }

  async fetchOdds(selector: WeekSelector, options: FetchOptions = {}): Promise<RawOdds[]> {
    const events = await this.loadEvents(toScoreboardQuery(selector), options);
    return this.collect(events, options, (event) => normalizeOdds(event, this.ctx));
  }

  async fetchCurrentContext(options: FetchOptions = {}): Promise<SeasonContext> {
    const board = await this.loadScoreboard({}, options);
    if (!board.season || !board.week) {
      throw new ProviderError('ESPN scoreboard did not include the current season and week', { kind: 'permanent' });
    }
    return toSeasonContext(board.season.year, board.season.type, board.week.number);
  }

  // ───────────────────────────────────────────────────────────────────────────

  private async loadScoreboard(query: ScoreboardQuery, options: FetchOptions): Promise<EspnScoreboard> {
    const payload = await this.client.getScoreboard(query, options.signal);
    const parsed = espnScoreboardSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(`Unrecognized ESPN scoreboard payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        kind: 'permanent',
      });
    }
    return parsed.data;
  }

  private async loadEvents(query: ScoreboardQuery, options: FetchOptions): Promise<EspnEvent[]> {
    const board = await this.loadScoreboard(query, options);
    const events: EspnEvent[] = [];
    board.events.forEach((raw, index) => {
      const parsed = espnEventSchema.safeParse(raw);
      if (parsed.success) {
        events.push(parsed.data);
        return;
      }
      this.report(
        new DataIntegrityError(`Malformed ESPN event at index ${index}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, 'event'),
        options,
      );
    });
    this.logger.debug({ query, events: events.length }, 'scoreboard loaded');
    return events;
  }

  private collect<T>(
    events: readonly EspnEvent[],
    options: FetchOptions,
    convert: (event: EspnEvent) => T | null,
  ): T[] {
    const records: T[] = [];
    for (const event of events) {
      try {
        const record = convert(event);
        if (record !== null) records.push(record);
      } catch (err) {
        if (!(err instanceof DataIntegrityError)) throw err;
        this.report(err, options);
      }
    }
    return records;
  }

  private report(issue: DataIntegrityError, options: FetchOptions): void {
    this.logger.warn({ entity: issue.entity, reference: issue.reference, error: issue.message }, 'skipping feed record');
    options.onIssue?.(issue);
  }
}
