/**
 * Orchestrator jobs.
 *
 * Each job is a function of its `JobContext` and returns a `JobResult`; the
 * runner and scheduler only decide when to call them. Shared behaviour:
 *
 *   - The offseason flag is checked first, before any store or feed call.
 *   - Every write is a single-entity upsert or update, skipped when the
 *     stored value is already identical.
 *   - A malformed record is skipped; the batch finishes and the job reports
 *     DATA_INTEGRITY.
 *   - At most one anomaly is raised per run.
 *   - Cancellation is honoured between retry attempts and between writes.
 */

import type { AppConfig } from '../../config/appConfig';
import { LAST_REGULAR_SEASON_WEEK, weekLabel, type JobName } from '../../constants/jobs';
import { DataIntegrityError, JobCancelledError, ProviderError, errorMessage } from '../../errors';
import type { LeagueStore } from '../../repositories/types';
import type { GameRecord } from '../../types/domain';
import type { Logger } from '../../utils/logger';
import { isApproximatelyEqual } from '../../utils/number';
import type { AnomalyNotifier, AnomalyReason } from '../alerts/anomalyNotifier';
import type { ParticipantNotifier } from '../alerts/participantNotifier';
import { toAppLocal, type Clock } from '../clock/clockService';
import { acceptsPick } from '../grading/deadlineGate';
import { tallyStandings } from '../grading/standings';
import type { FetchOptions, RawGame, ScheduleProvider, WeekSelector } from '../nflData/types';
import { deriveWeekPhase, earliestKickoff } from './weekPhase';
import { loadLatestSeason, pickActiveWeek, pickImportTarget, pickUpcomingWeek } from './weekSelection';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface JobContext {
  config: AppConfig;
  clock: Clock;
  store: LeagueStore;
  provider: ScheduleProvider;
  anomalies: AnomalyNotifier;
  participants: ParticipantNotifier;
  signal: AbortSignal;
  logger: Logger;
}

export type JobErrorReason = AnomalyReason | 'CANCELLED';

export type JobSkipReason = 'OFFSEASON' | 'ALREADY_RUNNING' | 'WRONG_WEEKDAY' | 'NO_TARGET_WEEK' | 'NOT_DUE';

export interface JobResult {
  ok: boolean;
  changed: number;
  errorReason?: JobErrorReason;
  skipped?: JobSkipReason;
  detail?: string;
}

export type JobHandler = (ctx: JobContext) => Promise<JobResult>;

// ─────────────────────────────────────────────────────────────────────────────
// Batch bookkeeping
// ─────────────────────────────────────────────────────────────────────────────

export class JobBatch {
  changed = 0;
  readonly issues: DataIntegrityError[] = [];

  constructor(private readonly signal: AbortSignal) {}

  checkpoint(): void {
    if (this.signal.aborted) {
      throw new JobCancelledError();
    }
  }

  issue(err: DataIntegrityError): void {
    this.issues.push(err);
  }

  /**
   * Run `apply` per item; it resolves true when it wrote something.
   * A `DataIntegrityError` skips that item only.
   */
  async each<T>(items: readonly T[], apply: (item: T) => Promise<boolean>): Promise<void> {
    for (const item of items) {
      this.checkpoint();
      try {
        if (await apply(item)) this.changed++;
      } catch (err) {
        if (!(err instanceof DataIntegrityError)) throw err;
        this.issues.push(err);
      }
    }
  }

  fetchOptions(): FetchOptions {
    return { signal: this.signal, onIssue: (issue) => this.issue(issue) };
  }
}

type JobBody = (ctx: JobContext, batch: JobBatch) => Promise<JobResult | null>;

function skipped(reason: JobSkipReason, detail?: string): JobResult {
  return { ok: true, changed: 0, skipped: reason, ...(detail ? { detail } : {}) };
}

function emptyResponse(name: JobName, ctx: JobContext, batch: JobBatch, message: string): JobResult {
  ctx.anomalies.notify({ job: name, reason: 'EMPTY_RESPONSE', message });
  return { ok: false, changed: batch.changed, errorReason: 'EMPTY_RESPONSE', detail: message };
}

function failure(name: JobName, ctx: JobContext, batch: JobBatch, err: unknown): JobResult {
  if (err instanceof JobCancelledError) {
    ctx.logger.info({ changed: batch.changed }, 'job cancelled');
    return { ok: false, changed: batch.changed, errorReason: 'CANCELLED', detail: err.message };
  }

  let reason: AnomalyReason = 'INTERNAL';
  if (err instanceof ProviderError) {
    reason = err.kind === 'transient' ? 'PROVIDER_TRANSIENT' : 'PROVIDER_PERMANENT';
  } else if (err instanceof DataIntegrityError) {
    reason = 'DATA_INTEGRITY';
  }

  const message = errorMessage(err);
  ctx.logger.error({ reason, changed: batch.changed, error: message }, 'job failed');
  ctx.anomalies.notify({
    job: name,
    reason,
    message,
    detail: {
      changed: batch.changed,
      skippedRecords: batch.issues.length,
      ...(err instanceof ProviderError ? { attempts: err.attempts, status: err.status, exhausted: err.exhausted } : {}),
    },
  });
  return { ok: false, changed: batch.changed, errorReason: reason, detail: message };
}

function defineJob(name: JobName, body: JobBody): JobHandler {
  return async (ctx) => {
    if (ctx.config.flags.offseason) {
      ctx.logger.debug('offseason flag set, skipping');
      return skipped('OFFSEASON');
    }

    const batch = new JobBatch(ctx.signal);
    let early: JobResult | null;
    try {
      early = await body(ctx, batch);
    } catch (err) {
      return failure(name, ctx, batch, err);
    }
    if (early) return early;

    if (batch.issues.length > 0) {
      const detail = `${batch.issues.length} record(s) skipped: ${batch.issues.map((i) => i.message).join('; ')}`;
      ctx.logger.warn({ changed: batch.changed, skipped: batch.issues.length }, 'job finished with malformed records');
      ctx.anomalies.notify({
        job: name,
        reason: 'DATA_INTEGRITY',
        message: detail,
        detail: { changed: batch.changed, references: batch.issues.map((i) => i.reference) },
      });
      return { ok: false, changed: batch.changed, errorReason: 'DATA_INTEGRITY', detail };
    }

    ctx.logger.info({ changed: batch.changed }, 'job finished');
    return { ok: true, changed: batch.changed };
  };
}

function selectorLabel(selector: WeekSelector): string {
  return `${selector.seasonYear} W${selector.weekNumber}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// import_upcoming_week
// ─────────────────────────────────────────────────────────────────────────────

function scheduleMatches(current: GameRecord, raw: RawGame, keepTeams: boolean): boolean {
  return (
    current.kickoff_at.getTime() === raw.kickoffAt.getTime() &&
    current.status === raw.status &&
    (keepTeams ||
      (current.home_team === raw.homeTeam &&
        current.away_team === raw.awayTeam &&
        current.unresolved_team === raw.unresolvedTeam))
  );
}

export const importUpcomingWeek = defineJob('import_upcoming_week', async (ctx, batch) => {
  const { store, provider } = ctx;
  const now = ctx.clock.now();

  let target = pickImportTarget(await loadLatestSeason(store), now);
  if (!target) {
    const current = await provider.fetchCurrentContext(batch.fetchOptions());
    target = { seasonYear: current.seasonYear, weekNumber: current.weekNumber };
  }

  const rawGames = await provider.fetchSchedule(target, batch.fetchOptions());
  if (rawGames.length === 0) {
    return emptyResponse(
      'import_upcoming_week',
      ctx,
      batch,
      `ESPN returned 0 events for ${selectorLabel(target)} during import`,
    );
  }

  const deadline = earliestKickoff(rawGames.map((raw) => ({ kickoff_at: raw.kickoffAt })));
  if (!deadline) throw new DataIntegrityError('No kickoff times in schedule', 'week', selectorLabel(target));

  batch.checkpoint();
  const { week, created } = await store.createWeekIfAbsent({
    season_year: target.seasonYear,
    week_number: target.weekNumber,
    picks_deadline: deadline,
    is_playoff: target.weekNumber > LAST_REGULAR_SEASON_WEEK,
  });
  if (created) {
    batch.changed++;
    ctx.logger.info({ weekId: week.week_id, target: selectorLabel(target) }, 'week created');
  }

  const existing = new Map((await store.listGamesForWeek(week.week_id)).map((game) => [game.external_id, game]));
  const seen = new Set<string>();

  await batch.each(rawGames, async (raw) => {
    if (seen.has(raw.externalId)) {
      throw new DataIntegrityError(`Duplicate external id ${raw.externalId} in schedule`, 'game', raw.externalId);
    }
    seen.add(raw.externalId);

    const current = existing.get(raw.externalId);
    // A placeholder in the feed never overwrites teams an admin already resolved.
    const keepTeams = current !== undefined && raw.unresolvedTeam && !current.unresolved_team;
    if (current && scheduleMatches(current, raw, keepTeams)) return false;

    if (raw.unresolvedTeam && !keepTeams) {
      ctx.logger.warn({ externalId: raw.externalId, home: raw.homeTeam, away: raw.awayTeam }, 'placeholder matchup');
    }
    await store.upsertGame(week.week_id, {
      external_id: raw.externalId,
      home_team: keepTeams && current ? current.home_team : raw.homeTeam,
      away_team: keepTeams && current ? current.away_team : raw.awayTeam,
      kickoff_at: raw.kickoffAt,
      status: raw.status,
      unresolved_team: keepTeams ? false : raw.unresolvedTeam,
    });
    return true;
  });

  return null;
});

// ─────────────────────────────────────────────────────────────────────────────
// sync_scores_active_week
// ─────────────────────────────────────────────────────────────────────────────

export const syncScoresActiveWeek = defineJob('sync_scores_active_week', async (ctx, batch) => {
  const { store, provider } = ctx;
  const now = ctx.clock.now();

  const season = await loadLatestSeason(store);
  const active = pickActiveWeek(season, now);
  if (!season || !active) return skipped('NO_TARGET_WEEK', 'no week has kicked off');

  const selector = { seasonYear: season.seasonYear, weekNumber: active.week.week_number };
  const byExternalId = new Map(active.games.map((game) => [game.external_id, game]));
  const scores = await provider.fetchScores(selector, [...byExternalId.keys()], batch.fetchOptions());
  if (scores.length === 0) {
    return emptyResponse(
      'sync_scores_active_week',
      ctx,
      batch,
      `ESPN returned 0 scores for ${selectorLabel(selector)} during score sync`,
    );
  }

  let reopenGrading = false;
  await batch.each(scores, async (score) => {
    const game = byExternalId.get(score.externalId);
    if (!game) return false;

    if (score.status === 'final' && (score.homeScore === null || score.awayScore === null)) {
      throw new DataIntegrityError(`Final game ${score.externalId} has no score`, 'game', score.externalId);
    }
    const sameScores = game.home_score === score.homeScore && game.away_score === score.awayScore;
    if (sameScores && game.status === score.status) return false;

    await store.updateGame(game.game_id, {
      status: score.status,
      home_score: score.homeScore,
      away_score: score.awayScore,
    });

    if (game.status === 'final' && !sameScores) {
      ctx.logger.warn(
        {
          externalId: game.external_id,
          from: `${game.away_score}-${game.home_score}`,
          to: `${score.awayScore}-${score.homeScore}`,
        },
        'score corrected on completed game',
      );
      reopenGrading = active.week.graded_at !== null;
    }
    return true;
  });

  if (reopenGrading) {
    batch.checkpoint();
    await store.updateWeek(active.week.week_id, { graded_at: null });
    ctx.logger.warn({ weekId: active.week.week_id }, 'grading re-opened after score correction');
  }

  return null;
});

// ─────────────────────────────────────────────────────────────────────────────
// import_odds_upcoming
// ─────────────────────────────────────────────────────────────────────────────

export const importOddsUpcoming = defineJob('import_odds_upcoming', async (ctx, batch) => {
  const { store, provider, config } = ctx;
  const now = ctx.clock.now();

  if (!config.flags.allowAnyDayOddsImport) {
    const local = toAppLocal(now, config.appTimezone);
    if (local.weekday !== config.oddsImportWeekday) {
      return skipped('WRONG_WEEKDAY', `odds import runs on weekday ${config.oddsImportWeekday} only`);
    }
  }

  const season = await loadLatestSeason(store);
  const upcoming = pickUpcomingWeek(season, now);
  if (!season || !upcoming) return skipped('NO_TARGET_WEEK', 'no upcoming games');

  const selector = { seasonYear: season.seasonYear, weekNumber: upcoming.week.week_number };
  const odds = await provider.fetchOdds(selector, batch.fetchOptions());
  if (odds.length === 0) {
    return emptyResponse('import_odds_upcoming', ctx, batch, `ESPN returned 0 lines for ${selectorLabel(selector)}`);
  }

  const byExternalId = new Map(upcoming.games.map((game) => [game.external_id, game]));
  await batch.each(odds, async (line) => {
    const game = byExternalId.get(line.externalId);
    // Lines freeze at kickoff.
    if (!game || game.status !== 'scheduled' || !acceptsPick(game.kickoff_at, now)) return false;

    if (!Number.isFinite(line.spreadPts) || line.spreadPts < 0) {
      throw new DataIntegrityError(`Malformed spread ${line.spreadPts} for ${line.externalId}`, 'game', line.externalId);
    }
    if (line.favoriteTeam !== game.home_team && line.favoriteTeam !== game.away_team) {
      throw new DataIntegrityError(
        `Favorite ${line.favoriteTeam} is not playing in ${game.away_team} @ ${game.home_team}`,
        'game',
        line.externalId,
      );
    }
    if (
      game.favorite_team === line.favoriteTeam &&
      game.spread_pts !== null &&
      isApproximatelyEqual(game.spread_pts, line.spreadPts)
    ) {
      return false;
    }

    await store.updateGame(game.game_id, { favorite_team: line.favoriteTeam, spread_pts: line.spreadPts });
    return true;
  });

  return null;
});

// ─────────────────────────────────────────────────────────────────────────────
// send_week_matchups
// ─────────────────────────────────────────────────────────────────────────────

function isOpenForPicks(game: GameRecord, now: Date): boolean {
  return game.status === 'scheduled' && acceptsPick(game.kickoff_at, now);
}

export const sendWeekMatchups = defineJob('send_week_matchups', async (ctx, batch) => {
  const { store } = ctx;
  const now = ctx.clock.now();

  const upcoming = pickUpcomingWeek(await loadLatestSeason(store), now);
  if (!upcoming) return skipped('NO_TARGET_WEEK', 'no upcoming games');

  const { week } = upcoming;
  const games = upcoming.games.filter((game) => isOpenForPicks(game, now));
  const participants = await store.listParticipants();

  await batch.each(participants, async (participant) => {
    const claimed = await store.claimReminder({
      participant_id: participant.participant_id,
      week_id: week.week_id,
      game_id: null,
      kind: 'launch',
    });
    if (!claimed) return false;
    ctx.participants.sendWeekMatchups({ participant, week, games });
    return true;
  });

  return null;
});

// ─────────────────────────────────────────────────────────────────────────────
// grade_completed_week
// ─────────────────────────────────────────────────────────────────────────────

export const gradeCompletedWeek = defineJob('grade_completed_week', async (ctx, batch) => {
  const { store } = ctx;
  const now = ctx.clock.now();

  const season = await loadLatestSeason(store);
  if (!season) return skipped('NO_TARGET_WEEK', 'no season stored');

  const ready = season.weeks.filter(({ week, games }) => deriveWeekPhase(week, games) === 'COMPLETE');
  if (ready.length === 0) return skipped('NO_TARGET_WEEK', 'no completed ungraded week');

  const participants = await store.listParticipants();
  const byId = new Map(participants.map((p) => [p.participant_id, p]));

  for (const { week, games } of ready) {
    batch.checkpoint();
    const label = `${week.season_year} ${weekLabel(week.week_number)}`;

    // Unscorable games stay UNDECIDED and are reported with this run only;
    // resolving teams or correcting a score re-opens grading.
    for (const game of games) {
      if (game.status === 'final' && game.unresolved_team) {
        batch.issue(
          new DataIntegrityError(
            `Game ${game.external_id} still has placeholder teams ${game.away_team} @ ${game.home_team}`,
            'game',
            game.external_id,
          ),
        );
      }
    }

    const picks = await store.listPicksForGames(games.map((game) => game.game_id));
    const tally = tallyStandings(participants, games, picks);
    tally.integrityErrors.forEach((err) => batch.issue(err));

    await store.updateWeek(week.week_id, { graded_at: now });
    batch.changed++;
    ctx.logger.info({ weekId: week.week_id, picks: picks.length }, `${label} graded`);

    const pickers = new Set(picks.map((pick) => pick.participant_id));
    const rows = tally.rows.filter((row) => pickers.has(row.participantId));

    for (const row of rows) {
      const participant = byId.get(row.participantId);
      if (!participant) continue;
      batch.checkpoint();
      const claimed = await store.claimReminder({
        participant_id: participant.participant_id,
        week_id: week.week_id,
        game_id: null,
        kind: 'results',
      });
      if (claimed) {
        // Tied win counts share a rank: 1, 1, 3.
        const rank = 1 + rows.filter((other) => other.wins > row.wins).length;
        ctx.participants.sendWeeklyResults({ participant, week, record: row, rank, participants: rows.length });
      }
    }
  }

  return null;
});

// ─────────────────────────────────────────────────────────────────────────────
// send_deadline_reminders
// ─────────────────────────────────────────────────────────────────────────────

function localDay(instant: Date, zone: string): string {
  const { year, month, day } = toAppLocal(instant, zone);
  return `${year}-${month}-${day}`;
}

/**
 * Each game closes at its own kickoff, so the window is measured to the
 * earliest open game. A participant gets at most one reminder per local
 * game day, keyed by that day's first game.
 */
export const sendDeadlineReminders = defineJob('send_deadline_reminders', async (ctx, batch) => {
  const { store, config } = ctx;
  const now = ctx.clock.now();
  const leadMs = config.reminderLeadHours * 3_600_000;

  const upcoming = pickUpcomingWeek(await loadLatestSeason(store), now);
  const openGames = upcoming ? upcoming.games.filter((game) => isOpenForPicks(game, now)) : [];
  const nextKickoff = earliestKickoff(openGames);
  if (!upcoming || !nextKickoff) return skipped('NO_TARGET_WEEK', 'no upcoming games');

  if (nextKickoff.getTime() - now.getTime() > leadMs) {
    return skipped('NOT_DUE', `next kickoff ${nextKickoff.toISOString()} is outside the reminder window`);
  }

  const { week, games } = upcoming;
  const [participants, picks] = await Promise.all([
    store.listParticipants(),
    store.listPicksForGames(openGames.map((game) => game.game_id)),
  ]);
  const picked = new Set(picks.map((pick) => `${pick.participant_id}:${pick.game_id}`));

  await batch.each(participants, async (participant) => {
    const missingGames = openGames.filter((game) => !picked.has(`${participant.participant_id}:${game.game_id}`));
    const first = missingGames.at(0);
    if (!first || first.kickoff_at.getTime() - now.getTime() > leadMs) return false;

    const day = localDay(first.kickoff_at, config.appTimezone);
    const anchor = games.find((game) => localDay(game.kickoff_at, config.appTimezone) === day) ?? first;
    const claimed = await store.claimReminder({
      participant_id: participant.participant_id,
      week_id: week.week_id,
      game_id: anchor.game_id,
      kind: 'deadline',
    });
    if (!claimed) return false;
    ctx.participants.sendDeadlineReminder({ participant, week, missingGames, closesAt: first.kickoff_at });
    return true;
  });

  return null;
});

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export const SYNC_JOBS: Readonly<Record<JobName, JobHandler>> = {
  import_upcoming_week: importUpcomingWeek,
  sync_scores_active_week: syncScoresActiveWeek,
  import_odds_upcoming: importOddsUpcoming,
  send_week_matchups: sendWeekMatchups,
  grade_completed_week: gradeCompletedWeek,
  send_deadline_reminders: sendDeadlineReminders,
};
