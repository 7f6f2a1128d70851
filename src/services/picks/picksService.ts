/**
 * Picks Service
 *
 * Collaborator-facing operations: pick submission, ATS lookups,
 * scoreboards and the administrative corrections. Rejections are returned
 * as values; only missing resources and programming errors throw.
 */

import { AppError, DataIntegrityError } from '../../errors';
import { pickSubmissionsTotal } from '../../infrastructure/metrics';
import type { LeagueStore, PickInsertOutcome } from '../../repositories/types';
import {
  isOutcomeInDomain,
  type AtsOutcome,
  type GameRecord,
  type OutcomeDomain,
  type ParticipantRecord,
  type PickRecord,
  type PropBetRecord,
  type PropPickRecord,
  type WeekRecord,
} from '../../types/domain';
import { createLogger, type Logger } from '../../utils/logger';
import type { Clock } from '../clock/clockService';
import { scoreAtsPick } from '../grading/atsScoring';
import { acceptsPick } from '../grading/deadlineGate';
import {
  gradePropsBulk,
  lookupPropResult,
  validatePropResult,
  type BulkPropGrading,
  type PropResultMapping,
} from '../grading/propGrading';
import { tallyStandings, type StandingRow } from '../grading/standings';
import type { TeamDirectory } from '../nflData/teamDirectory';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type PickRejection =
  | 'DEADLINE_PASSED'
  | 'DUPLICATE_PICK'
  | 'UNKNOWN_GAME'
  | 'TEAMS_UNRESOLVED'
  | 'INVALID_TEAM'
  | 'UNKNOWN_PARTICIPANT';

export type PropPickRejection =
  | 'DEADLINE_PASSED'
  | 'DUPLICATE_PICK'
  | 'UNKNOWN_PROP'
  | 'INVALID_SELECTION'
  | 'UNKNOWN_PARTICIPANT';

export type SubmissionResult<T, R extends string> =
  | { status: 'ACCEPTED'; pick: T }
  | { status: 'REJECTED'; reason: R };

export type PickSubmission = SubmissionResult<PickRecord, PickRejection>;
export type PropPickSubmission = SubmissionResult<PropPickRecord, PropPickRejection>;

export interface PropResultsDeclaration extends BulkPropGrading {
  /** Props whose result was stored by this call. */
  updated: PropBetRecord[];
}

export interface WeekPickEntry {
  participantId: string;
  displayName: string;
  gameId: string;
  matchup: string;
  kickoffAt: Date;
  selectedTeam: string;
  result: AtsOutcome;
}

export interface MissingPicksEntry {
  participantId: string;
  displayName: string;
  picked: number;
  totalGames: number;
  /** Games still open for picks that this participant has not picked. */
  openGameIds: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────────────────────

export class PicksService {
  constructor(
    private readonly store: LeagueStore,
    private readonly clock: Clock,
    private readonly teams: TeamDirectory,
    private readonly logger: Logger = createLogger('picksService'),
  ) {}

  // ── Participants ──────────────────────────────────────────────────────────

  async registerParticipant(externalId: string, displayName: string): Promise<ParticipantRecord> {
    return this.store.ensureParticipant(externalId.trim(), displayName.trim());
  }

  // ── Picks ─────────────────────────────────────────────────────────────────

  async submitPick(participantId: string, gameId: string, team: string): Promise<PickSubmission> {
    const game = await this.store.getGame(gameId);
    if (!game) return this.reject('ats', 'UNKNOWN_GAME', { participantId, gameId });
    if (game.unresolved_team) return this.reject('ats', 'TEAMS_UNRESOLVED', { participantId, gameId, team });

    const selected = this.matchTeam(game, team);
    if (!selected) return this.reject('ats', 'INVALID_TEAM', { participantId, gameId, team });

    const outcome = await this.store.insertPickIfOpen({
      participant_id: participantId,
      game_id: gameId,
      selected_team: selected,
      now: this.clock.now(),
    });
    return this.settle('ats', outcome, 'UNKNOWN_GAME', { participantId, gameId });
  }

  async submitPropPick(participantId: string, propId: string, selection: string): Promise<PropPickSubmission> {
    const prop = await this.store.getProp(propId);
    if (!prop) return this.reject('prop', 'UNKNOWN_PROP', { participantId, propId });

    const normalized = selection.trim().toUpperCase();
    if (!isOutcomeInDomain(prop.outcome_domain, normalized)) {
      return this.reject('prop', 'INVALID_SELECTION', { participantId, propId, selection });
    }

    const outcome = await this.store.insertPropPickIfOpen({
      participant_id: participantId,
      prop_id: propId,
      selection: normalized,
      now: this.clock.now(),
    });
    return this.settle('prop', outcome, 'UNKNOWN_PROP', { participantId, propId });
  }

  // ── Results ───────────────────────────────────────────────────────────────

  async getAtsResult(gameId: string, participantId: string): Promise<AtsOutcome> {
    const game = await this.store.getGame(gameId);
    if (!game) throw AppError.notFound(`Game ${gameId} not found`);

    const pick = await this.store.getPick(participantId, gameId);
    if (!pick) return 'UNDECIDED';
    return scoreAtsPick(game, pick.selected_team);
  }

  /** Season-to-date ATS records, wins desc then participant id. */
  async getSeasonScoreboard(seasonYear: number): Promise<StandingRow[]> {
    const games = await this.store.listGamesForSeason(seasonYear);
    return this.tally(games, { seasonYear });
  }

  async getWeekResults(seasonYear: number, weekNumber: number): Promise<StandingRow[]> {
    const week = await this.requireWeekByNumber(seasonYear, weekNumber);
    const games = await this.store.listGamesForWeek(week.week_id);
    return this.tally(games, { seasonYear, weekNumber });
  }

  /**
   * Picks of the week in kickoff order, each with its ATS result. Pass
   * `participantId` to list one participant's picks only.
   */
  async listWeekPicks(seasonYear: number, weekNumber: number, participantId?: string): Promise<WeekPickEntry[]> {
    const week = await this.requireWeekByNumber(seasonYear, weekNumber);
    if (participantId !== undefined) await this.requireParticipant(participantId);

    const [games, participants] = await Promise.all([
      this.store.listGamesForWeek(week.week_id),
      this.store.listParticipants(),
    ]);
    const picks = await this.store.listPicksForGames(games.map((game) => game.game_id));
    const byPickKey = new Map(picks.map((pick) => [`${pick.participant_id}:${pick.game_id}`, pick]));
    const listed = participants.filter((p) => participantId === undefined || p.participant_id === participantId);

    const entries: WeekPickEntry[] = [];
    for (const game of games) {
      for (const participant of listed) {
        const pick = byPickKey.get(`${participant.participant_id}:${game.game_id}`);
        if (!pick) continue;
        entries.push({
          participantId: participant.participant_id,
          displayName: participant.display_name,
          gameId: game.game_id,
          matchup: `${game.away_team} @ ${game.home_team}`,
          kickoffAt: game.kickoff_at,
          selectedTeam: pick.selected_team,
          result: this.scoreForListing(game, pick),
        });
      }
    }
    return entries;
  }

  /** Picked counts per participant and the open games each still has to pick. */
  async listMissingPicks(seasonYear: number, weekNumber: number): Promise<MissingPicksEntry[]> {
    const week = await this.requireWeekByNumber(seasonYear, weekNumber);
    const [games, participants] = await Promise.all([
      this.store.listGamesForWeek(week.week_id),
      this.store.listParticipants(),
    ]);
    const picks = await this.store.listPicksForGames(games.map((game) => game.game_id));
    const picked = new Set(picks.map((pick) => `${pick.participant_id}:${pick.game_id}`));
    const now = this.clock.now();
    const open = games.filter((game) => game.status === 'scheduled' && acceptsPick(game.kickoff_at, now));

    return participants.map((participant) => {
      const has = (game: GameRecord) => picked.has(`${participant.participant_id}:${game.game_id}`);
      return {
        participantId: participant.participant_id,
        displayName: participant.display_name,
        picked: games.filter(has).length,
        totalGames: games.length,
        openGameIds: open.filter((game) => !has(game)).map((game) => game.game_id),
      };
    });
  }

  // ── Props ─────────────────────────────────────────────────────────────────

  async createPropBet(weekId: string, description: string, outcomeDomain: OutcomeDomain): Promise<PropBetRecord> {
    await this.requireWeek(weekId);
    return this.store.createProp(weekId, description.trim(), outcomeDomain);
  }

  /**
   * Store the declared results that fit their prop's domain and grade every
   * pick of the week. Props missing from `results` keep their stored result
   * and grade UNGRADED in the returned grading.
   */
  async declarePropResults(weekId: string, results: PropResultMapping): Promise<PropResultsDeclaration> {
    await this.requireWeek(weekId);
    const props = await this.store.listPropsForWeek(weekId);
    const grading = gradePropsBulk(
      props,
      await this.store.listPropPicksForProps(props.map((prop) => prop.prop_id)),
      results,
    );

    const rejected = new Set(grading.errors.map((err) => err.reference));
    const updated: PropBetRecord[] = [];
    for (const prop of props) {
      const raw = lookupPropResult(results, prop.prop_id);
      if (raw === undefined || rejected.has(prop.prop_id)) continue;
      const value = validatePropResult(prop, raw);
      if (prop.result === value) continue;
      updated.push(await this.store.setPropResult(prop.prop_id, value));
    }

    if (grading.errors.length > 0) {
      this.logger.warn(
        { weekId, rejected: grading.errors.map((err) => err.reference) },
        'prop results outside their outcome domain',
      );
    }
    this.logger.info({ weekId, updated: updated.length, graded: grading.grades.length }, 'prop results declared');
    return { ...grading, updated };
  }

  // ── Administrative corrections ────────────────────────────────────────────

  async adjustPicksDeadline(weekId: string, deadline: Date): Promise<WeekRecord> {
    const week = await this.requireWeek(weekId);
    const updated = await this.store.updateWeek(weekId, { picks_deadline: deadline });
    this.logger.info(
      { weekId, from: week.picks_deadline.toISOString(), to: deadline.toISOString() },
      'picks deadline adjusted',
    );
    return updated;
  }

  /** Replace placeholder teams with real ones once the matchup is known. */
  async resolveGameTeams(gameId: string, homeTeam: string, awayTeam: string): Promise<GameRecord> {
    const game = await this.store.getGame(gameId);
    if (!game) throw AppError.notFound(`Game ${gameId} not found`);

    const home = this.teams.resolve(homeTeam);
    const away = this.teams.resolve(awayTeam);
    if (!home.resolved || !away.resolved) {
      throw AppError.badRequest('Both teams must be known NFL teams', { homeTeam, awayTeam });
    }
    if (home.code === away.code) {
      throw AppError.badRequest('Home and away teams must differ', { homeTeam, awayTeam });
    }

    const updated = await this.store.updateGame(gameId, {
      home_team: home.code,
      away_team: away.code,
      unresolved_team: false,
    });
    this.logger.info({ gameId, home: home.code, away: away.code }, 'game teams resolved');

    const week = await this.store.getWeek(game.week_id);
    if (week && week.graded_at !== null && game.unresolved_team) {
      await this.store.updateWeek(week.week_id, { graded_at: null });
      this.logger.warn({ weekId: week.week_id, gameId }, 'grading re-opened after team resolution');
    }
    return updated;
  }

  /** Set a participant's pick on a game regardless of kickoff, replacing any existing pick. */
  async overridePick(gameId: string, participantId: string, team: string): Promise<PickRecord> {
    const game = await this.store.getGame(gameId);
    if (!game) throw AppError.notFound(`Game ${gameId} not found`);
    await this.requireParticipant(participantId);
    if (game.unresolved_team) {
      throw AppError.badRequest('Game teams are not resolved yet', { gameId });
    }

    const selected = this.matchTeam(game, team);
    if (!selected) {
      throw AppError.badRequest(`${team} is not playing in this game`, { gameId, team });
    }

    const previous = await this.store.getPick(participantId, gameId);
    const pick = await this.store.upsertPick({
      participant_id: participantId,
      game_id: gameId,
      selected_team: selected,
    });
    this.logger.info({ gameId, participantId, from: previous?.selected_team ?? null, to: selected }, 'pick overridden');
    return pick;
  }

  /** Remove every pick a participant made for the week; returns how many were removed. */
  async deleteWeekPicks(weekId: string, participantId: string): Promise<number> {
    await this.requireWeek(weekId);
    await this.requireParticipant(participantId);
    const games = await this.store.listGamesForWeek(weekId);
    const deleted = await this.store.deletePicks(participantId, games.map((game) => game.game_id));
    this.logger.info({ weekId, participantId, deleted }, 'week picks deleted');
    return deleted;
  }

  // ───────────────────────────────────────────────────────────────────────────

  private async requireWeek(weekId: string): Promise<WeekRecord> {
    const week = await this.store.getWeek(weekId);
    if (!week) throw AppError.notFound(`Week ${weekId} not found`);
    return week;
  }

  private async requireWeekByNumber(seasonYear: number, weekNumber: number): Promise<WeekRecord> {
    const week = await this.store.findWeek(seasonYear, weekNumber);
    if (!week) throw AppError.notFound(`Week ${weekNumber} of ${seasonYear} not found`);
    return week;
  }

  private async requireParticipant(participantId: string): Promise<ParticipantRecord> {
    const participant = await this.store.getParticipant(participantId);
    if (!participant) throw AppError.notFound(`Participant ${participantId} not found`);
    return participant;
  }

  private scoreForListing(game: GameRecord, pick: PickRecord): AtsOutcome {
    try {
      return scoreAtsPick(game, pick.selected_team);
    } catch (err) {
      if (!(err instanceof DataIntegrityError)) throw err;
      this.logger.warn({ gameId: game.game_id, pickId: pick.pick_id, error: err.message }, 'pick listed as undecided');
      return 'UNDECIDED';
    }
  }

  /** Canonical code of whichever side `input` names, or null. */
  private matchTeam(game: GameRecord, input: string): string | null {
    const resolution = this.teams.resolve(input);
    const wanted = resolution.code.toUpperCase();
    return [game.home_team, game.away_team].find((team) => team.toUpperCase() === wanted) ?? null;
  }

  private async tally(games: readonly GameRecord[], scope: Record<string, number>): Promise<StandingRow[]> {
    const [participants, picks] = await Promise.all([
      this.store.listParticipants(),
      this.store.listPicksForGames(games.map((game) => game.game_id)),
    ]);
    const { rows, integrityErrors } = tallyStandings(participants, games, picks);
    if (integrityErrors.length > 0) {
      this.logger.warn(
        { ...scope, skipped: integrityErrors.map((err) => err.reference) },
        'games with malformed odds left out of the tally',
      );
    }
    return rows;
  }

  private reject<R extends string>(
    kind: 'ats' | 'prop',
    reason: R,
    context: Record<string, string>,
  ): { status: 'REJECTED'; reason: R } {
    pickSubmissionsTotal.inc({ kind, outcome: reason });
    this.logger.debug({ ...context, reason }, 'pick rejected');
    return { status: 'REJECTED', reason };
  }

  private settle<T, R extends string>(
    kind: 'ats' | 'prop',
    outcome: PickInsertOutcome<T>,
    unknownTarget: R,
    context: Record<string, string>,
  ): SubmissionResult<T, R | 'DEADLINE_PASSED' | 'DUPLICATE_PICK' | 'UNKNOWN_PARTICIPANT'> {
    switch (outcome.status) {
      case 'inserted':
        pickSubmissionsTotal.inc({ kind, outcome: 'ACCEPTED' });
        this.logger.info(context, 'pick accepted');
        return { status: 'ACCEPTED', pick: outcome.record };
      case 'deadline_passed':
        return this.reject(kind, 'DEADLINE_PASSED', context);
      case 'duplicate':
        return this.reject(kind, 'DUPLICATE_PICK', context);
      case 'unknown_participant':
        return this.reject(kind, 'UNKNOWN_PARTICIPANT', context);
      case 'unknown_target':
        return this.reject(kind, unknownTarget, context);
    }
  }
}
