/**
 * Participant-facing notices: the week's matchups when it opens,
 * missing-pick reminders before kickoff and the weekly ATS results once a
 * week is graded. Delivery is
 * fire-and-forget, like anomalies; the reminders table already guarantees
 * each notice is handed over at most once.
 */

import { createLogger, type Logger } from '../../utils/logger';
import { errorMessage } from '../../errors';
import { weekLabel } from '../../constants/jobs';
import { formatLocal } from '../clock/clockService';
import type { StandingRow } from '../grading/standings';
import type { GameRecord, ParticipantRecord, WeekRecord } from '../../types/domain';
import type { MessageTransport } from './telegramTransport';

export interface WeekMatchupsNotice {
  participant: ParticipantRecord;
  week: WeekRecord;
  /** Games still open for picks, in kickoff order. */
  games: readonly GameRecord[];
}

export interface DeadlineReminder {
  participant: ParticipantRecord;
  week: WeekRecord;
  missingGames: readonly GameRecord[];
  /** Kickoff of the earliest missing game. */
  closesAt: Date;
}

export interface WeeklyResultsNotice {
  participant: ParticipantRecord;
  week: WeekRecord;
  record: StandingRow;
  rank: number;
  participants: number;
}

export interface ParticipantNotifier {
  sendWeekMatchups(notice: WeekMatchupsNotice): void;
  sendDeadlineReminder(reminder: DeadlineReminder): void;
  sendWeeklyResults(notice: WeeklyResultsNotice): void;
  drain(): Promise<void>;
}

/** "KC -3.5", "pick'em" for a zero spread, "line TBD" before odds arrive. */
export function spreadLabel(game: Pick<GameRecord, 'favorite_team' | 'spread_pts'>): string {
  if (game.favorite_team === null || game.spread_pts === null) return 'line TBD';
  if (game.spread_pts === 0) return "pick'em";
  return `${game.favorite_team} -${game.spread_pts}`;
}

export function formatWeekMatchups(notice: WeekMatchupsNotice, zone: string): string {
  const { week, games } = notice;
  const lines = games.map(
    (game) => `${game.away_team} @ ${game.home_team}, ${formatLocal(game.kickoff_at, zone)}, ${spreadLabel(game)}`,
  );
  return [`${week.season_year} ${weekLabel(week.week_number)} is open for picks:`, ...lines].join('\n');
}

export function formatDeadlineReminder(reminder: DeadlineReminder, zone: string): string {
  const { week, missingGames, closesAt } = reminder;
  const games = missingGames.map((game) => `${game.away_team} @ ${game.home_team}`).join(', ');
  return (
    `${week.season_year} ${weekLabel(week.week_number)}: next pick closes ${formatLocal(closesAt, zone)}. ` +
    `Still missing: ${games}`
  );
}

export function formatWeeklyResults(notice: WeeklyResultsNotice): string {
  const { week, record, rank, participants } = notice;
  return (
    `${week.season_year} ${weekLabel(week.week_number)} results: ` +
    `${record.wins}-${record.losses}-${record.pushes} (rank ${rank} of ${participants})`
  );
}

export class LoggingParticipantNotifier implements ParticipantNotifier {
  constructor(
    private readonly zone: string,
    private readonly logger: Logger = createLogger('participantNotifier'),
  ) {}

  sendWeekMatchups(notice: WeekMatchupsNotice): void {
    this.logger.info({ participantId: notice.participant.participant_id }, formatWeekMatchups(notice, this.zone));
  }

  sendDeadlineReminder(reminder: DeadlineReminder): void {
    this.logger.info(
      { participantId: reminder.participant.participant_id },
      formatDeadlineReminder(reminder, this.zone),
    );
  }

  sendWeeklyResults(notice: WeeklyResultsNotice): void {
    this.logger.info({ participantId: notice.participant.participant_id }, formatWeeklyResults(notice));
  }

  async drain(): Promise<void> {}
}

export class TelegramParticipantNotifier implements ParticipantNotifier {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly transport: MessageTransport,
    private readonly zone: string,
    private readonly logger: Logger = createLogger('participantNotifier'),
  ) {}

  sendWeekMatchups(notice: WeekMatchupsNotice): void {
    this.deliver(notice.participant, formatWeekMatchups(notice, this.zone));
  }

  sendDeadlineReminder(reminder: DeadlineReminder): void {
    this.deliver(reminder.participant, formatDeadlineReminder(reminder, this.zone));
  }

  sendWeeklyResults(notice: WeeklyResultsNotice): void {
    this.deliver(notice.participant, formatWeeklyResults(notice));
  }

  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private deliver(participant: ParticipantRecord, text: string): void {
    const delivery = this.transport.sendMessage(participant.external_id, text).catch((err: unknown) => {
      this.logger.error(
        { participantId: participant.participant_id, error: errorMessage(err) },
        'failed to deliver participant notice',
      );
    });
    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }
}
