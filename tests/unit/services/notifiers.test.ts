import { describe, it, expect, vi } from 'vitest';
import {
  createNotifiers,
  formatAnomaly,
  formatDeadlineReminder,
  formatWeekMatchups,
  formatWeeklyResults,
  LoggingAnomalyNotifier,
  LoggingParticipantNotifier,
  TelegramAnomalyNotifier,
  TelegramParticipantNotifier,
  TelegramTransport,
  type MessageTransport,
} from '../../../src/services/alerts';
import { ProviderError } from '../../../src/errors';
import { makeGame, makeParticipant, makeWeek, testConfig } from '../../fixtures/factories';
import { silentLogger } from '../../helpers/fakes';

class RecordingTransport implements MessageTransport {
  readonly sent: { chatId: string; text: string }[] = [];
  failFor = new Set<string>();

  async sendMessage(chatId: string, text: string): Promise<void> {
    if (this.failFor.has(chatId)) throw new Error(`chat ${chatId} blocked the bot`);
    this.sent.push({ chatId, text });
  }
}

const standing = {
  participantId: 'participant-a',
  externalId: 'chat-100',
  displayName: 'Avery',
  wins: 3,
  losses: 1,
  pushes: 1,
};

describe('message formatting', () => {
  it('formats an anomaly line', () => {
    expect(
      formatAnomaly({ job: 'import_odds_upcoming', reason: 'DATA_INTEGRITY', message: 'Favorite PHI is not playing' }),
    ).toBe('[import_odds_upcoming] DATA_INTEGRITY: Favorite PHI is not playing');
  });

  it('lists the missing games with the next local kickoff', () => {
    const text = formatDeadlineReminder(
      {
        participant: makeParticipant(),
        week: makeWeek(),
        missingGames: [makeGame(), makeGame({ game_id: 'game-2', home_team: 'DAL', away_team: 'NYG' })],
        closesAt: new Date('2025-09-07T17:00:00.000Z'),
      },
      'America/Los_Angeles',
    );
    expect(text).toBe(
      '2025 Week 1: next pick closes Sun 09/07 10:00 America/Los_Angeles. Still missing: BUF @ KC, NYG @ DAL',
    );
  });

  it('lists each matchup with its kickoff and line', () => {
    const text = formatWeekMatchups(
      {
        participant: makeParticipant(),
        week: makeWeek(),
        games: [
          makeGame({ favorite_team: 'KC', spread_pts: 3.5 }),
          makeGame({
            game_id: 'game-2',
            home_team: 'DAL',
            away_team: 'NYG',
            kickoff_at: new Date('2025-09-08T00:20:00.000Z'),
            favorite_team: 'DAL',
            spread_pts: 0,
          }),
          makeGame({
            game_id: 'game-3',
            home_team: 'SF',
            away_team: 'LAR',
            kickoff_at: new Date('2025-09-09T00:15:00.000Z'),
          }),
        ],
      },
      'America/Los_Angeles',
    );
    expect(text.split('\n')).toEqual([
      '2025 Week 1 is open for picks:',
      'BUF @ KC, Sun 09/07 10:00 America/Los_Angeles, KC -3.5',
      "NYG @ DAL, Sun 09/07 17:20 America/Los_Angeles, pick'em",
      'LAR @ SF, Mon 09/08 17:15 America/Los_Angeles, line TBD',
    ]);
  });

  it('names playoff rounds in the weekly results', () => {
    const text = formatWeeklyResults({
      participant: makeParticipant(),
      week: makeWeek({ week_number: 19, is_playoff: true }),
      record: standing,
      rank: 2,
      participants: 5,
    });
    expect(text).toBe('2025 Wild Card results: 3-1-1 (rank 2 of 5)');
  });
});

describe('TelegramAnomalyNotifier', () => {
  it('sends the anomaly to every admin chat', async () => {
    const transport = new RecordingTransport();
    const notifier = new TelegramAnomalyNotifier(transport, ['100', '200'], silentLogger());

    notifier.notify({ job: 'sync_scores_active_week', reason: 'PROVIDER_TRANSIENT', message: 'ESPN responded 503' });
    await notifier.drain();

    expect(transport.sent).toEqual([
      { chatId: '100', text: '[sync_scores_active_week] PROVIDER_TRANSIENT: ESPN responded 503' },
      { chatId: '200', text: '[sync_scores_active_week] PROVIDER_TRANSIENT: ESPN responded 503' },
    ]);
  });

  it('logs a failed delivery without throwing', async () => {
    const transport = new RecordingTransport();
    transport.failFor.add('100');
    const logger = silentLogger();
    const notifier = new TelegramAnomalyNotifier(transport, ['100', '200'], logger);

    expect(() => notifier.notify({ job: 'grade_completed_week', reason: 'INTERNAL', message: 'boom' })).not.toThrow();
    await notifier.drain();

    expect(transport.sent.map((m) => m.chatId)).toEqual(['200']);
    expect(logger.error).toHaveBeenCalledWith(
      { chatId: '100', error: 'chat 100 blocked the bot' },
      'failed to deliver anomaly',
    );
  });
});

describe('TelegramParticipantNotifier', () => {
  it('delivers notices to the participant external id', async () => {
    const transport = new RecordingTransport();
    const notifier = new TelegramParticipantNotifier(transport, 'UTC', silentLogger());

    notifier.sendWeeklyResults({
      participant: makeParticipant(),
      week: makeWeek(),
      record: standing,
      rank: 1,
      participants: 3,
    });
    notifier.sendDeadlineReminder({
      participant: makeParticipant(),
      week: makeWeek(),
      missingGames: [makeGame()],
      closesAt: new Date('2025-09-07T17:00:00.000Z'),
    });
    notifier.sendWeekMatchups({ participant: makeParticipant(), week: makeWeek(), games: [makeGame()] });
    await notifier.drain();

    expect(transport.sent).toEqual([
      { chatId: 'chat-100', text: '2025 Week 1 results: 3-1-1 (rank 1 of 3)' },
      { chatId: 'chat-100', text: '2025 Week 1: next pick closes Sun 09/07 17:00 UTC. Still missing: BUF @ KC' },
      { chatId: 'chat-100', text: '2025 Week 1 is open for picks:\nBUF @ KC, Sun 09/07 17:00 UTC, line TBD' },
    ]);
  });
});

describe('TelegramTransport', () => {
  function fakeFetch(status: number) {
    const calls: { url: string; body: unknown }[] = [];
    const impl = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      calls.push({ url: String(input), body: JSON.parse(String(init?.body)) });
      return new Response('{}', { status });
    });
    return { calls, impl };
  }

  it('posts the message to the bot endpoint', async () => {
    const { calls, impl } = fakeFetch(200);
    await new TelegramTransport('test-secret', impl).sendMessage('100', 'hello');

    expect(calls).toEqual([
      {
        url: 'https://api.telegram.org/bottest-secret/sendMessage',
        body: { chat_id: '100', text: 'hello', disable_web_page_preview: true },
      },
    ]);
  });

  it('classifies rate limiting as transient', async () => {
    const { impl } = fakeFetch(429);
    const failure = new TelegramTransport('test-secret', impl).sendMessage('100', 'hello');
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toMatchObject({ kind: 'transient', status: 429 });
  });

  it('classifies a bad request as permanent', async () => {
    const { impl } = fakeFetch(400);
    await expect(new TelegramTransport('test-secret', impl).sendMessage('100', 'hello')).rejects.toMatchObject({
      kind: 'permanent',
      message: 'Telegram sendMessage responded 400',
    });
  });
});

describe('createNotifiers', () => {
  it('logs only without a bot token', () => {
    const notifiers = createNotifiers(testConfig());
    expect(notifiers.anomalies).toBeInstanceOf(LoggingAnomalyNotifier);
    expect(notifiers.participants).toBeInstanceOf(LoggingParticipantNotifier);
  });

  it('uses Telegram when a token and admin chats are configured', () => {
    const notifiers = createNotifiers({ ...testConfig(), telegram: { botToken: 'test-secret', adminChatIds: ['100'] } });
    expect(notifiers.anomalies).toBeInstanceOf(TelegramAnomalyNotifier);
    expect(notifiers.participants).toBeInstanceOf(TelegramParticipantNotifier);
  });

  it('keeps anomalies log-only without admin chats', () => {
    const notifiers = createNotifiers({ ...testConfig(), telegram: { botToken: 'test-secret', adminChatIds: [] } });
    expect(notifiers.anomalies).toBeInstanceOf(LoggingAnomalyNotifier);
    expect(notifiers.participants).toBeInstanceOf(TelegramParticipantNotifier);
  });
});
