import type { AppConfig } from '../../config/appConfig';
import { LoggingAnomalyNotifier, TelegramAnomalyNotifier, type AnomalyNotifier } from './anomalyNotifier';
import {
  LoggingParticipantNotifier,
  TelegramParticipantNotifier,
  type ParticipantNotifier,
} from './participantNotifier';
import { TelegramTransport } from './telegramTransport';

export * from './anomalyNotifier';
export * from './participantNotifier';
export * from './telegramTransport';

export interface Notifiers {
  anomalies: AnomalyNotifier;
  participants: ParticipantNotifier;
}

/**
 * Telegram delivery when a bot token is configured, log-only otherwise.
 */
export function createNotifiers(config: AppConfig): Notifiers {
  const { botToken, adminChatIds } = config.telegram;
  if (!botToken) {
    return {
      anomalies: new LoggingAnomalyNotifier(),
      participants: new LoggingParticipantNotifier(config.appTimezone),
    };
  }
  const transport = new TelegramTransport(botToken);
  return {
    anomalies: adminChatIds.length > 0 ? new TelegramAnomalyNotifier(transport, adminChatIds) : new LoggingAnomalyNotifier(),
    participants: new TelegramParticipantNotifier(transport, config.appTimezone),
  };
}
