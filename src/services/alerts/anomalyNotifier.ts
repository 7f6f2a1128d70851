/**
 * Anomaly Notifier
 *
 * Jobs report provider outages, empty feeds and malformed records here.
 * `notify` never blocks or throws: delivery runs in the background and
 * failures are logged. `drain` waits for pending deliveries (shutdown,
 * tests).
 */

import { createLogger, type Logger } from '../../utils/logger';
import { errorMessage } from '../../errors';
import { anomaliesTotal } from '../../infrastructure/metrics';
import type { MessageTransport } from './telegramTransport';

export type AnomalyReason =
  | 'EMPTY_RESPONSE'
  | 'PROVIDER_TRANSIENT'
  | 'PROVIDER_PERMANENT'
  | 'DATA_INTEGRITY'
  | 'INTERNAL';

export interface Anomaly {
  job: string;
  reason: AnomalyReason;
  message: string;
  detail?: Record<string, unknown>;
}

export interface AnomalyNotifier {
  notify(anomaly: Anomaly): void;
  drain(): Promise<void>;
}

export function formatAnomaly(anomaly: Anomaly): string {
  return `[${anomaly.job}] ${anomaly.reason}: ${anomaly.message}`;
}

/** Log-only notifier, used when no admin chat is configured. */
export class LoggingAnomalyNotifier implements AnomalyNotifier {
  constructor(private readonly logger: Logger = createLogger('anomalyNotifier')) {}

  notify(anomaly: Anomaly): void {
    anomaliesTotal.inc({ job: anomaly.job, reason: anomaly.reason });
    this.logger.warn({ ...anomaly.detail, job: anomaly.job, reason: anomaly.reason }, anomaly.message);
  }

  async drain(): Promise<void> {}
}

export class TelegramAnomalyNotifier implements AnomalyNotifier {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly transport: MessageTransport,
    private readonly adminChatIds: readonly string[],
    private readonly logger: Logger = createLogger('anomalyNotifier'),
  ) {}

  notify(anomaly: Anomaly): void {
    anomaliesTotal.inc({ job: anomaly.job, reason: anomaly.reason });
    this.logger.warn({ ...anomaly.detail, job: anomaly.job, reason: anomaly.reason }, anomaly.message);

    const text = formatAnomaly(anomaly);
    for (const chatId of this.adminChatIds) {
      const delivery = this.transport.sendMessage(chatId, text).catch((err: unknown) => {
        this.logger.error({ chatId, error: errorMessage(err) }, 'failed to deliver anomaly');
      });
      this.pending.add(delivery);
      void delivery.finally(() => this.pending.delete(delivery));
    }
  }

  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
