/**
 * Minimal Telegram Bot API sender used for admin anomalies and participant
 * notices.
 */

import { ProviderError } from '../../errors';
import { externalApiDurationMs } from '../../infrastructure/metrics';

export interface MessageTransport {
  sendMessage(chatId: string, text: string): Promise<void>;
}

const TELEGRAM_API = 'https://api.telegram.org';

export class TelegramTransport implements MessageTransport {
  constructor(
    private readonly botToken: string,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly timeoutMs = 10_000,
  ) {}

  async sendMessage(chatId: string, text: string): Promise<void> {
    const start = Date.now();
    let outcome = 'error';
    try {
      const res = await this.fetchImpl(`${TELEGRAM_API}/bot${this.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: chatId, text, disable_web_page_preview: true }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      outcome = String(res.status);
      if (!res.ok) {
        throw new ProviderError(`Telegram sendMessage responded ${res.status}`, {
          kind: res.status === 429 || res.status >= 500 ? 'transient' : 'permanent',
          status: res.status,
        });
      }
    } finally {
      externalApiDurationMs.observe({ provider: 'telegram', outcome }, Date.now() - start);
    }
  }
}
