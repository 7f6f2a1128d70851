/**
 * ESPN NFL API client.
 *
 * Handles HTTP requests to ESPN's public scoreboard endpoint. Failures are
 * classified as transient (network error, timeout, 5xx, 429, unparseable
 * body) and retried with backoff, or permanent (other 4xx) and surfaced at
 * once. Payload shape is validated by the caller.
 */

import { createLogger, type Logger } from '../logger';
import { ProviderError, JobCancelledError } from '../../errors';
import { externalApiDurationMs } from '../../infrastructure/metrics';
import { retryWithBackoff, RetryExhaustedError, type RetryPolicy, type SleepFn } from '../retry';

export interface ScoreboardQuery {
  /** Season year, sent as `dates`. */
  dates?: number;
  /** 1 = preseason, 2 = regular season, 3 = postseason. */
  seasontype?: number;
  week?: number;
}

export interface EspnClientOptions {
  baseUrl: string;
  timeoutMs: number;
  retry: RetryPolicy;
  fetchImpl?: typeof fetch;
  sleep?: SleepFn;
  random?: () => number;
  logger?: Logger;
}

const USER_AGENT = 'ats-picks-pool/1.0';

export class EspnClient {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: EspnClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createLogger('espnClient');
  }

  buildScoreboardUrl(query: ScoreboardQuery = {}): string {
    const url = new URL(`${this.options.baseUrl}/scoreboard`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  /**
   * Fetch the scoreboard JSON, retrying transient failures.
   * Rejects with `ProviderError` or `JobCancelledError`.
   */
  async getScoreboard(query: ScoreboardQuery = {}, signal?: AbortSignal): Promise<unknown> {
    const url = this.buildScoreboardUrl(query);
    try {
      return await retryWithBackoff((attempt) => this.fetchOnce(url, attempt, signal), {
        policy: this.options.retry,
        isRetryable: (err) => err instanceof ProviderError && err.kind === 'transient',
        signal,
        sleep: this.options.sleep,
        random: this.options.random,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(
            { url, attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
            'scoreboard fetch failed, retrying',
          );
        },
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        const last = err.lastError instanceof ProviderError ? err.lastError : null;
        this.logger.error({ url, attempts: err.attempts, status: last?.status }, 'scoreboard fetch exhausted retries');
        throw new ProviderError(`ESPN scoreboard unavailable after ${err.attempts} attempts: ${last?.message ?? 'unknown'}`, {
          kind: 'transient',
          status: last?.status ?? undefined,
          attempts: err.attempts,
          exhausted: true,
          cause: err.lastError,
        });
      }
      throw err;
    }
  }

  private async fetchOnce(url: string, attempt: number, signal?: AbortSignal): Promise<unknown> {
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
    const start = Date.now();
    let outcome = 'error';

    try {
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
          signal: combined,
        });
      } catch (err) {
        if (signal?.aborted) {
          throw new JobCancelledError('Cancelled during provider request');
        }
        const reason = timeout.aborted ? `timed out after ${this.options.timeoutMs}ms` : String(err);
        throw new ProviderError(`ESPN request failed: ${reason}`, { kind: 'transient', attempts: attempt, cause: err });
      }

      outcome = String(res.status);
      if (res.status === 429 || res.status >= 500) {
        throw new ProviderError(`ESPN responded ${res.status}`, { kind: 'transient', status: res.status, attempts: attempt });
      }
      if (!res.ok) {
        throw new ProviderError(`ESPN responded ${res.status}`, { kind: 'permanent', status: res.status, attempts: attempt });
      }

      try {
        return await res.json();
      } catch (err) {
        outcome = 'malformed';
        throw new ProviderError('ESPN returned a malformed JSON body', {
          kind: 'transient',
          status: res.status,
          attempts: attempt,
          cause: err,
        });
      }
    } finally {
      externalApiDurationMs.observe({ provider: 'espn', outcome }, Date.now() - start);
      this.logger.debug({ url, attempt, outcome, durationMs: Date.now() - start }, 'scoreboard request');
    }
  }
}
