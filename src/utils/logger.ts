/**
 * Structured Logger (pino-backed)
 *
 * Every log line is a JSON object with pino's `level`, `time` and `msg`,
 * the `service` tag passed to `createLogger`, the payload fields, and
 * whichever of `requestId` (HTTP) or `runId`/`job` (orchestrator run) the
 * current AsyncLocalStorage scope carries.
 *
 * Pipe through `pino-pretty` locally for readable output.
 */

import pino from 'pino';
import { env } from '../config/env';
import { getRequestContext } from './requestContext';

// ─────────────────────────────────────────────────────────────────────────────
// Root pino instance
// ─────────────────────────────────────────────────────────────────────────────

const rootLogger = pino({
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  mixin() {
    const ctx = getRequestContext();
    if (!ctx) return {};
    return {
      ...(ctx.requestId ? { requestId: ctx.requestId } : {}),
      ...(ctx.runId ? { runId: ctx.runId } : {}),
      ...(ctx.job ? { job: ctx.job } : {}),
    };
  },
  serializers: pino.stdSerializers,
});

// ─────────────────────────────────────────────────────────────────────────────
// Public interface
// ─────────────────────────────────────────────────────────────────────────────

export type LogPayload = Record<string, unknown>;

export interface Logger {
  info(payload: LogPayload | string, message?: string): void;
  debug(payload: LogPayload | string, message?: string): void;
  warn(payload: LogPayload | string, message?: string): void;
  error(payload: LogPayload | string, message?: string): void;
}

/**
 * Create a child logger scoped to a specific service / module.
 *
 *   const logger = createLogger('syncJobs');
 *   logger.info({ weekId }, 'week imported');
 */
export function createLogger(prefix: string): Logger {
  const child = rootLogger.child({ service: prefix });

  function log(
    level: 'info' | 'debug' | 'warn' | 'error',
    payload: LogPayload | string,
    message?: string,
  ): void {
    if (typeof payload === 'string') {
      child[level](payload);
    } else {
      child[level](payload, message ?? '');
    }
  }

  return {
    info: (p, m) => log('info', p, m),
    debug: (p, m) => log('debug', p, m),
    warn: (p, m) => log('warn', p, m),
    error: (p, m) => log('error', p, m),
  };
}
