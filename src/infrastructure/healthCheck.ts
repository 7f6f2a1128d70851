/**
 * Dependency checks behind `GET /health`.
 *
 * Redis backs the job scheduler and Supabase the league store. The service
 * is degraded while either is down and unhealthy when both are.
 */

import { getRedisClient } from '../utils/redisClient';
import { getSupabaseAdmin } from '../config/supabaseClient';
import { errorMessage } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('healthCheck');

export interface HealthCheckResult {
  ok: boolean;
  latencyMs?: number;
  error?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    redis: HealthCheckResult;
    supabase: HealthCheckResult;
  };
}

/** A check resolves to null when the dependency answered, else the failure text. */
type DependencyCheck = () => Promise<string | null>;

// PostgREST JWT rejection and Postgres permission denied both prove the link is up.
const REACHABLE_ERROR_CODES = new Set(['PGRST301', '42501']);

async function timed(dependency: string, check: DependencyCheck): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    const failure = await check();
    const latencyMs = Date.now() - start;
    return failure === null ? { ok: true, latencyMs } : { ok: false, latencyMs, error: failure };
  } catch (err) {
    const message = errorMessage(err);
    logger.warn({ dependency, error: message }, 'health check failed');
    return { ok: false, latencyMs: Date.now() - start, error: message };
  }
}

export function checkRedisHealth(): Promise<HealthCheckResult> {
  return timed('redis', async () => {
    const reply = await getRedisClient().ping();
    return reply === 'PONG' ? null : `Unexpected PING response: ${reply}`;
  });
}

export function checkSupabaseHealth(): Promise<HealthCheckResult> {
  return timed('supabase', async () => {
    const { error } = await getSupabaseAdmin().from('weeks').select('week_id').limit(1);
    if (!error || REACHABLE_ERROR_CODES.has(error.code)) return null;
    return error.message;
  });
}

const bootedAt = Date.now();

export async function getHealthStatus(): Promise<HealthStatus> {
  const [redis, supabase] = await Promise.all([checkRedisHealth(), checkSupabaseHealth()]);
  const passing = [redis, supabase].filter((check) => check.ok).length;

  return {
    status: passing === 2 ? 'healthy' : passing === 1 ? 'degraded' : 'unhealthy',
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - bootedAt) / 1000),
    checks: { redis, supabase },
  };
}
