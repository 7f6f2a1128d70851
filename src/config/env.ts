/**
 * Environment Configuration
 *
 * Validates and exports typed environment variables using Zod.
 * Fails fast on startup if required variables are missing or invalid.
 *
 * Components never read this directly; `buildAppConfig` turns it into the
 * immutable `AppConfig` passed to their constructors. Only process-level
 * plumbing (logger, Redis, Supabase client) reads `env`.
 */

import { z } from 'zod';
import { isValidTimeZone } from '../services/clock/clockService';

// ─────────────────────────────────────────────────────────────────────────────
// Schema Definition
// ─────────────────────────────────────────────────────────────────────────────

const booleanFlag = z
  .string()
  .transform((val) => ['true', '1', 'yes', 'on'].includes(val.trim().toLowerCase()))
  .default(false);

const timeZone = z.string().trim().refine(isValidTimeZone, 'Must be an IANA time zone identifier');

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? val : null));

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  CORS_ALLOWED_ORIGINS: z.string().default('*'),
  ADMIN_API_TOKEN: optionalSecret,

  // Supabase (required)
  SUPABASE_URL: z.url().min(1, 'SUPABASE_URL is required'),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'SUPABASE_SERVICE_ROLE_KEY is required'),

  // Redis (required)
  REDIS_URL: z.string().min(1, 'REDIS_URL is required'),

  // Operational flags
  OFFSEASON: booleanFlag,
  ALLOW_ANY_DAY_ODDS_IMPORT: booleanFlag,
  LEGACY_TIMEZONE: timeZone.default('America/Los_Angeles'),
  APP_TIMEZONE: timeZone.default('America/Los_Angeles'),
  ODDS_IMPORT_WEEKDAY: z.coerce.number().int().min(0).max(6).default(2),
  REMINDER_LEAD_HOURS: z.coerce.number().positive().default(24),

  // ESPN client
  ESPN_BASE_URL: z.url().default('https://site.api.espn.com/apis/site/v2/sports/football/nfl'),
  ESPN_TIMEOUT_MS: z.coerce.number().int().min(1000).default(20_000),
  ESPN_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  ESPN_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(1500),
  ESPN_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(15_000),
  ESPN_JITTER_PERCENT: z.coerce.number().int().min(0).max(100).default(20),

  // Telegram delivery
  TELEGRAM_BOT_TOKEN: optionalSecret,
  ADMIN_CHAT_IDS: z
    .string()
    .transform((val) =>
      val
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    )
    .default([]),

  // Job schedules (cron)
  SCHEDULE_IMPORT_UPCOMING_WEEK: z.string().trim().min(1).optional(),
  SCHEDULE_SYNC_SCORES_ACTIVE_WEEK: z.string().trim().min(1).optional(),
  SCHEDULE_IMPORT_ODDS_UPCOMING: z.string().trim().min(1).optional(),
  SCHEDULE_SEND_WEEK_MATCHUPS: z.string().trim().min(1).optional(),
  SCHEDULE_GRADE_COMPLETED_WEEK: z.string().trim().min(1).optional(),
  SCHEDULE_SEND_DEADLINE_REMINDERS: z.string().trim().min(1).optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/**
 * Get the validated environment configuration.
 * Parses on first call and caches the result.
 * Throws if validation fails.
 */
export function getEnv(): Env {
  if (_env) {
    return _env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  _env = result.data;
  return _env;
}

/**
 * Validate environment on import for fail-fast behavior.
 * In test environment, we allow partial configs.
 */
function validateOnStartup(): void {
  try {
    getEnv();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

if (process.env.NODE_ENV !== 'test') {
  validateOnStartup();
}

// Lazy view over the validated environment
export const env: Env = new Proxy<Env>(Object.create(null), {
  get(_target, prop) {
    return Reflect.get(getEnv(), prop);
  },
});
