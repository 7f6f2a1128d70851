/**
 * Application Configuration
 *
 * An immutable snapshot of everything the engine's components need, built
 * once at process start from the validated environment. Components receive
 * it through their constructors and never read `process.env` themselves.
 */

import type { Env } from './env';
import { DEFAULT_JOB_SCHEDULES, type JobName } from '../constants/jobs';
import type { RetryPolicy } from '../utils/retry';

export interface AppConfig {
  readonly flags: {
    readonly offseason: boolean;
    readonly allowAnyDayOddsImport: boolean;
  };
  /** Zone attached to timestamps stored without offset information. */
  readonly legacyTimezone: string;
  /** Zone used for day-of-week policies and human-facing labels. */
  readonly appTimezone: string;
  /** 0 = Sunday … 6 = Saturday, evaluated in `appTimezone`. */
  readonly oddsImportWeekday: number;
  readonly reminderLeadHours: number;
  readonly espn: {
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly retry: RetryPolicy;
  };
  readonly telegram: {
    readonly botToken: string | null;
    readonly adminChatIds: readonly string[];
  };
  readonly adminApiToken: string | null;
  readonly corsAllowedOrigins: readonly string[];
  readonly schedules: Readonly<Record<JobName, string>>;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export function buildAppConfig(env: Env): AppConfig {
  return deepFreeze({
    flags: {
      offseason: env.OFFSEASON,
      allowAnyDayOddsImport: env.ALLOW_ANY_DAY_ODDS_IMPORT,
    },
    legacyTimezone: env.LEGACY_TIMEZONE,
    appTimezone: env.APP_TIMEZONE,
    oddsImportWeekday: env.ODDS_IMPORT_WEEKDAY,
    reminderLeadHours: env.REMINDER_LEAD_HOURS,
    espn: {
      baseUrl: env.ESPN_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: env.ESPN_TIMEOUT_MS,
      retry: {
        maxAttempts: env.ESPN_MAX_ATTEMPTS,
        baseDelayMs: env.ESPN_BACKOFF_BASE_MS,
        maxDelayMs: Math.max(env.ESPN_BACKOFF_MAX_MS, env.ESPN_BACKOFF_BASE_MS),
        jitterPercent: env.ESPN_JITTER_PERCENT,
      },
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      adminChatIds: [...env.ADMIN_CHAT_IDS],
    },
    adminApiToken: env.ADMIN_API_TOKEN,
    corsAllowedOrigins: env.CORS_ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    schedules: {
      import_upcoming_week: env.SCHEDULE_IMPORT_UPCOMING_WEEK ?? DEFAULT_JOB_SCHEDULES.import_upcoming_week,
      sync_scores_active_week:
        env.SCHEDULE_SYNC_SCORES_ACTIVE_WEEK ?? DEFAULT_JOB_SCHEDULES.sync_scores_active_week,
      import_odds_upcoming: env.SCHEDULE_IMPORT_ODDS_UPCOMING ?? DEFAULT_JOB_SCHEDULES.import_odds_upcoming,
      send_week_matchups: env.SCHEDULE_SEND_WEEK_MATCHUPS ?? DEFAULT_JOB_SCHEDULES.send_week_matchups,
      grade_completed_week: env.SCHEDULE_GRADE_COMPLETED_WEEK ?? DEFAULT_JOB_SCHEDULES.grade_completed_week,
      send_deadline_reminders:
        env.SCHEDULE_SEND_DEADLINE_REMINDERS ?? DEFAULT_JOB_SCHEDULES.send_deadline_reminders,
    },
  });
}
