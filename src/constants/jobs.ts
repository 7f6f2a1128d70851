/**
 * Orchestrator job names and their default repeat patterns.
 */

export const JOB_NAMES = [
  'import_upcoming_week',
  'sync_scores_active_week',
  'import_odds_upcoming',
  'send_week_matchups',
  'grade_completed_week',
  'send_deadline_reminders',
] as const;

export type JobName = (typeof JOB_NAMES)[number];

export function isJobName(value: string): value is JobName {
  const names: readonly string[] = JOB_NAMES;
  return names.includes(value);
}

/** Cron patterns, evaluated in APP_TIMEZONE. */
export const DEFAULT_JOB_SCHEDULES: Readonly<Record<JobName, string>> = {
  import_upcoming_week: '0 6 * * 2',
  sync_scores_active_week: '*/10 * * * *',
  import_odds_upcoming: '0 9 * * 2',
  send_week_matchups: '30 9 * * 2',
  grade_completed_week: '15 * * * *',
  send_deadline_reminders: '0 * * * *',
};

/** Highest internal week number (Super Bowl). */
export const LAST_WEEK_NUMBER = 23;

/** Last regular-season week; anything above is a playoff round. */
export const LAST_REGULAR_SEASON_WEEK = 18;

export const PLAYOFF_ROUND_LABELS: Readonly<Record<number, string>> = {
  19: 'Wild Card',
  20: 'Divisional Round',
  21: 'Conference Championships',
  22: 'Pro Bowl',
  23: 'Super Bowl',
};

export function weekLabel(weekNumber: number): string {
  return PLAYOFF_ROUND_LABELS[weekNumber] ?? `Week ${weekNumber}`;
}
