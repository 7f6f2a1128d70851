/**
 * Wires the engine's components from one `AppConfig`. Shared by the HTTP
 * server and the job CLI.
 */

import type { AppConfig } from './config/appConfig';
import { getSupabaseAdmin } from './config/supabaseClient';
import { SupabaseLeagueStore, type LeagueStore } from './repositories';
import { createNotifiers, type Notifiers } from './services/alerts';
import { systemClock, type Clock } from './services/clock/clockService';
import { NflFeedService, getTeamDirectory, type ScheduleProvider } from './services/nflData';
import { PicksService } from './services/picks/picksService';
import { JobRunner } from './services/sync/jobRunner';
import { EspnClient } from './utils/nfl/espnClient';

export interface Container {
  config: AppConfig;
  clock: Clock;
  store: LeagueStore;
  provider: ScheduleProvider;
  notifiers: Notifiers;
  picksService: PicksService;
  jobRunner: JobRunner;
}

export function buildContainer(config: AppConfig): Container {
  const clock = systemClock;
  const teams = getTeamDirectory();
  const store = new SupabaseLeagueStore(getSupabaseAdmin(), config.legacyTimezone);
  const provider = new NflFeedService(
    new EspnClient({ baseUrl: config.espn.baseUrl, timeoutMs: config.espn.timeoutMs, retry: config.espn.retry }),
    teams,
    config.legacyTimezone,
  );
  const notifiers = createNotifiers(config);

  return {
    config,
    clock,
    store,
    provider,
    notifiers,
    picksService: new PicksService(store, clock, teams),
    jobRunner: new JobRunner({
      config,
      clock,
      store,
      provider,
      anomalies: notifiers.anomalies,
      participants: notifiers.participants,
    }),
  };
}

/** Stop in-flight jobs, then flush pending notifications. */
export async function drainContainer(container: Container): Promise<void> {
  await container.jobRunner.shutdown();
  await Promise.all([container.notifiers.anomalies.drain(), container.notifiers.participants.drain()]);
}
