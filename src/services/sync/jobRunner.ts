/**
 * Job Runner
 *
 * Runs one orchestrator job at a time per name. A run requested while the
 * same job is in flight returns immediately as skipped. Each run gets its
 * own abort controller and run id; `shutdown` aborts every run and waits
 * for them to settle.
 */

import { randomUUID } from 'crypto';
import type { AppConfig } from '../../config/appConfig';
import type { JobName } from '../../constants/jobs';
import { errorMessage } from '../../errors';
import { jobDurationMs, jobRunsTotal, jobsInFlight } from '../../infrastructure/metrics';
import type { LeagueStore } from '../../repositories/types';
import { createLogger } from '../../utils/logger';
import { runWithContext } from '../../utils/requestContext';
import type { AnomalyNotifier } from '../alerts/anomalyNotifier';
import type { ParticipantNotifier } from '../alerts/participantNotifier';
import type { Clock } from '../clock/clockService';
import type { ScheduleProvider } from '../nflData/types';
import { SYNC_JOBS, type JobHandler, type JobResult } from './syncJobs';

const logger = createLogger('jobRunner');

export interface JobRunnerDeps {
  config: AppConfig;
  clock: Clock;
  store: LeagueStore;
  provider: ScheduleProvider;
  anomalies: AnomalyNotifier;
  participants: ParticipantNotifier;
}

interface InFlightRun {
  controller: AbortController;
  done: Promise<JobResult>;
}

function outcomeOf(result: JobResult): string {
  if (result.skipped) return 'skipped';
  if (result.ok) return 'ok';
  return result.errorReason ?? 'error';
}

export class JobRunner {
  private readonly inFlight = new Map<JobName, InFlightRun>();
  private closed = false;

  constructor(
    private readonly deps: JobRunnerDeps,
    private readonly handlers: Readonly<Record<JobName, JobHandler>> = SYNC_JOBS,
  ) {}

  isRunning(name: JobName): boolean {
    return this.inFlight.has(name);
  }

  async run(name: JobName): Promise<JobResult> {
    if (this.closed) {
      return { ok: false, changed: 0, errorReason: 'CANCELLED', detail: 'runner is shut down' };
    }
    if (this.inFlight.has(name)) {
      logger.info({ job: name }, 'job already running, skipping');
      jobRunsTotal.inc({ job: name, outcome: 'skipped' });
      return { ok: true, changed: 0, skipped: 'ALREADY_RUNNING' };
    }

    const controller = new AbortController();
    const runId = randomUUID();
    const done = runWithContext({ runId, job: name }, () => this.execute(name, controller.signal));
    this.inFlight.set(name, { controller, done });
    try {
      return await done;
    } finally {
      this.inFlight.delete(name);
    }
  }

  /** Abort all in-flight runs and wait for them to return. */
  async shutdown(): Promise<void> {
    this.closed = true;
    const runs = [...this.inFlight.values()];
    runs.forEach((run) => run.controller.abort());
    await Promise.allSettled(runs.map((run) => run.done));
  }

  private async execute(name: JobName, signal: AbortSignal): Promise<JobResult> {
    const start = Date.now();
    const jobLogger = createLogger(`job:${name}`);
    jobsInFlight.inc({ job: name });
    jobLogger.info('job started');

    let result: JobResult;
    try {
      result = await this.handlers[name]({ ...this.deps, signal, logger: jobLogger });
    } catch (err) {
      // Handlers report their own failures; anything reaching here is a bug.
      jobLogger.error({ error: errorMessage(err) }, 'job handler threw');
      this.deps.anomalies.notify({ job: name, reason: 'INTERNAL', message: errorMessage(err) });
      result = { ok: false, changed: 0, errorReason: 'INTERNAL', detail: errorMessage(err) };
    } finally {
      jobsInFlight.dec({ job: name });
    }

    const durationMs = Date.now() - start;
    jobRunsTotal.inc({ job: name, outcome: outcomeOf(result) });
    jobDurationMs.observe({ job: name }, durationMs);
    jobLogger.info({ ...result, durationMs }, 'job result');
    return result;
  }
}
