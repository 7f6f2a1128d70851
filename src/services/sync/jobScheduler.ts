/**
 * BullMQ-backed job scheduler.
 *
 * One repeatable BullMQ job per orchestrator job, keyed by name so that
 * several replicas register the same schedule only once. Cron patterns are
 * evaluated in the application timezone. The worker hands each firing to
 * the `JobRunner`, which still guards against overlapping runs inside this
 * process.
 */

import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';
import type { AppConfig } from '../../config/appConfig';
import { JOB_NAMES, isJobName, type JobName } from '../../constants/jobs';
import { errorMessage } from '../../errors';
import { createLogger } from '../../utils/logger';
import type { JobRunner } from './jobRunner';
import type { JobResult } from './syncJobs';

const logger = createLogger('jobScheduler');

const QUEUE_NAME = 'ats-sync-jobs';

interface SyncJobData {
  job: JobName;
}

export class JobScheduler {
  private queue: Queue<SyncJobData, JobResult> | null = null;
  private worker: Worker<SyncJobData, JobResult> | null = null;

  constructor(
    private readonly runner: JobRunner,
    private readonly config: AppConfig,
    private readonly connection: ConnectionOptions,
  ) {}

  async start(): Promise<void> {
    if (this.queue) return;

    const queue = new Queue<SyncJobData, JobResult>(QUEUE_NAME, {
      connection: this.connection,
      defaultJobOptions: {
        // Jobs retry internally; a failed firing waits for the next one.
        attempts: 1,
        removeOnComplete: { age: 3600, count: 500 },
        removeOnFail: { age: 86400 },
      },
    });

    try {
      await queue.getWaitingCount();
      logger.info({}, 'startup health check passed');
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'startup health check failed');
      await queue.close();
      throw err;
    }
    this.queue = queue;

    this.worker = new Worker<SyncJobData, JobResult>(QUEUE_NAME, (job) => this.process(job), {
      connection: this.connection,
      concurrency: JOB_NAMES.length,
    });
    this.worker.on('failed', (job, err) => {
      logger.error({ jobId: job?.id, job: job?.data.job, error: err.message }, 'scheduled job failed');
    });
    this.worker.on('error', (err) => {
      logger.error({ error: err.message }, 'scheduler worker error');
    });

    for (const name of JOB_NAMES) {
      const pattern = this.config.schedules[name];
      await queue.add(name, { job: name }, { repeat: { pattern, tz: this.config.appTimezone }, jobId: name });
      logger.info({ job: name, pattern, tz: this.config.appTimezone }, 'job scheduled');
    }
  }

  async stop(): Promise<void> {
    const closing: Promise<void>[] = [];
    if (this.worker) closing.push(this.worker.close());
    if (this.queue) closing.push(this.queue.close());
    this.worker = null;
    this.queue = null;
    await Promise.all(closing);
    logger.info({}, 'scheduler stopped');
  }

  private async process(job: Job<SyncJobData, JobResult>): Promise<JobResult> {
    const name = job.data.job;
    if (!isJobName(name)) {
      throw new Error(`Unknown sync job: ${String(name)}`);
    }
    return this.runner.run(name);
  }
}
