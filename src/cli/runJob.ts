#!/usr/bin/env node
/**
 * Run one orchestrator job outside the scheduler and print its result.
 *
 *   npm run job -- sync_scores_active_week
 *
 * Exit code 0 when the job reports ok, 1 when it fails, 2 on bad usage.
 */

import 'dotenv/config';
import { buildAppConfig } from '../config/appConfig';
import { getEnv } from '../config/env';
import { JOB_NAMES, isJobName, type JobName } from '../constants/jobs';
import { buildContainer, drainContainer } from '../container';
import { errorMessage } from '../errors';
import type { JobResult } from '../services/sync/syncJobs';
import { createLogger } from '../utils/logger';

const logger = createLogger('runJob');

function parseJobArgs(argv: readonly string[]): JobName | null {
  const [name] = argv;
  return name !== undefined && isJobName(name) ? name : null;
}

function exitCodeFor(result: JobResult): number {
  return result.ok ? 0 : 1;
}

async function main(): Promise<number> {
  const name = parseJobArgs(process.argv.slice(2));
  if (!name) {
    process.stderr.write(`usage: ats-pool-job <${JOB_NAMES.join('|')}>\n`);
    return 2;
  }

  const container = buildContainer(buildAppConfig(getEnv()));
  const stop = (): void => {
    void container.jobRunner.shutdown();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const result = await container.jobRunner.run(name);
    process.stdout.write(`${JSON.stringify({ job: name, ...result })}\n`);
    return exitCodeFor(result);
  } finally {
    await drainContainer(container);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ error: errorMessage(err) }, 'job run failed');
    process.exitCode = 1;
  });
