import { describe, it, expect } from 'vitest';
import { createLogger, type Logger } from '../../../src/utils/logger';
import { runWithContext } from '../../../src/utils/requestContext';

describe('logger (pino-backed)', () => {
  it('creates a scoped logger with the four levels', () => {
    const logger: Logger = createLogger('syncJobs');
    expect(Object.keys(logger).sort()).toEqual(['debug', 'error', 'info', 'warn']);
  });

  it('accepts a bare message or a payload with a message', () => {
    const logger = createLogger('picksService');
    expect(() => logger.info('pick accepted')).not.toThrow();
    expect(() => logger.warn({ gameId: 'game-1' }, 'malformed odds')).not.toThrow();
    expect(() => logger.error({ err: new Error('boom') })).not.toThrow();
  });

  it('logs inside a job run scope', () => {
    const logger = createLogger('jobRunner');
    expect(() =>
      runWithContext({ runId: 'run-1', job: 'import_upcoming_week' }, () => logger.debug({ changed: 2 }, 'job done')),
    ).not.toThrow();
  });
});
