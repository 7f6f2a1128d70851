/**
 * Express application factory. Kept apart from `index.ts` so tests can
 * mount the full middleware stack without starting the scheduler.
 */

import express, { type Express, type Request, type Response } from 'express';
import cors, { type CorsOptions } from 'cors';
import type { AppConfig } from './config/appConfig';
import { getHealthStatus, type HealthStatus } from './infrastructure/healthCheck';
import { renderMetrics } from './infrastructure/metrics';
import { errorHandler, httpMetricsMiddleware, notFoundHandler, requestIdMiddleware } from './middleware';
import { createApiRouter } from './routes/api';
import type { PicksService } from './services/picks/picksService';
import type { JobRunner } from './services/sync/jobRunner';

export interface AppDeps {
  config: AppConfig;
  picksService: PicksService;
  jobRunner: JobRunner;
  /** Overridable for tests. */
  healthCheck?: () => Promise<HealthStatus>;
}

function buildCorsOptions(allowed: readonly string[]): CorsOptions {
  const allowedOrigins = new Set(allowed);
  const allowAll = allowedOrigins.has('*');
  return {
    origin(origin, callback) {
      if (!origin || allowAll || allowedOrigins.has(origin)) {
        callback(null, true);
        return;
      }
      callback(null, false);
    },
  };
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const healthCheck = deps.healthCheck ?? getHealthStatus;

  app.use(requestIdMiddleware);
  app.use(httpMetricsMiddleware);
  app.use(cors(buildCorsOptions(deps.config.corsAllowedOrigins)));
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response, next) => {
    healthCheck()
      .then((status) => {
        res.status(status.status === 'unhealthy' ? 503 : 200).json(status);
      })
      .catch(next);
  });

  app.get('/metrics', (_req: Request, res: Response) => {
    res.type('text/plain; version=0.0.4').send(renderMetrics());
  });

  app.use(
    '/api',
    createApiRouter({
      picksService: deps.picksService,
      jobRunner: deps.jobRunner,
      adminApiToken: deps.config.adminApiToken,
    }),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
