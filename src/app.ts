import express from 'express';
import type { AppContext } from './appContext';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { createRequestLogger, type RequestLogSink } from './middleware/requestLogger.middleware';
import { createAlertsRouter } from './routes/alerts.routes';
import { createCatalogRouter } from './routes/catalog.routes';
import { createDispensesRouter } from './routes/dispenses.routes';
import healthRouter, { createReadinessRouter } from './routes/health.routes';
import { createLotsRouter } from './routes/lots.routes';
import { createPlanningRouter } from './routes/planning.routes';
import { createRedistributionRouter } from './routes/redistribution.routes';

export type CreateAppOptions = {
  logSink?: RequestLogSink;
  healthProbeTimeoutMs?: number;
};

export function createApp(ctx: AppContext, options: CreateAppOptions = {}) {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(requestContextMiddleware);
  app.use(createRequestLogger(options.logSink));

  app.use(healthRouter);
  app.use(createReadinessRouter(ctx, options.healthProbeTimeoutMs ?? 1500));
  app.use(createCatalogRouter(ctx));
  app.use(createLotsRouter(ctx));
  app.use(createDispensesRouter(ctx));
  app.use(createRedistributionRouter(ctx));
  app.use(createAlertsRouter(ctx));
  app.use(createPlanningRouter(ctx));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
