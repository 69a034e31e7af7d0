import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { createSqliteRepository, DEFAULT_MINIMUM_DUE_RATE, type DB, type DashboardOptions } from '@cardwise/engine';
import { cardRoutes } from './routes/cards.js';
import { transactionRoutes } from './routes/transactions.js';
import { statementRoutes } from './routes/statements.js';
import { dashboardRoutes } from './routes/dashboard.js';
import { projectionRoutes } from './routes/projections.js';
import { installmentRoutes } from './routes/installments.js';
import { AppError } from './errors.js';

export const APP_VERSION = '0.1.0';

export interface AppOptions {
  corsOrigins?: string[];
  minimumDueRate?: number;
  /** Fixes "today" (`YYYY-MM-DD`) for projections and due dates. */
  today?: string;
}

export function createApp(db: DB, options: AppOptions = {}) {
  const app = new Hono();
  const repo = createSqliteRepository(db);
  const dashboard: DashboardOptions = {
    minimumDueRate: options.minimumDueRate ?? DEFAULT_MINIMUM_DUE_RATE,
    today: options.today,
  };

  app.use('*', cors(options.corsOrigins ? { origin: options.corsOrigins } : undefined));
  app.use('*', logger());

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(
        { error: { code: err.code, message: err.message, suggestion: err.suggestion } },
        err.status,
      );
    }
    console.error(err);
    return c.json(
      { error: { code: 'INTERNAL_ERROR', message: err.message, suggestion: 'Check server logs' } },
      500,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: APP_VERSION }));

  app.route('/api/v1/cards', cardRoutes(repo, dashboard));
  app.route('/api/v1/transactions', transactionRoutes(repo));
  app.route('/api/v1/statements', statementRoutes(repo));
  app.route('/api/v1/dashboard', dashboardRoutes(repo, dashboard));
  app.route('/api/v1/projections', projectionRoutes(repo, dashboard));
  app.route('/api/v1/installments', installmentRoutes(repo));

  return app;
}
