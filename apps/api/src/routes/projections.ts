import { Hono } from 'hono';
import { getProjectionOverview, type DashboardOptions, type FinanceRepository } from '@cardwise/engine';
import { formatProjection, sharedCurrency } from '../format.js';

export function projectionRoutes(repo: FinanceRepository, options: DashboardOptions) {
  const router = new Hono();

  // GET / — all cards' schedules summed per month
  router.get('/', (c) => {
    const currency = sharedCurrency(repo.listAccounts().map((card) => card.currency));
    return c.json(getProjectionOverview(repo, options).map((p) => formatProjection(p, currency)));
  });

  return router;
}
