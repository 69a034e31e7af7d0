import { Hono } from 'hono';
import {
  formatMoney,
  getCardDetail,
  getDashboardSummary,
  type DashboardOptions,
  type FinanceRepository,
} from '@cardwise/engine';
import { notFound } from '../errors.js';
import { formatCard, formatProjection, formatTransaction, sharedCurrency } from '../format.js';

export function dashboardRoutes(repo: FinanceRepository, options: DashboardOptions) {
  const router = new Hono();

  // GET /summary — total debt, per-card balances, upcoming payments
  router.get('/summary', (c) => {
    const summary = getDashboardSummary(repo, options);
    const currency = sharedCurrency(summary.cards.map((card) => card.currency));
    return c.json({
      totalDebtCents: summary.totalDebtCents,
      totalDebtFormatted: formatMoney(summary.totalDebtCents, currency),
      cards: summary.cards.map((card) => ({
        ...card,
        balanceFormatted: formatMoney(card.balanceCents, card.currency),
        minimumDueFormatted: formatMoney(card.minimumDueCents, card.currency),
      })),
      upcomingPayments: summary.upcomingPayments.map((p) => ({
        ...p,
        estimatedMinimumFormatted: formatMoney(p.estimatedMinimumCents, p.currency),
      })),
    });
  });

  // GET /cards/:id — card with transactions, category totals and projections
  router.get('/cards/:id', (c) => {
    const id = c.req.param('id');
    const detail = getCardDetail(repo, id, options);
    if (!detail) throw notFound('Card', id);

    const { currency } = detail.card;
    return c.json({
      card: formatCard(detail.card),
      transactions: detail.transactions.map((tx) => formatTransaction(tx, currency)),
      categoryAggregates: detail.categoryAggregates.map((a) => ({
        ...a,
        totalFormatted: formatMoney(a.totalCents, currency),
      })),
      projections: detail.projections.map((p) => formatProjection(p, currency)),
    });
  });

  return router;
}
