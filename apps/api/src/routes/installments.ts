import { Hono } from 'hono';
import { z } from 'zod';
import { createId } from '@paralleldrive/cuid2';
import {
  computeAllInstallmentDetails,
  MAX_INSTALLMENTS,
  getInstallmentAnalysis,
  sumCents,
  formatMoney,
  type FinanceRepository,
} from '@cardwise/engine';
import { notFound, validationError } from '../errors.js';
import { formatInstallmentDetail, formatInstallmentSummary } from '../format.js';

const simulatedTransactionSchema = z.object({
  id: z.string().optional(),
  description: z.string().nullable().optional(),
  amountCents: z.number().int().positive(),
  installments: z.number().int().min(0).max(MAX_INSTALLMENTS).nullable(),
  monthsPaid: z.number().int().default(0),
});

const simulateRequestSchema = z.object({
  currency: z.string().length(3).default('MXN'),
  transactions: z.array(simulatedTransactionSchema).min(1).max(100),
});

export function installmentRoutes(repo: FinanceRepository) {
  const router = new Hono();

  // GET / — per-card installment breakdown with grand totals
  router.get('/', (c) => {
    const cardId = c.req.query('cardId');
    if (cardId && !repo.getAccount(cardId)) throw notFound('Card', cardId);
    return c.json(formatInstallmentSummary(getInstallmentAnalysis(repo, cardId)));
  });

  // POST /simulate — interest estimate for ad-hoc purchases, nothing stored
  router.post('/simulate', async (c) => {
    const body = await c.req.json();
    const parsed = simulateRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const details = computeAllInstallmentDetails(
      parsed.data.transactions.map((t) => ({ ...t, id: t.id ?? createId() })),
    );
    const totalInterestCents = sumCents(details.map((d) => d.totalInterestCents));
    const { currency } = parsed.data;

    return c.json({
      details: details.map((d) => formatInstallmentDetail(d, currency)),
      totalInterestCents,
      totalInterestFormatted: formatMoney(totalInterestCents, currency),
    });
  });

  return router;
}
