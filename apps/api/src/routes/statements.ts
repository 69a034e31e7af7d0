import { Hono } from 'hono';
import { z } from 'zod';
import { importStatement, MAX_INSTALLMENTS, type FinanceRepository } from '@cardwise/engine';
import { validationError } from '../errors.js';
import { formatTransaction } from '../format.js';

const cardInfoSchema = z.object({
  name: z.string().optional(),
  issuer: z.string().optional(),
  last4: z.string().regex(/^\d{4}$/).nullable().optional(),
  currency: z.string().length(3).optional(),
  creditLimitCents: z.number().int().min(0).optional(),
  balanceCents: z.number().int().optional(),
  dueDateDay: z.number().int().min(1).max(31).nullable().optional(),
  minimumPaymentCents: z.number().int().min(0).nullable().optional(),
  noInterestPaymentCents: z.number().int().min(0).nullable().optional(),
  catBps: z.number().int().min(0).nullable().optional(),
});

const statementTransactionSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  description: z.string(),
  category: z.string().min(1).optional(),
  amountCents: z.number().int(),
  type: z.enum(['charge', 'payment']).optional(),
  installments: z.number().int().min(0).max(MAX_INSTALLMENTS).nullable().optional(),
  monthsPaid: z.number().int().optional(),
});

const importSchema = z.object({
  card: cardInfoSchema.nullable().default(null),
  transactions: z.array(statementTransactionSchema).max(1000),
});

export function statementRoutes(repo: FinanceRepository) {
  const router = new Hono();

  // POST /import — apply a parsed statement
  router.post('/import', async (c) => {
    const body = await c.req.json();
    const parsed = importSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const result = importStatement(repo, parsed.data);
    console.log(`Statement import: ${result.added} new transaction(s) on card ${result.cardId}`);

    const currency = repo.getAccount(result.cardId)?.currency;
    return c.json({
      ...result,
      transactions: result.transactions.map((tx) => formatTransaction(tx, currency)),
    });
  });

  return router;
}
