import { Hono } from 'hono';
import { z } from 'zod';
import { MAX_INSTALLMENTS, type FinanceRepository } from '@cardwise/engine';
import { notFound, validationError } from '../errors.js';
import { formatTransaction } from '../format.js';

const createTransactionSchema = z.object({
  cardId: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  description: z.string().nullable().optional(),
  category: z.string().min(1).optional(),
  amountCents: z.number().int(),
  type: z.enum(['charge', 'payment']),
  installments: z.number().int().min(0).max(MAX_INSTALLMENTS).nullable().optional(),
  monthsPaid: z.number().int().optional(),
});

export function transactionRoutes(repo: FinanceRepository) {
  const router = new Hono();

  // GET / — list, optionally for one card
  router.get('/', (c) => {
    const cardId = c.req.query('cardId');
    if (cardId && !repo.getAccount(cardId)) throw notFound('Card', cardId);
    const currencies = new Map(repo.listAccounts().map((card): [string, string] => [card.id, card.currency]));
    return c.json(repo.listTransactions(cardId).map((tx) => formatTransaction(tx, currencies.get(tx.cardId))));
  });

  // POST / — save a transaction
  router.post('/', async (c) => {
    const body = await c.req.json();
    const parsed = createTransactionSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const card = repo.getAccount(parsed.data.cardId);
    if (!card) throw notFound('Card', parsed.data.cardId);

    const created = repo.saveTransaction(parsed.data);
    return c.json(formatTransaction(created, card.currency), 201);
  });

  return router;
}
