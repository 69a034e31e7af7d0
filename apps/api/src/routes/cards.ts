import { Hono } from 'hono';
import { z } from 'zod';
import { cardProjections, type DashboardOptions, type FinanceRepository } from '@cardwise/engine';
import { notFound, validationError } from '../errors.js';
import { formatCard, formatProjection } from '../format.js';

const createCardSchema = z.object({
  name: z.string().min(1),
  issuer: z.string().min(1),
  last4: z.string().regex(/^\d{4}$/),
  currency: z.string().length(3).optional(),
  creditLimitCents: z.number().int().min(0),
  balanceCents: z.number().int().optional(),
  dueDateDay: z.number().int().min(1).max(31),
  minimumPaymentCents: z.number().int().min(0).nullable().optional(),
  noInterestPaymentCents: z.number().int().min(0).nullable().optional(),
  catBps: z.number().int().min(0).nullable().optional(),
});

const updateCardSchema = z.object({
  name: z.string().min(1).optional(),
  creditLimitCents: z.number().int().min(0).optional(),
  dueDateDay: z.number().int().min(1).max(31).optional(),
});

export function cardRoutes(repo: FinanceRepository, options: DashboardOptions) {
  const router = new Hono();

  // GET / — list cards
  router.get('/', (c) => c.json(repo.listAccounts().map(formatCard)));

  // POST / — create card
  router.post('/', async (c) => {
    const body = await c.req.json();
    const parsed = createCardSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const created = repo.createAccount(parsed.data);
    return c.json(formatCard(created), 201);
  });

  // GET /:id — single card
  router.get('/:id', (c) => {
    const id = c.req.param('id');
    const card = repo.getAccount(id);
    if (!card) throw notFound('Card', id);
    return c.json(formatCard(card));
  });

  // PATCH /:id — update name, limit or due day
  router.patch('/:id', async (c) => {
    const id = c.req.param('id');
    if (!repo.getAccount(id)) throw notFound('Card', id);

    const body = await c.req.json();
    const parsed = updateCardSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const updated = repo.updateAccount(id, parsed.data);
    if (!updated) throw notFound('Card', id);
    return c.json(formatCard(updated));
  });

  // GET /:id/projections — forward schedule for one card
  router.get('/:id/projections', (c) => {
    const id = c.req.param('id');
    const card = repo.getAccount(id);
    if (!card) throw notFound('Card', id);

    return c.json({
      cardId: card.id,
      cardName: card.name,
      projections: cardProjections(repo, card, options).map((p) => formatProjection(p, card.currency)),
    });
  });

  return router;
}
