import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { createId } from '@paralleldrive/cuid2';

export const cards = sqliteTable('cards', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  name: text('name').notNull(),
  issuer: text('issuer').notNull(),
  last4: text('last_4').notNull(),
  currency: text('currency').notNull().default('MXN'),
  creditLimitCents: integer('credit_limit_cents').notNull(),
  balanceCents: integer('balance_cents').notNull().default(0),
  dueDateDay: integer('due_date_day').notNull(),
  minimumPaymentCents: integer('minimum_payment_cents'),
  noInterestPaymentCents: integer('no_interest_payment_cents'),
  catBps: integer('cat_bps'),
  sortOrder: integer('sort_order').notNull().default(0),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_cards_last4').on(table.last4),
]);

export const transactions = sqliteTable('transactions', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  cardId: text('card_id').notNull().references(() => cards.id),
  date: text('date').notNull(),
  description: text('description'),
  category: text('category').notNull().default('Other'),
  amountCents: integer('amount_cents').notNull(),
  type: text('type', { enum: ['charge', 'payment'] }).notNull(),
  installments: integer('installments'),
  monthsPaid: integer('months_paid').notNull().default(0),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_tx_card_date').on(table.cardId, table.date),
]);
