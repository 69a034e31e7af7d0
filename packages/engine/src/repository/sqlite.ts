import { asc, eq, sql } from 'drizzle-orm';
import type { DB } from '../db/index.js';
import { cards, transactions } from '../db/schema.js';
import type { Card, CardPatch, FinanceRepository, NewCard, NewTransaction, Transaction } from './types.js';

type CardRow = typeof cards.$inferSelect;
type TransactionRow = typeof transactions.$inferSelect;

function toCard(row: CardRow): Card {
  return {
    id: row.id,
    name: row.name,
    issuer: row.issuer,
    last4: row.last4,
    currency: row.currency,
    creditLimitCents: row.creditLimitCents,
    balanceCents: row.balanceCents,
    dueDateDay: row.dueDateDay,
    minimumPaymentCents: row.minimumPaymentCents,
    noInterestPaymentCents: row.noInterestPaymentCents,
    catBps: row.catBps,
  };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    cardId: row.cardId,
    date: row.date,
    description: row.description,
    category: row.category,
    amountCents: row.amountCents,
    type: row.type,
    installments: row.installments,
    monthsPaid: row.monthsPaid,
  };
}

export function createSqliteRepository(db: DB): FinanceRepository {
  function getAccount(id: string): Card | null {
    const row = db.select().from(cards).where(eq(cards.id, id)).get();
    return row ? toCard(row) : null;
  }

  return {
    listAccounts() {
      return db.select().from(cards).orderBy(asc(cards.sortOrder), sql`rowid`).all().map(toCard);
    },

    getAccount,

    findAccountByLast4(last4) {
      const row = db.select().from(cards).where(eq(cards.last4, last4)).orderBy(sql`rowid`).get();
      return row ? toCard(row) : null;
    },

    createAccount(input: NewCard) {
      const sortOrder = db.select({ id: cards.id }).from(cards).all().length;
      const created = db
        .insert(cards)
        .values({
          name: input.name,
          issuer: input.issuer,
          last4: input.last4,
          currency: input.currency ?? 'MXN',
          creditLimitCents: input.creditLimitCents,
          balanceCents: input.balanceCents ?? 0,
          dueDateDay: input.dueDateDay,
          minimumPaymentCents: input.minimumPaymentCents ?? null,
          noInterestPaymentCents: input.noInterestPaymentCents ?? null,
          catBps: input.catBps ?? null,
          sortOrder,
        })
        .returning()
        .get();
      return toCard(created);
    },

    updateAccount(id: string, patch: CardPatch) {
      if (!getAccount(id)) return null;
      db.update(cards)
        .set({ ...patch, updatedAt: new Date().toISOString() })
        .where(eq(cards.id, id))
        .run();
      return getAccount(id);
    },

    listTransactions(cardId?: string) {
      // insertion order
      const rows = cardId
        ? db.select().from(transactions).where(eq(transactions.cardId, cardId)).orderBy(sql`rowid`).all()
        : db.select().from(transactions).orderBy(sql`rowid`).all();
      return rows.map(toTransaction);
    },

    saveTransaction(input: NewTransaction) {
      const created = db
        .insert(transactions)
        .values({
          cardId: input.cardId,
          date: input.date,
          description: input.description ?? null,
          category: input.category ?? 'Other',
          amountCents: input.amountCents,
          type: input.type,
          installments: input.installments ?? null,
          monthsPaid: input.monthsPaid ?? 0,
        })
        .returning()
        .get();
      return toTransaction(created);
    },
  };
}
