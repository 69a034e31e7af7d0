import type { DB } from './index.js';

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS cards (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    issuer TEXT NOT NULL,
    last_4 TEXT NOT NULL,
    currency TEXT NOT NULL DEFAULT 'MXN',
    credit_limit_cents INTEGER NOT NULL,
    balance_cents INTEGER NOT NULL DEFAULT 0,
    due_date_day INTEGER NOT NULL CHECK(due_date_day BETWEEN 1 AND 31),
    minimum_payment_cents INTEGER,
    no_interest_payment_cents INTEGER,
    cat_bps INTEGER,
    sort_order INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_cards_last4 ON cards(last_4);

  CREATE TABLE IF NOT EXISTS transactions (
    id TEXT PRIMARY KEY,
    card_id TEXT NOT NULL REFERENCES cards(id),
    date TEXT NOT NULL,
    description TEXT,
    category TEXT NOT NULL DEFAULT 'Other',
    amount_cents INTEGER NOT NULL,
    type TEXT NOT NULL CHECK(type IN ('charge', 'payment')),
    installments INTEGER,
    months_paid INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_tx_card_date ON transactions(card_id, date);
`;

export function migrate(db: DB): void {
  db.$client.exec(SCHEMA_SQL);
}
