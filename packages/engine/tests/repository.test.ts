import { describe, it, expect, beforeEach } from 'vitest';
import { createDb } from '../src/db/index.js';
import { migrate } from '../src/db/migrate.js';
import { seedDemoData } from '../src/db/seed.js';
import { createSqliteRepository } from '../src/repository/sqlite.js';
import type { FinanceRepository } from '../src/repository/types.js';

function createRepo(): FinanceRepository {
  const db = createDb(':memory:');
  migrate(db);
  return createSqliteRepository(db);
}

describe('SQLite repository', () => {
  let repo: FinanceRepository;

  beforeEach(() => {
    repo = createRepo();
  });

  it('creates and reads back a card with defaults', () => {
    const created = repo.createAccount({
      name: 'Oro',
      issuer: 'Banco Uno',
      last4: '1234',
      creditLimitCents: 2000000,
      dueDateDay: 12,
    });

    expect(created.id).toBeDefined();
    expect(repo.getAccount(created.id)).toEqual({
      id: created.id,
      name: 'Oro',
      issuer: 'Banco Uno',
      last4: '1234',
      currency: 'MXN',
      creditLimitCents: 2000000,
      balanceCents: 0,
      dueDateDay: 12,
      minimumPaymentCents: null,
      noInterestPaymentCents: null,
      catBps: null,
    });
  });

  it('lists cards in creation order and finds one by last4', () => {
    const first = repo.createAccount({ name: 'A', issuer: 'X', last4: '1111', creditLimitCents: 1, dueDateDay: 1 });
    const second = repo.createAccount({ name: 'B', issuer: 'Y', last4: '2222', creditLimitCents: 1, dueDateDay: 1 });

    expect(repo.listAccounts().map((c) => c.id)).toEqual([first.id, second.id]);
    expect(repo.findAccountByLast4('2222')?.id).toBe(second.id);
    expect(repo.findAccountByLast4('9999')).toBeNull();
  });

  it('updates a card and ignores unknown ids', () => {
    const card = repo.createAccount({ name: 'A', issuer: 'X', last4: '1111', creditLimitCents: 1, dueDateDay: 1 });

    expect(repo.updateAccount(card.id, { name: 'Renamed', catBps: 4500 })).toMatchObject({ name: 'Renamed', catBps: 4500 });
    expect(repo.updateAccount('missing', { name: 'Nope' })).toBeNull();
    expect(repo.getAccount('missing')).toBeNull();
  });

  it('saves transactions with defaults and filters by card', () => {
    const a = repo.createAccount({ name: 'A', issuer: 'X', last4: '1111', creditLimitCents: 1, dueDateDay: 1 });
    const b = repo.createAccount({ name: 'B', issuer: 'Y', last4: '2222', creditLimitCents: 1, dueDateDay: 1 });

    const saved = repo.saveTransaction({ cardId: a.id, date: '2026-01-05', amountCents: 1500, type: 'charge' });
    repo.saveTransaction({ cardId: b.id, date: '2026-01-06', amountCents: 900, type: 'charge' });
    repo.saveTransaction({ cardId: a.id, date: '2026-01-02', amountCents: 30000, type: 'charge', installments: 3, monthsPaid: 1 });

    expect(saved).toEqual({
      id: saved.id,
      cardId: a.id,
      date: '2026-01-05',
      description: null,
      category: 'Other',
      amountCents: 1500,
      type: 'charge',
      installments: null,
      monthsPaid: 0,
    });
    expect(repo.listTransactions(a.id).map((t) => t.amountCents)).toEqual([1500, 30000]);
    expect(repo.listTransactions()).toHaveLength(3);
  });
});

describe('seedDemoData', () => {
  it('creates the demo cards once even when run twice', () => {
    const repo = createRepo();
    seedDemoData(repo);
    seedDemoData(repo);

    expect(repo.listAccounts().map((c) => c.last4)).toEqual(['4242', '1881']);
    expect(repo.listTransactions()).toHaveLength(7);
  });
});
