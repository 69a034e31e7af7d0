import { addCents, sumCents } from '../math/money.js';
import type { Card, CardPatch, FinanceRepository, Transaction, TransactionType } from '../repository/types.js';

export interface StatementCardInfo {
  name?: string;
  issuer?: string;
  last4?: string | null;
  currency?: string;
  creditLimitCents?: number;
  balanceCents?: number;
  dueDateDay?: number | null;
  minimumPaymentCents?: number | null;
  noInterestPaymentCents?: number | null;
  catBps?: number | null;
}

export interface StatementTransaction {
  date: string;
  description: string;
  category?: string;
  amountCents: number;
  type?: TransactionType;
  installments?: number | null;
  monthsPaid?: number;
}

export interface StatementImport {
  card: StatementCardInfo | null;
  transactions: StatementTransaction[];
}

export interface ImportResult {
  added: number;
  cardId: string;
  cardName: string;
  transactions: Transaction[];
}

const DEFAULT_CREDIT_LIMIT_CENTS = 1000000;
const DEFAULT_DUE_DATE_DAY = 15;

function normalizeDescription(description: string | null): string {
  return (description ?? '').trim().toLowerCase();
}

export function isDuplicateTransaction(
  existing: Pick<Transaction, 'date' | 'amountCents' | 'description'>[],
  candidate: Pick<Transaction, 'date' | 'amountCents' | 'description'>,
): boolean {
  const description = normalizeDescription(candidate.description);
  return existing.some(
    (tx) =>
      tx.date === candidate.date &&
      tx.amountCents === candidate.amountCents &&
      normalizeDescription(tx.description) === description,
  );
}

function statementPatch(info: StatementCardInfo): CardPatch {
  const patch: CardPatch = {};
  if (info.name) patch.name = info.name;
  if (info.issuer) patch.issuer = info.issuer;
  if (info.last4) patch.last4 = info.last4;
  if (info.currency) patch.currency = info.currency;
  if (info.creditLimitCents !== undefined) patch.creditLimitCents = info.creditLimitCents;
  if (info.balanceCents !== undefined) patch.balanceCents = info.balanceCents;
  if (info.dueDateDay) patch.dueDateDay = info.dueDateDay;
  if (info.minimumPaymentCents) patch.minimumPaymentCents = info.minimumPaymentCents;
  if (info.noInterestPaymentCents) patch.noInterestPaymentCents = info.noInterestPaymentCents;
  if (info.catBps) patch.catBps = info.catBps;
  return patch;
}

function resolveCard(repo: FinanceRepository, info: StatementCardInfo | null): Card {
  if (!info) {
    const [first] = repo.listAccounts();
    if (first) return first;
    return repo.createAccount({
      name: 'Imported Card',
      issuer: 'Unknown',
      last4: '0000',
      creditLimitCents: DEFAULT_CREDIT_LIMIT_CENTS,
      balanceCents: 0,
      dueDateDay: DEFAULT_DUE_DATE_DAY,
    });
  }

  const existing = info.last4 ? repo.findAccountByLast4(info.last4) : null;
  if (existing) {
    return repo.updateAccount(existing.id, statementPatch(info)) ?? existing;
  }

  return repo.createAccount({
    name: info.name || 'Unknown Card',
    issuer: info.issuer || 'Unknown Bank',
    last4: info.last4 || '0000',
    currency: info.currency,
    creditLimitCents: info.creditLimitCents ?? DEFAULT_CREDIT_LIMIT_CENTS,
    balanceCents: info.balanceCents ?? 0,
    dueDateDay: info.dueDateDay || DEFAULT_DUE_DATE_DAY,
    minimumPaymentCents: info.minimumPaymentCents || null,
    noInterestPaymentCents: info.noInterestPaymentCents || null,
    catBps: info.catBps || null,
  });
}

/**
 * Applies a parsed card statement: creates or refreshes the card, stores the
 * transactions it has not seen yet and adds their charges to the balance.
 */
export function importStatement(repo: FinanceRepository, statement: StatementImport): ImportResult {
  const card = resolveCard(repo, statement.card);
  const known = repo.listTransactions(card.id);
  const added: Transaction[] = [];

  for (const tx of statement.transactions) {
    const candidate = { date: tx.date, amountCents: tx.amountCents, description: tx.description };
    if (isDuplicateTransaction(known, candidate)) continue;

    const saved = repo.saveTransaction({
      cardId: card.id,
      date: tx.date,
      description: tx.description,
      category: tx.category,
      amountCents: tx.amountCents,
      type: tx.type ?? (tx.amountCents < 0 ? 'payment' : 'charge'),
      installments: tx.installments ?? null,
      monthsPaid: tx.monthsPaid ?? 0,
    });
    known.push(saved);
    added.push(saved);
  }

  const newCharges = sumCents(added.filter((tx) => tx.type === 'charge').map((tx) => tx.amountCents));
  if (newCharges !== 0) {
    repo.updateAccount(card.id, { balanceCents: addCents(card.balanceCents, newCharges) });
  }

  return {
    added: added.length,
    cardId: card.id,
    cardName: card.name,
    transactions: added,
  };
}
