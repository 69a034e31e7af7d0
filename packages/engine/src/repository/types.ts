export type TransactionType = 'charge' | 'payment';

export interface Card {
  id: string;
  name: string;
  issuer: string;
  last4: string;
  currency: string;
  creditLimitCents: number;
  balanceCents: number;
  dueDateDay: number;
  minimumPaymentCents: number | null;
  noInterestPaymentCents: number | null;
  catBps: number | null;
}

export interface NewCard {
  name: string;
  issuer: string;
  last4: string;
  currency?: string;
  creditLimitCents: number;
  balanceCents?: number;
  dueDateDay: number;
  minimumPaymentCents?: number | null;
  noInterestPaymentCents?: number | null;
  catBps?: number | null;
}

export type CardPatch = Partial<Omit<Card, 'id'>>;

export interface Transaction {
  id: string;
  cardId: string;
  date: string;
  description: string | null;
  category: string;
  amountCents: number;
  type: TransactionType;
  installments: number | null;
  monthsPaid: number;
}

export interface NewTransaction {
  cardId: string;
  date: string;
  description?: string | null;
  category?: string;
  amountCents: number;
  type: TransactionType;
  installments?: number | null;
  monthsPaid?: number;
}

/**
 * Storage capabilities the engine depends on. Implementations are injected
 * into every service; nothing in the engine keeps its own state.
 */
export interface FinanceRepository {
  listAccounts(): Card[];
  getAccount(id: string): Card | null;
  findAccountByLast4(last4: string): Card | null;
  createAccount(input: NewCard): Card;
  updateAccount(id: string, patch: CardPatch): Card | null;
  listTransactions(cardId?: string): Transaction[];
  saveTransaction(input: NewTransaction): Transaction;
}
