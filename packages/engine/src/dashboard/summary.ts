import { addCents, sumCents } from '../math/money.js';
import { nextDueDate, todayIso } from '../calendar/dates.js';
import { DEFAULT_HORIZON_MONTHS, DEFAULT_MINIMUM_DUE_RATE, aggregateProjections, projectBalances } from '../projection/engine.js';
import { summarizeInstallments } from '../installments/grouping.js';
import type { MonthlyProjection } from '../projection/types.js';
import type { InstallmentSummary } from '../installments/types.js';
import type { Card, FinanceRepository, Transaction } from '../repository/types.js';

export interface DashboardOptions {
  minimumDueRate?: number;
  horizonMonths?: number;
  /** `YYYY-MM-DD`; defaults to the local date. */
  today?: string;
}

export interface CategoryAggregate {
  category: string;
  totalCents: number;
}

export interface CardSummary {
  id: string;
  name: string;
  last4: string;
  currency: string;
  balanceCents: number;
  upcomingPaymentDate: string;
  minimumDueCents: number;
}

export interface UpcomingPayment {
  cardId: string;
  cardName: string;
  dueDate: string;
  currency: string;
  estimatedMinimumCents: number;
}

export interface DashboardSummary {
  totalDebtCents: number;
  cards: CardSummary[];
  upcomingPayments: UpcomingPayment[];
}

export interface CardDetail {
  card: Card;
  transactions: Transaction[];
  categoryAggregates: CategoryAggregate[];
  projections: MonthlyProjection[];
}

export function categoryAggregates(transactions: Transaction[]): CategoryAggregate[] {
  const totals = new Map<string, number>();
  for (const tx of transactions) {
    if (tx.type !== 'charge') continue;
    totals.set(tx.category, addCents(totals.get(tx.category) ?? 0, tx.amountCents));
  }
  return [...totals.entries()].map(([category, totalCents]) => ({ category, totalCents }));
}

export function cardProjections(
  repo: FinanceRepository,
  card: Card,
  options: DashboardOptions = {},
): MonthlyProjection[] {
  const today = options.today ?? todayIso();
  return projectBalances(
    card,
    options.minimumDueRate ?? DEFAULT_MINIMUM_DUE_RATE,
    repo.listTransactions(card.id),
    options.horizonMonths ?? DEFAULT_HORIZON_MONTHS,
    today.slice(0, 7),
  );
}

export function getProjectionOverview(repo: FinanceRepository, options: DashboardOptions = {}): MonthlyProjection[] {
  return aggregateProjections(repo.listAccounts().map((card) => cardProjections(repo, card, options)));
}

export function getDashboardSummary(repo: FinanceRepository, options: DashboardOptions = {}): DashboardSummary {
  const today = options.today ?? todayIso();
  const cards = repo.listAccounts();

  const summaries: CardSummary[] = [];
  const debts: number[] = [];

  for (const card of cards) {
    // The statement month carries the total debt including every pending installment.
    const [statement] = cardProjections(repo, card, { ...options, today });
    debts.push(statement ? statement.totalDebtCents : card.balanceCents);

    summaries.push({
      id: card.id,
      name: card.name,
      last4: card.last4,
      currency: card.currency,
      balanceCents: statement ? statement.projectedBalanceCents : card.balanceCents,
      upcomingPaymentDate: nextDueDate(card.dueDateDay, today),
      minimumDueCents: card.minimumPaymentCents ?? 0,
    });
  }

  return {
    totalDebtCents: sumCents(debts),
    cards: summaries,
    upcomingPayments: summaries.map((s) => ({
      cardId: s.id,
      cardName: s.name,
      dueDate: s.upcomingPaymentDate,
      currency: s.currency,
      estimatedMinimumCents: s.minimumDueCents,
    })),
  };
}

export function getCardDetail(
  repo: FinanceRepository,
  cardId: string,
  options: DashboardOptions = {},
): CardDetail | null {
  const card = repo.getAccount(cardId);
  if (!card) return null;

  const transactions = repo.listTransactions(card.id);
  return {
    card,
    transactions,
    categoryAggregates: categoryAggregates(transactions),
    projections: cardProjections(repo, card, options),
  };
}

export function getInstallmentAnalysis(repo: FinanceRepository, cardId?: string): InstallmentSummary {
  const cards = repo.listAccounts().filter((card) => !cardId || card.id === cardId);
  return summarizeInstallments(
    cards.map((card) => ({
      id: card.id,
      name: card.name,
      last4: card.last4,
      currency: card.currency,
      // Only charges are financed; payments never form a plan.
      transactions: repo.listTransactions(card.id).filter((tx) => tx.type === 'charge'),
    })),
  );
}
