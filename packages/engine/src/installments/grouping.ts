import { sumCents } from '../math/money.js';
import { computeAllInstallmentDetails } from './calculator.js';
import type { CardInstallments, CardInstallmentGroup, InstallmentSummary } from './types.js';

export function groupByCard(cards: CardInstallments[]): CardInstallmentGroup[] {
  const uniqueCards = new Map<string, CardInstallments>();
  for (const card of cards) {
    if (!uniqueCards.has(card.id)) uniqueCards.set(card.id, card);
  }

  const groups: CardInstallmentGroup[] = [];
  for (const card of uniqueCards.values()) {
    const details = computeAllInstallmentDetails(card.transactions);
    if (details.length === 0) continue;

    groups.push({
      cardId: card.id,
      cardName: card.name,
      cardLast4: card.last4,
      currency: card.currency ?? 'MXN',
      transactions: details,
      totalAmountCents: sumCents(details.map((d) => d.amountCents)),
      totalInterestCents: sumCents(details.map((d) => d.totalInterestCents)),
      totalMonthlyPaymentCents: sumCents(details.map((d) => d.monthlyPaymentCents)),
    });
  }

  return groups;
}

export function summarizeInstallments(cards: CardInstallments[]): InstallmentSummary {
  const groups = groupByCard(cards);

  // Grand totals are built from the group subtotals so both always agree.
  return {
    groups,
    totals: {
      totalAmountCents: sumCents(groups.map((g) => g.totalAmountCents)),
      totalInterestCents: sumCents(groups.map((g) => g.totalInterestCents)),
      totalMonthlyPaymentCents: sumCents(groups.map((g) => g.totalMonthlyPaymentCents)),
    },
    transactionCount: groups.reduce((count, g) => count + g.transactions.length, 0),
  };
}
