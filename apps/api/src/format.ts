import {
  formatMoney,
  type Card,
  type Transaction,
  type MonthlyProjection,
  type InstallmentDetail,
  type InstallmentSummary,
} from '@cardwise/engine';

const DEFAULT_CURRENCY = 'MXN';

/** Currency for totals across cards: theirs when they all agree, MXN otherwise. */
export function sharedCurrency(currencies: string[]): string {
  const [first] = currencies;
  return first !== undefined && currencies.every((c) => c === first) ? first : DEFAULT_CURRENCY;
}

export function formatCard(card: Card) {
  return {
    ...card,
    creditLimitFormatted: formatMoney(card.creditLimitCents, card.currency),
    balanceFormatted: formatMoney(card.balanceCents, card.currency),
    minimumPaymentFormatted: card.minimumPaymentCents === null ? null : formatMoney(card.minimumPaymentCents, card.currency),
    noInterestPaymentFormatted: card.noInterestPaymentCents === null ? null : formatMoney(card.noInterestPaymentCents, card.currency),
  };
}

export function formatTransaction(tx: Transaction, currency = DEFAULT_CURRENCY) {
  return {
    ...tx,
    amountFormatted: formatMoney(tx.amountCents, currency),
  };
}

export function formatProjection(p: MonthlyProjection, currency = DEFAULT_CURRENCY) {
  return {
    ...p,
    projectedBalanceFormatted: formatMoney(p.projectedBalanceCents, currency),
    projectedMinPaymentFormatted: formatMoney(p.projectedMinPaymentCents, currency),
    noInterestPaymentFormatted: formatMoney(p.noInterestPaymentCents, currency),
    totalDebtFormatted: formatMoney(p.totalDebtCents, currency),
    projectedInterestFormatted: formatMoney(p.projectedInterestCents, currency),
  };
}

export function formatInstallmentDetail(d: InstallmentDetail, currency = DEFAULT_CURRENCY) {
  return {
    ...d,
    amountFormatted: formatMoney(d.amountCents, currency),
    monthlyPaymentFormatted: formatMoney(d.monthlyPaymentCents, currency),
    totalInterestFormatted: formatMoney(d.totalInterestCents, currency),
    progress: `${d.monthsCompleted}/${d.totalMonths}`,
  };
}

export function formatInstallmentSummary(summary: InstallmentSummary) {
  const currency = sharedCurrency(summary.groups.map((g) => g.currency));
  return {
    groups: summary.groups.map((g) => ({
      ...g,
      transactions: g.transactions.map((d) => formatInstallmentDetail(d, g.currency)),
      totalAmountFormatted: formatMoney(g.totalAmountCents, g.currency),
      totalInterestFormatted: formatMoney(g.totalInterestCents, g.currency),
      totalMonthlyPaymentFormatted: formatMoney(g.totalMonthlyPaymentCents, g.currency),
    })),
    totals: {
      ...summary.totals,
      totalAmountFormatted: formatMoney(summary.totals.totalAmountCents, currency),
      totalInterestFormatted: formatMoney(summary.totals.totalInterestCents, currency),
      totalMonthlyPaymentFormatted: formatMoney(summary.totals.totalMonthlyPaymentCents, currency),
    },
    transactionCount: summary.transactionCount,
  };
}
