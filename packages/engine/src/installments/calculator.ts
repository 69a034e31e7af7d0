import { Decimal } from 'decimal.js';
import type { InstallmentTransaction, InstallmentDetail } from './types.js';

// Penalty accrued per pending month when only the MSI minimum is paid.
export const MONTHLY_PENALTY_RATE = new Decimal('0.015');

// Longest plan issuers offer (10 years).
export const MAX_INSTALLMENTS = 120;

export class InstallmentPlanError extends Error {
  constructor(public transactionId: string, installments: number | null) {
    super(`Transaction '${transactionId}' is not an installment plan (installments: ${installments ?? 'null'})`);
    this.name = 'InstallmentPlanError';
  }
}

export function isInstallmentPlan(tx: Pick<InstallmentTransaction, 'installments'>): boolean {
  return tx.installments !== null && tx.installments > 1;
}

export function monthlyPaymentFor(tx: Pick<InstallmentTransaction, 'amountCents' | 'installments'>): number {
  if (tx.installments === null || tx.installments <= 1) return 0;
  return new Decimal(tx.amountCents).dividedBy(tx.installments).round().toNumber();
}

export function computeInstallmentDetail(tx: InstallmentTransaction): InstallmentDetail {
  if (tx.installments === null || tx.installments <= 1) {
    throw new InstallmentPlanError(tx.id, tx.installments);
  }

  const totalMonths = tx.installments;
  const monthsCompleted = Math.max(0, tx.monthsPaid);
  const monthlyPayment = new Decimal(tx.amountCents).dividedBy(totalMonths);

  // The balance steps down every period, paid or not; interest only accrues
  // on pending periods, against the balance before that period's payment.
  let balance = new Decimal(tx.amountCents);
  let totalInterest = new Decimal(0);
  for (let i = 0; i < totalMonths; i++) {
    if (i >= monthsCompleted) {
      totalInterest = totalInterest.plus(balance.times(MONTHLY_PENALTY_RATE));
    }
    balance = balance.minus(monthlyPayment);
  }

  return {
    id: tx.id,
    description: tx.description || `Installment purchase ${totalMonths}x`,
    amountCents: tx.amountCents,
    monthsCompleted,
    totalMonths,
    monthlyPaymentCents: monthlyPayment.round().toNumber(),
    totalInterestCents: Decimal.max(0, totalInterest).round().toNumber(),
  };
}

export function computeAllInstallmentDetails(transactions: InstallmentTransaction[]): InstallmentDetail[] {
  const seen = new Set<string>();
  const details: InstallmentDetail[] = [];

  for (const tx of transactions) {
    if (!isInstallmentPlan(tx) || seen.has(tx.id)) continue;
    seen.add(tx.id);
    details.push(computeInstallmentDetail(tx));
  }

  return details;
}
