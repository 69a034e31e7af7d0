import { Decimal } from 'decimal.js';
import { addCents } from '../math/money.js';
import { currentMonth, monthSequence } from '../calendar/dates.js';
import type { MonthlyProjection, ProjectionAccount, ProjectionTransaction } from './types.js';

export const DEFAULT_MINIMUM_DUE_RATE = 0.03;
export const DEFAULT_HORIZON_MONTHS = 6;

interface RunningPlan {
  monthly: Decimal;
  remaining: number;
}

type ProjectionRow = Omit<MonthlyProjection, 'totalDebtCents'>;

function toCents(value: Decimal.Value): number {
  return Decimal.max(0, value).round().toNumber();
}

function runningPlans(transactions: ProjectionTransaction[]): RunningPlan[] {
  const plans: RunningPlan[] = [];
  for (const tx of transactions) {
    if (tx.type !== 'charge' || tx.installments === null || tx.installments <= 1) continue;
    plans.push({
      monthly: new Decimal(tx.amountCents).dividedBy(tx.installments),
      remaining: Math.max(0, tx.installments - Math.max(0, tx.monthsPaid)),
    });
  }
  return plans;
}

function statementMonth(account: ProjectionAccount, month: string, rate: Decimal): ProjectionRow {
  const noInterest = toCents(account.noInterestPaymentCents ?? account.balanceCents);
  const minPayment = account.minimumPaymentCents !== null
    ? toCents(account.minimumPaymentCents)
    : toCents(new Decimal(noInterest).times(rate));

  // CAT is an annual rate; a month accrues a twelfth of it.
  const interest = account.balanceCents > 0 && account.catBps
    ? toCents(new Decimal(account.balanceCents).times(account.catBps).div(10000).div(12))
    : 0;

  return {
    month,
    projectedBalanceCents: noInterest,
    projectedMinPaymentCents: minPayment,
    noInterestPaymentCents: noInterest,
    projectedInterestCents: interest,
  };
}

function installmentMonth(plans: RunningPlan[], month: string, rate: Decimal): ProjectionRow {
  const due = plans
    .filter((p) => p.remaining > 0)
    .reduce((acc, p) => acc.plus(p.monthly), new Decimal(0));
  const dueCents = toCents(due);

  return {
    month,
    projectedBalanceCents: dueCents,
    projectedMinPaymentCents: toCents(due.times(rate)),
    noInterestPaymentCents: dueCents,
    projectedInterestCents: 0,
  };
}

/**
 * Forward schedule for one card. The first month reflects the statement as
 * issued; later months assume the statement was paid in full, leaving only the
 * installments still running on each plan.
 */
export function projectBalances(
  account: ProjectionAccount,
  minimumDueRate: number,
  transactions: ProjectionTransaction[],
  horizonMonths = DEFAULT_HORIZON_MONTHS,
  startMonth?: string,
): MonthlyProjection[] {
  const months = monthSequence(startMonth ?? currentMonth(), horizonMonths);
  const rate = new Decimal(minimumDueRate);
  const plans = runningPlans(transactions);

  const rows: ProjectionRow[] = months.map((month, index) => {
    const row = index === 0
      ? statementMonth(account, month, rate)
      : installmentMonth(plans, month, rate);

    for (const plan of plans) {
      if (plan.remaining > 0) plan.remaining--;
    }
    return row;
  });

  // Total debt of a month = everything still to be paid from that month on.
  const totalDebt: number[] = new Array<number>(rows.length).fill(0);
  let remainingDebt = 0;
  for (let i = rows.length - 1; i >= 0; i--) {
    remainingDebt = addCents(remainingDebt, rows[i].noInterestPaymentCents);
    totalDebt[i] = remainingDebt;
  }

  return rows.map((row, i) => ({ ...row, totalDebtCents: totalDebt[i] }));
}

export function aggregateProjections(schedules: MonthlyProjection[][]): MonthlyProjection[] {
  const byMonth = new Map<string, MonthlyProjection>();

  for (const schedule of schedules) {
    for (const p of schedule) {
      const existing = byMonth.get(p.month);
      if (!existing) {
        byMonth.set(p.month, { ...p });
        continue;
      }
      existing.projectedBalanceCents = addCents(existing.projectedBalanceCents, p.projectedBalanceCents);
      existing.projectedMinPaymentCents = addCents(existing.projectedMinPaymentCents, p.projectedMinPaymentCents);
      existing.noInterestPaymentCents = addCents(existing.noInterestPaymentCents, p.noInterestPaymentCents);
      existing.totalDebtCents = addCents(existing.totalDebtCents, p.totalDebtCents);
      existing.projectedInterestCents = addCents(existing.projectedInterestCents, p.projectedInterestCents);
    }
  }

  return [...byMonth.values()].sort((a, b) => a.month.localeCompare(b.month));
}
