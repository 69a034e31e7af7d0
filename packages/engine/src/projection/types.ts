export interface MonthlyProjection {
  month: string;
  projectedBalanceCents: number;
  projectedMinPaymentCents: number;
  noInterestPaymentCents: number;
  totalDebtCents: number;
  projectedInterestCents: number;
}

/** Statement figures of one card, as far as the projection needs them. */
export interface ProjectionAccount {
  balanceCents: number;
  minimumPaymentCents: number | null;
  noInterestPaymentCents: number | null;
  catBps: number | null;
}

export interface ProjectionTransaction {
  amountCents: number;
  type: 'charge' | 'payment';
  installments: number | null;
  monthsPaid: number;
}
