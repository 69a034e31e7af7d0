export interface InstallmentTransaction {
  id: string;
  amountCents: number;
  installments: number | null;
  monthsPaid: number;
  description?: string | null;
  category?: string;
  date?: string;
}

export interface InstallmentDetail {
  id: string;
  description: string;
  amountCents: number;
  monthsCompleted: number;
  totalMonths: number;
  monthlyPaymentCents: number;
  totalInterestCents: number;
}

export interface CardInstallments {
  id: string;
  name: string;
  last4: string;
  /** ISO code; MXN when absent. */
  currency?: string;
  transactions: InstallmentTransaction[];
}

export interface CardInstallmentGroup {
  cardId: string;
  cardName: string;
  cardLast4: string;
  currency: string;
  transactions: InstallmentDetail[];
  totalAmountCents: number;
  totalInterestCents: number;
  totalMonthlyPaymentCents: number;
}

export interface InstallmentTotals {
  totalAmountCents: number;
  totalInterestCents: number;
  totalMonthlyPaymentCents: number;
}

export interface InstallmentSummary {
  groups: CardInstallmentGroup[];
  totals: InstallmentTotals;
  transactionCount: number;
}
