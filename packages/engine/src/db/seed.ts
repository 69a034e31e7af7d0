import { importStatement } from '../statements/importer.js';
import type { FinanceRepository } from '../repository/types.js';

/**
 * Demo cards for local development. Goes through the statement importer, so
 * re-running it only refreshes the cards (matched by last4) and skips known
 * transactions.
 */
export function seedDemoData(repo: FinanceRepository, statementDate = '2026-01-20'): void {
  importStatement(repo, {
    card: {
      name: 'Oro Clásica',
      issuer: 'Banco Demo',
      last4: '4242',
      creditLimitCents: 5000000,
      balanceCents: 0,
      dueDateDay: 10,
      minimumPaymentCents: 85000,
      noInterestPaymentCents: 1245000,
      catBps: 6200,
    },
    transactions: [
      { date: statementDate, description: 'Supermercado', category: 'Groceries', amountCents: 184350 },
      { date: statementDate, description: 'Restaurante', category: 'Dining', amountCents: 62000 },
      { date: statementDate, description: 'Laptop', category: 'Shopping', amountCents: 1800000, installments: 12, monthsPaid: 3 },
      { date: statementDate, description: 'Refrigerador', category: 'Shopping', amountCents: 960000, installments: 6, monthsPaid: 1 },
      { date: statementDate, description: 'Pago recibido', category: 'Payment', amountCents: -300000 },
    ],
  });

  importStatement(repo, {
    card: {
      name: 'Platino',
      issuer: 'Banco Ejemplo',
      last4: '1881',
      creditLimitCents: 12000000,
      balanceCents: 0,
      dueDateDay: 28,
      minimumPaymentCents: 41000,
      noInterestPaymentCents: 538000,
      catBps: 4800,
    },
    transactions: [
      { date: statementDate, description: 'Aerolínea', category: 'Travel', amountCents: 720000, installments: 3, monthsPaid: 0 },
      { date: statementDate, description: 'Gasolina', category: 'Gas', amountCents: 98000 },
    ],
  });
}
