import { describe, it, expect, beforeAll } from 'vitest';
import { z } from 'zod';
import { api, testApp, type App } from './helpers.js';

const importResult = z.object({ cardId: z.string() });

describe('Installments API', () => {
  let app: App;
  let oroId: string;
  let debitId: string;

  beforeAll(async () => {
    app = testApp();

    const oro = await api(app, 'POST', '/api/v1/statements/import', {
      card: { name: 'Oro', issuer: 'Banco Uno', last4: '1111', balanceCents: 0, dueDateDay: 10 },
      transactions: [
        { date: '2026-01-03', description: 'TV', category: 'Shopping', amountCents: 30000, installments: 3 },
        { date: '2025-09-03', description: 'Sofa', category: 'Shopping', amountCents: 60000, installments: 6, monthsPaid: 4 },
        { date: '2026-01-08', description: 'Coffee', category: 'Dining', amountCents: 4000 },
        { date: '2026-01-10', description: 'Pago', amountCents: -2000 },
      ],
    });
    oroId = importResult.parse(oro.data).cardId;

    const debit = await api(app, 'POST', '/api/v1/statements/import', {
      card: { name: 'Clásica', issuer: 'Banco Dos', last4: '2222', dueDateDay: 5 },
      transactions: [{ date: '2026-01-04', description: 'Gas', category: 'Gas', amountCents: 80000 }],
    });
    debitId = importResult.parse(debit.data).cardId;
  });

  it('GET /api/v1/installments groups plans per card', async () => {
    const { status, data } = await api(app, 'GET', '/api/v1/installments');
    expect(status).toBe(200);
    expect(data).toEqual({
      groups: [
        {
          cardId: oroId,
          cardName: 'Oro',
          cardLast4: '1111',
          transactions: [
            expect.objectContaining({
              description: 'TV',
              monthlyPaymentCents: 10000,
              totalInterestCents: 900,
              totalInterestFormatted: '$9.00',
              progress: '0/3',
            }),
            expect.objectContaining({
              description: 'Sofa',
              monthlyPaymentCents: 10000,
              totalInterestCents: 450,
              progress: '4/6',
            }),
          ],
          totalAmountCents: 90000,
          totalInterestCents: 1350,
          totalMonthlyPaymentCents: 20000,
          totalAmountFormatted: '$900.00',
          totalInterestFormatted: '$13.50',
          totalMonthlyPaymentFormatted: '$200.00',
        },
      ],
      totals: {
        totalAmountCents: 90000,
        totalInterestCents: 1350,
        totalMonthlyPaymentCents: 20000,
        totalAmountFormatted: '$900.00',
        totalInterestFormatted: '$13.50',
        totalMonthlyPaymentFormatted: '$200.00',
      },
      transactionCount: 2,
    });
  });

  it('GET /api/v1/installments?cardId= with no plans is empty', async () => {
    const { status, data } = await api(app, 'GET', `/api/v1/installments?cardId=${debitId}`);
    expect(status).toBe(200);
    expect(data).toMatchObject({
      groups: [],
      totals: { totalAmountCents: 0, totalInterestCents: 0, totalMonthlyPaymentCents: 0 },
      transactionCount: 0,
    });
  });

  it('GET /api/v1/installments?cardId= rejects an unknown card', async () => {
    const { status, data } = await api(app, 'GET', '/api/v1/installments?cardId=missing');
    expect(status).toBe(404);
    expect(data).toMatchObject({ error: { code: 'NOT_FOUND', message: "Card 'missing' not found" } });
  });

  it('POST /api/v1/installments/simulate estimates interest without storing', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/installments/simulate', {
      transactions: [
        { id: 'tv', description: 'TV', amountCents: 30000, installments: 3 },
        { id: 'tv', description: 'TV again', amountCents: 30000, installments: 3 },
        { id: 'single', amountCents: 5000, installments: 1 },
        { amountCents: 10000, installments: 3, description: null },
      ],
    });
    expect(status).toBe(200);
    expect(data).toMatchObject({
      details: [
        { id: 'tv', description: 'TV', monthlyPaymentCents: 10000, totalInterestCents: 900, monthlyPaymentFormatted: '$100.00' },
        { description: 'Installment purchase 3x', monthlyPaymentCents: 3333, totalInterestCents: 300, progress: '0/3' },
      ],
      totalInterestCents: 1200,
      totalInterestFormatted: '$12.00',
    });

    const after = await api(app, 'GET', '/api/v1/installments');
    expect(after.data).toMatchObject({ transactionCount: 2 });
  });

  it('POST /api/v1/installments/simulate formats in the requested currency', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/installments/simulate', {
      currency: 'EUR',
      transactions: [{ id: 'hotel', amountCents: 30000, installments: 3 }],
    });
    expect(status).toBe(200);
    expect(data).toMatchObject({
      details: [{ id: 'hotel', monthlyPaymentFormatted: '100.00 €', totalInterestFormatted: '9.00 €' }],
      totalInterestFormatted: '9.00 €',
    });
  });

  it('rejects installment counts above the longest plan', async () => {
    const simulate = await api(app, 'POST', '/api/v1/installments/simulate', {
      transactions: [{ amountCents: 30000, installments: 3000000 }],
    });
    expect(simulate.status).toBe(400);
    expect(simulate.data).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });

    const stored = await api(app, 'POST', '/api/v1/transactions', {
      cardId: oroId,
      date: '2026-01-15',
      description: 'Moto',
      amountCents: 900000,
      type: 'charge',
      installments: 121,
    });
    expect(stored.status).toBe(400);
    expect(stored.data).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });

    const imported = await api(app, 'POST', '/api/v1/statements/import', {
      card: { last4: '1111' },
      transactions: [{ date: '2026-01-15', description: 'Moto', amountCents: 900000, installments: 500 }],
    });
    expect(imported.status).toBe(400);
    expect(imported.data).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });

    const longest = await api(app, 'POST', '/api/v1/installments/simulate', {
      transactions: [{ id: 'car', amountCents: 1200000, installments: 120 }],
    });
    expect(longest.status).toBe(200);
    expect(longest.data).toMatchObject({ details: [{ id: 'car', monthlyPaymentCents: 10000, progress: '0/120' }] });
  });

  it('keeps payments with installments out of the analysis', async () => {
    const saved = await api(app, 'POST', '/api/v1/transactions', {
      cardId: oroId,
      date: '2026-01-16',
      description: 'Reembolso TV',
      amountCents: -30000,
      type: 'payment',
      installments: 3,
    });
    expect(saved.status).toBe(201);

    const { data } = await api(app, 'GET', '/api/v1/installments');
    expect(data).toMatchObject({
      totals: { totalAmountCents: 90000, totalInterestCents: 1350, totalMonthlyPaymentCents: 20000 },
      transactionCount: 2,
    });
  });

  it('POST /api/v1/installments/simulate validates the payload', async () => {
    const empty = await api(app, 'POST', '/api/v1/installments/simulate', { transactions: [] });
    expect(empty.status).toBe(400);
    expect(empty.data).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });

    const negative = await api(app, 'POST', '/api/v1/installments/simulate', {
      transactions: [{ amountCents: -100, installments: 3 }],
    });
    expect(negative.status).toBe(400);
  });
});
