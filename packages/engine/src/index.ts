export { createDb, schema } from './db/index.js';
export type { DB } from './db/index.js';
export { cards, transactions } from './db/schema.js';
export { migrate, SCHEMA_SQL } from './db/migrate.js';
export { seedDemoData } from './db/seed.js';

export { formatMoney, addCents, subtractCents, multiplyCents, divideCents, sumCents } from './math/money.js';
export { currentMonth, todayIso, advanceMonth, monthSequence, nextDueDate } from './calendar/dates.js';

export type { Card, NewCard, CardPatch, Transaction, NewTransaction, TransactionType, FinanceRepository } from './repository/types.js';
export { createSqliteRepository } from './repository/sqlite.js';

export type { InstallmentTransaction, InstallmentDetail, CardInstallments, CardInstallmentGroup, InstallmentTotals, InstallmentSummary } from './installments/types.js';
export { MONTHLY_PENALTY_RATE, MAX_INSTALLMENTS, InstallmentPlanError, isInstallmentPlan, monthlyPaymentFor, computeInstallmentDetail, computeAllInstallmentDetails } from './installments/calculator.js';
export { groupByCard, summarizeInstallments } from './installments/grouping.js';

export type { MonthlyProjection, ProjectionAccount, ProjectionTransaction } from './projection/types.js';
export { DEFAULT_MINIMUM_DUE_RATE, DEFAULT_HORIZON_MONTHS, projectBalances, aggregateProjections } from './projection/engine.js';

export type { StatementCardInfo, StatementTransaction, StatementImport, ImportResult } from './statements/importer.js';
export { importStatement, isDuplicateTransaction } from './statements/importer.js';

export type { DashboardOptions, CategoryAggregate, CardSummary, UpcomingPayment, DashboardSummary, CardDetail } from './dashboard/summary.js';
export { categoryAggregates, cardProjections, getProjectionOverview, getDashboardSummary, getCardDetail, getInstallmentAnalysis } from './dashboard/summary.js';
