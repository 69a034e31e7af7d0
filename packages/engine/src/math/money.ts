import { Decimal } from 'decimal.js';

interface CurrencyConfig {
  symbol: string;
  position: 'prefix' | 'suffix';
}

const CURRENCY_CONFIG: Record<string, CurrencyConfig> = {
  MXN: { symbol: '$', position: 'prefix' },
  USD: { symbol: 'US$', position: 'prefix' },
  EUR: { symbol: '€', position: 'suffix' },
  GBP: { symbol: '£', position: 'prefix' },
  COP: { symbol: 'COL$', position: 'prefix' },
  BRL: { symbol: 'R$', position: 'prefix' },
};

export function formatMoney(amountCents: number, currency = 'MXN'): string {
  const amount = new Decimal(amountCents).dividedBy(100);
  const isNegative = amount.isNegative() && !amount.isZero();
  const [whole, fraction] = amount.abs().toFixed(2).split('.');
  const absStr = `${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;

  const config = CURRENCY_CONFIG[currency];

  if (config) {
    if (config.position === 'prefix') {
      return `${isNegative ? '-' : ''}${config.symbol}${absStr}`;
    }
    return `${isNegative ? '-' : ''}${absStr} ${config.symbol}`;
  }

  // Unknown currency: fallback to suffix with ISO code
  return `${isNegative ? '-' : ''}${absStr} ${currency}`;
}

export function addCents(...amounts: number[]): number {
  return sumCents(amounts);
}

export function subtractCents(a: number, b: number): number {
  return new Decimal(a).minus(b).toNumber();
}

export function multiplyCents(amount: number, factor: Decimal.Value): number {
  return new Decimal(amount).times(factor).round().toNumber();
}

export function divideCents(amount: number, divisor: Decimal.Value): number {
  return new Decimal(amount).dividedBy(divisor).round().toNumber();
}

export function sumCents(amounts: number[]): number {
  return amounts.reduce((acc, val) => acc.plus(val), new Decimal(0)).toNumber();
}
