import { Decimal } from 'decimal.js';
import { ValueTransformer } from 'typeorm';

/** Fractional digits kept for every amount and balance */
export const MONEY_SCALE = 2;

/** Total digits of the decimal(18,2) money columns */
export const MONEY_PRECISION = 18;

/** Largest amount or balance the money columns hold: 9999999999999999.99 */
export const MAX_MONEY = new Decimal(10)
  .pow(MONEY_PRECISION - MONEY_SCALE)
  .minus(new Decimal(10).pow(-MONEY_SCALE));

export type MoneyInput = Decimal.Value;

/**
 * Parses a caller-supplied amount. Returns null when the value is not a
 * finite number, carries more than {@link MONEY_SCALE} fractional digits
 * or lies outside {@link MAX_MONEY} in either direction.
 */
export function toMoney(value: MoneyInput): Decimal | null {
  let amount: Decimal;
  try {
    amount = new Decimal(value);
  } catch {
    return null;
  }
  if (
    !amount.isFinite() ||
    amount.decimalPlaces() > MONEY_SCALE ||
    exceedsMoneyLimit(amount)
  ) {
    return null;
  }
  return amount;
}

export function exceedsMoneyLimit(amount: Decimal): boolean {
  return amount.abs().greaterThan(MAX_MONEY);
}

export function formatMoney(amount: Decimal): string {
  return amount.toFixed(MONEY_SCALE);
}

/** decimal(18,2) columns come back from pg as strings */
export const moneyTransformer: ValueTransformer = {
  to: (value?: Decimal | null) =>
    value === undefined || value === null ? value : formatMoney(value),
  from: (value?: string | number | null) =>
    value === undefined || value === null ? value : new Decimal(value),
};

/** bigint columns come back from pg as strings */
export const bigintTransformer: ValueTransformer = {
  to: (value?: number | null) => value,
  from: (value?: string | number | null) =>
    value === undefined || value === null ? value : Number(value),
};
