// pattern: Functional Core

import type { CurrencyCode, RateTable } from './types.ts';

export const BASE_CURRENCY: CurrencyCode = 'USD';

// Reference rates, not live market data.
export const EXCHANGE_RATES: RateTable = Object.freeze({
  USD: 1.0,
  EUR: 0.92,
  GBP: 0.79,
  JPY: 149.5,
  CAD: 1.36,
  AUD: 1.53,
  CHF: 0.88,
  CNY: 7.14,
  INR: 83.12,
  MXN: 17.15,
  BRL: 4.97,
  KRW: 1298.5,
  SGD: 1.34,
  HKD: 7.82,
  SEK: 10.42,
  NOK: 10.68,
  NZD: 1.63,
  ZAR: 18.65,
  RUB: 89.5,
  AED: 3.67,
});

/**
 * Throws if the table has no base entry equal to 1, or any non-positive rate.
 */
export function assertValidRateTable(
  table: RateTable,
  baseCurrency: CurrencyCode = BASE_CURRENCY,
): void {
  if (table[baseCurrency] !== 1) {
    throw new Error(`base currency ${baseCurrency} must have a rate of exactly 1`);
  }

  for (const [code, rate] of Object.entries(table)) {
    if (!/^[A-Z]{3}$/.test(code)) {
      throw new Error(`invalid currency code: ${code}`);
    }
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new Error(`rate for ${code} must be a positive number, got ${rate}`);
    }
  }
}
