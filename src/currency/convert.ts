// pattern: Functional Core

/**
 * Currency conversion over a fixed rate table.
 * Every rate is derived through the base currency: rate(A, B) = table[B] / table[A].
 */

import { BASE_CURRENCY, EXCHANGE_RATES } from './rates.ts';
import type {
  ConversionResult,
  CurrencyCode,
  CurrencyList,
  Outcome,
  RateResult,
  RateTable,
} from './types.ts';

const RATE_DECIMALS = 6;
const AMOUNT_DECIMALS = 2;

/**
 * Round half away from zero on the decimal representation of `value`,
 * so 1.005 rounds to 1.01 and 92.00000000000001 to 92.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);
  const text = String(magnitude);

  if (text.includes('e')) {
    const factor = 10 ** decimals;
    return sign * (Math.round(magnitude * factor) / factor);
  }

  const shifted = Math.round(Number(`${text}e${decimals}`));
  const shiftedText = String(shifted);
  const rounded = shiftedText.includes('e')
    ? shifted / 10 ** decimals
    : Number(`${shiftedText}e-${decimals}`);

  return sign * rounded;
}

function resolvePair(
  from: string,
  to: string,
  table: RateTable,
): Outcome<{ from: CurrencyCode; to: CurrencyCode; rate: number }> {
  const fromCode = from.trim().toUpperCase();
  const toCode = to.trim().toUpperCase();

  const fromRate = table[fromCode];
  if (fromRate === undefined) {
    return { ok: false, error: `Currency '${fromCode}' not supported` };
  }
  const toRate = table[toCode];
  if (toRate === undefined) {
    return { ok: false, error: `Currency '${toCode}' not supported` };
  }

  return { ok: true, value: { from: fromCode, to: toCode, rate: toRate / fromRate } };
}

export function getExchangeRate(
  from: string,
  to: string,
  table: RateTable = EXCHANGE_RATES,
): Outcome<RateResult> {
  const pair = resolvePair(from, to, table);
  if (!pair.ok) {
    return pair;
  }

  return {
    ok: true,
    value: {
      from_currency: pair.value.from,
      to_currency: pair.value.to,
      exchange_rate: roundTo(pair.value.rate, RATE_DECIMALS),
    },
  };
}

export function convertCurrency(
  amount: number,
  from: string,
  to: string,
  table: RateTable = EXCHANGE_RATES,
): Outcome<ConversionResult> {
  if (!Number.isFinite(amount)) {
    return { ok: false, error: `Amount must be a finite number, got ${amount}` };
  }

  const pair = resolvePair(from, to, table);
  if (!pair.ok) {
    return pair;
  }

  return {
    ok: true,
    value: {
      original_amount: amount,
      from_currency: pair.value.from,
      to_currency: pair.value.to,
      converted_amount: roundTo(amount * pair.value.rate, AMOUNT_DECIMALS),
      exchange_rate: roundTo(pair.value.rate, RATE_DECIMALS),
    },
  };
}

export function listSupportedCurrencies(
  table: RateTable = EXCHANGE_RATES,
  baseCurrency: CurrencyCode = BASE_CURRENCY,
): CurrencyList {
  const codes = Object.keys(table);
  return {
    supported_currencies: codes,
    base_currency: baseCurrency,
    total_currencies: codes.length,
  };
}
