// pattern: Functional Core

/**
 * Currency domain types.
 * Rates are expressed as units of a currency per one unit of the base currency.
 */

export type CurrencyCode = string;

export type RateTable = Readonly<Record<CurrencyCode, number>>;

export type ConversionResult = {
  original_amount: number;
  from_currency: CurrencyCode;
  to_currency: CurrencyCode;
  converted_amount: number;
  exchange_rate: number;
};

export type RateResult = {
  from_currency: CurrencyCode;
  to_currency: CurrencyCode;
  exchange_rate: number;
};

export type CurrencyList = {
  supported_currencies: Array<CurrencyCode>;
  base_currency: CurrencyCode;
  total_currencies: number;
};

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };
