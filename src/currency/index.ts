// pattern: Functional Core

export type {
  CurrencyCode,
  RateTable,
  ConversionResult,
  RateResult,
  CurrencyList,
  Outcome,
} from './types.ts';

export { BASE_CURRENCY, EXCHANGE_RATES, assertValidRateTable } from './rates.ts';
export {
  convertCurrency,
  getExchangeRate,
  listSupportedCurrencies,
  roundTo,
} from './convert.ts';
