// pattern: Imperative Shell

/**
 * Built-in currency tools: conversion, rate lookup, and the supported currency list.
 * Each tool wraps a pure function from the currency module.
 */

import {
  convertCurrency,
  getExchangeRate,
  listSupportedCurrencies,
  EXCHANGE_RATES,
} from '../../currency/index.ts';
import type { Outcome, RateTable } from '../../currency/index.ts';
import type { Tool, ToolDefinition, ToolHandler, ToolResult } from '../types.ts';

export const CURRENCY_TOOL_NAMES = [
  'convert_currency',
  'get_exchange_rate',
  'list_supported_currencies',
] as const;

export type CurrencyToolName = (typeof CURRENCY_TOOL_NAMES)[number];

const CURRENCY_CODE_HINT = 'currency code (e.g., USD, EUR, GBP)';

const DEFINITIONS: Record<CurrencyToolName, ToolDefinition> = {
  convert_currency: {
    name: 'convert_currency',
    description: 'Convert an amount from one currency to another',
    parameters: [
      { name: 'amount', type: 'number', description: 'The amount to convert', required: true },
      { name: 'from_currency', type: 'string', description: `The source ${CURRENCY_CODE_HINT}`, required: true },
      { name: 'to_currency', type: 'string', description: `The target ${CURRENCY_CODE_HINT}`, required: true },
    ],
  },
  get_exchange_rate: {
    name: 'get_exchange_rate',
    description: 'Get the current exchange rate between two currencies',
    parameters: [
      { name: 'from_currency', type: 'string', description: `The source ${CURRENCY_CODE_HINT}`, required: true },
      { name: 'to_currency', type: 'string', description: `The target ${CURRENCY_CODE_HINT}`, required: true },
    ],
  },
  list_supported_currencies: {
    name: 'list_supported_currencies',
    description: 'List all supported currencies for conversion',
    parameters: [],
  },
};

/**
 * Map an Outcome onto a ToolResult. Success carries the payload as JSON;
 * failure carries the message, which the agent loop serializes as {"error": ...}.
 */
export function toToolResult<T>(outcome: Outcome<T>): ToolResult {
  if (outcome.ok) {
    return { success: true, output: JSON.stringify(outcome.value) };
  }
  return { success: false, error: outcome.error };
}

function createHandlers(table: RateTable): Record<CurrencyToolName, ToolHandler> {
  // The registry has already checked presence and primitive types.
  return {
    convert_currency: async (params) =>
      toToolResult(
        convertCurrency(
          Number(params['amount']),
          String(params['from_currency']),
          String(params['to_currency']),
          table,
        ),
      ),
    get_exchange_rate: async (params) =>
      toToolResult(
        getExchangeRate(String(params['from_currency']), String(params['to_currency']), table),
      ),
    list_supported_currencies: async () =>
      toToolResult({ ok: true, value: listSupportedCurrencies(table) }),
  };
}

export function createCurrencyTools(table: RateTable = EXCHANGE_RATES): Array<Tool> {
  const handlers = createHandlers(table);

  return CURRENCY_TOOL_NAMES.map((name) => ({
    definition: DEFINITIONS[name],
    handler: handlers[name],
  }));
}
