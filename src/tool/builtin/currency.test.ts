// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createToolRegistry } from '../registry.ts';
import { CURRENCY_TOOL_NAMES, createCurrencyTools, toToolResult } from './currency.ts';

function createCurrencyRegistry(table?: Record<string, number>) {
  const registry = createToolRegistry();
  for (const tool of createCurrencyTools(table)) {
    registry.register(tool);
  }
  return registry;
}

describe('currency tools', () => {
  it('should declare one tool per name, in order', () => {
    const names = createCurrencyTools().map((tool) => tool.definition.name);

    expect(names).toEqual([...CURRENCY_TOOL_NAMES]);
  });

  it('should satisfy the completeness check', () => {
    const registry = createCurrencyRegistry();

    expect(() => registry.assertComplete(CURRENCY_TOOL_NAMES)).not.toThrow();
  });

  it('should expose the convert_currency schema to the model', () => {
    const registry = createCurrencyRegistry();
    const convert = registry.toModelTools().find((tool) => tool.name === 'convert_currency');

    expect(convert?.input_schema).toEqual({
      type: 'object',
      properties: {
        amount: { type: 'number', description: 'The amount to convert' },
        from_currency: {
          type: 'string',
          description: 'The source currency code (e.g., USD, EUR, GBP)',
        },
        to_currency: {
          type: 'string',
          description: 'The target currency code (e.g., USD, EUR, GBP)',
        },
      },
      required: ['amount', 'from_currency', 'to_currency'],
    });
  });

  it('should convert through dispatch', async () => {
    const registry = createCurrencyRegistry();

    const result = await registry.dispatch('convert_currency', {
      amount: 100,
      from_currency: 'USD',
      to_currency: 'EUR',
    });

    expect(result).toEqual({
      success: true,
      output:
        '{"original_amount":100,"from_currency":"USD","to_currency":"EUR","converted_amount":92,"exchange_rate":0.92}',
    });
  });

  it('should look up a rate through dispatch', async () => {
    const registry = createCurrencyRegistry();

    const result = await registry.dispatch('get_exchange_rate', {
      from_currency: 'gbp',
      to_currency: 'jpy',
    });

    expect(result).toEqual({
      success: true,
      output: '{"from_currency":"GBP","to_currency":"JPY","exchange_rate":189.240506}',
    });
  });

  it('should list the currencies of the table it was built with', async () => {
    const registry = createCurrencyRegistry({ USD: 1, EUR: 0.5 });

    const result = await registry.dispatch('list_supported_currencies', {});

    expect(result).toEqual({
      success: true,
      output: '{"supported_currencies":["USD","EUR"],"base_currency":"USD","total_currencies":2}',
    });
  });

  it('should surface unsupported currencies as failed results', async () => {
    const registry = createCurrencyRegistry();

    const result = await registry.dispatch('convert_currency', {
      amount: 5,
      from_currency: 'XYZ',
      to_currency: 'EUR',
    });

    expect(result).toEqual({ success: false, error: "Currency 'XYZ' not supported" });
  });
});

describe('toToolResult', () => {
  it('should serialize the success payload', () => {
    expect(toToolResult({ ok: true, value: { a: 1 } })).toEqual({
      success: true,
      output: '{"a":1}',
    });
  });

  it('should carry the failure message', () => {
    expect(toToolResult({ ok: false, error: 'nope' })).toEqual({
      success: false,
      error: 'nope',
    });
  });
});
