// pattern: Imperative Shell

/**
 * Wire the currency agent from configuration: the provider adapter, a
 * registry holding exactly the currency tools, and the loop settings.
 */

import { createAgent, type Agent } from './agent/index.ts';
import type { AppConfig } from './config/schema.ts';
import { createModelProvider } from './model/factory.ts';
import type { ModelProvider } from './model/types.ts';
import { CURRENCY_TOOL_NAMES, createCurrencyTools } from './tool/builtin/currency.ts';
import { createToolRegistry } from './tool/registry.ts';
import { EXCHANGE_RATES, assertValidRateTable } from './currency/rates.ts';
import type { RateTable } from './currency/types.ts';

export type CurrencyAgentOverrides = {
  model?: ModelProvider;
  rates?: RateTable;
};

export function createCurrencyAgent(config: AppConfig, overrides: CurrencyAgentOverrides = {}): Agent {
  const rates = overrides.rates ?? EXCHANGE_RATES;
  assertValidRateTable(rates);

  const registry = createToolRegistry();
  for (const tool of createCurrencyTools(rates)) {
    registry.register(tool);
  }
  registry.assertComplete(CURRENCY_TOOL_NAMES);

  return createAgent({
    model: overrides.model ?? createModelProvider(config.model),
    registry,
    config: {
      max_tool_rounds: config.agent.max_tool_rounds,
      model_name: config.model.name,
      max_tokens: config.agent.max_tokens,
      temperature: config.agent.temperature,
    },
  });
}
