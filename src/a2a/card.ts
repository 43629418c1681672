// pattern: Functional Core

import { EXCHANGE_RATES } from '../currency/rates.ts';
import type { RateTable } from '../currency/types.ts';
import type { ServerConfig } from '../config/schema.ts';
import type { AgentCard, AgentSkill } from './types.ts';

const SKILLS: ReadonlyArray<AgentSkill> = [
  {
    id: 'convert-currency',
    name: 'Currency Conversion',
    description: "Convert an amount from one currency to another. Example: 'Convert 100 USD to EUR'",
    tags: ['currency', 'conversion', 'finance', 'money'],
    examples: ['Convert 100 USD to EUR', 'How much is 50 GBP in JPY?', 'Change 1000 INR to USD'],
  },
  {
    id: 'exchange-rate',
    name: 'Exchange Rate Lookup',
    description:
      "Get the current exchange rate between two currencies. Example: 'What is the exchange rate from USD to EUR?'",
    tags: ['currency', 'exchange-rate', 'finance'],
    examples: [
      'What is the exchange rate from USD to EUR?',
      'EUR to GBP rate',
      'Show me the USD to INR exchange rate',
    ],
  },
  {
    id: 'list-currencies',
    name: 'List Supported Currencies',
    description: 'List all supported currencies for conversion.',
    tags: ['currency', 'list', 'supported'],
    examples: ['What currencies do you support?', 'List all currencies', 'Show supported currencies'],
  },
];

/**
 * The address clients should call: the configured public URL, or the bind
 * address. Always ends in "/".
 */
export function resolveAgentUrl(server: Pick<ServerConfig, 'host' | 'port' | 'public_url'>): string {
  const url = server.public_url ?? `http://${server.host}:${server.port}`;
  return url.endsWith('/') ? url : `${url}/`;
}

export function createAgentCard(
  server: Pick<ServerConfig, 'host' | 'port' | 'public_url'>,
  rates: RateTable = EXCHANGE_RATES,
): AgentCard {
  const count = Object.keys(rates).length;

  return {
    name: 'Currency Converter Agent',
    description:
      'An AI-powered agent that converts currencies, provides exchange rates, and lists supported currencies. ' +
      `Supports ${count} major world currencies.`,
    url: resolveAgentUrl(server),
    version: '1.0.0',
    protocolVersion: '0.3.0',
    preferredTransport: 'JSONRPC',
    capabilities: {
      streaming: false,
      pushNotifications: false,
      stateTransitionHistory: false,
    },
    defaultInputModes: ['text/plain'],
    defaultOutputModes: ['text/plain'],
    skills: SKILLS.map((skill) => ({ ...skill, tags: [...skill.tags], examples: [...skill.examples] })),
  };
}
