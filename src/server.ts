// pattern: Imperative Shell

/**
 * A2A server entry point.
 * Loads config, wires the agent behind the JSON-RPC endpoint, and listens.
 */

import 'dotenv/config';
import type { Server } from 'http';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '@/config/config';
import type { AppConfig } from '@/config/schema';
import { createCurrencyAgent, type CurrencyAgentOverrides } from '@/compose';
import { createA2AApp, createAgentCard, createCurrencyExecutor, resolveAgentUrl } from '@/a2a';
import { EXCHANGE_RATES } from '@/currency/rates';

export function startServer(config: AppConfig, overrides: CurrencyAgentOverrides = {}): Server {
  const agent = createCurrencyAgent(config, overrides);
  const card = createAgentCard(config.server, overrides.rates);
  const app = createA2AApp(createCurrencyExecutor(agent), card);

  return app.listen(config.server.port, config.server.host, () => {
    const base = resolveAgentUrl(config.server);
    console.log(`listening on http://${config.server.host}:${config.server.port}`);
    console.log(`agent card: ${base}.well-known/agent-card.json`);
    console.log(`a2a endpoint: ${base}`);
  });
}

async function main(): Promise<void> {
  const config = loadConfig();

  console.log('='.repeat(60));
  console.log('Currency Converter A2A Agent Server');
  console.log('='.repeat(60));
  console.log(`supported currencies: ${Object.keys(EXCHANGE_RATES).join(', ')}`);

  const server = startServer(config);

  const shutdown = (): void => {
    console.log('\nShutting down...');
    server.close((error) => {
      if (error) {
        console.error('error closing server:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Run main entry point only when file is executed directly
const entry = process.argv[1];
if (entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
