// pattern: Imperative Shell

/**
 * Currency agent CLI entry point.
 * Composition root that loads config, wires the agent, and runs the interactive REPL.
 */

import 'dotenv/config';
import * as readline from 'readline';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '@/config/config';
import { createCurrencyAgent } from '@/compose';
import type { Agent, ConversationTurn } from '@/agent/types';

const EXIT_COMMANDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);
const FAREWELL = 'Goodbye! Have a great day!';
const RULE = '='.repeat(50);

export type InteractionResult = 'continue' | 'exit';

type InteractionLoopDeps = {
  agent: Agent;
  write: (text: string) => void;
};

export type InteractionLoop = {
  handle(input: string): Promise<InteractionResult>;
  history(): ReadonlyArray<ConversationTurn>;
};

export function isExitCommand(input: string): boolean {
  return EXIT_COMMANDS.has(input.trim().toLowerCase());
}

/**
 * Create an interaction loop that can be tested with mock dependencies.
 * Only completed exchanges join the history; a failed turn leaves it unchanged.
 */
export function createInteractionLoop(deps: InteractionLoopDeps): InteractionLoop {
  const history: Array<ConversationTurn> = [];

  return {
    async handle(input: string): Promise<InteractionResult> {
      const userInput = input.trim();
      if (!userInput) {
        return 'continue';
      }

      if (isExitCommand(userInput)) {
        deps.write(`\n${FAREWELL}\n`);
        return 'exit';
      }

      try {
        const response = await deps.agent.processMessage(userInput, [...history]);
        deps.write(`\nAssistant: ${response}\n`);
        history.push({ role: 'user', content: userInput }, { role: 'assistant', content: response });
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        deps.write(`\nError: ${errorMsg}\n`);
        deps.write('Please check the model settings in config.toml or your environment.\n');
      }

      return 'continue';
    },

    history(): ReadonlyArray<ConversationTurn> {
      return history;
    },
  };
}

function printBanner(): void {
  console.log(RULE);
  console.log('Currency Converter Agent');
  console.log(RULE);
  console.log("\nHello! I'm your currency conversion assistant.");
  console.log('I can help you convert currencies, check exchange rates,');
  console.log('and list supported currencies.');
  console.log("\nType 'quit' or 'exit' to end the conversation.");
  console.log('-'.repeat(50));
}

async function main(): Promise<void> {
  const config = loadConfig();
  const agent = createCurrencyAgent(config);

  printBanner();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const loop = createInteractionLoop({
    agent,
    write: (text) => {
      process.stdout.write(text);
    },
  });

  rl.on('SIGINT', () => {
    console.log(`\n\n${FAREWELL}`);
    rl.close();
  });

  rl.setPrompt('\nYou: ');

  // Lines are handled one at a time so history stays in order.
  let pending: Promise<void> = Promise.resolve();
  rl.on('line', (line: string) => {
    pending = pending
      .then(() => loop.handle(line))
      .then((result) => {
        if (result === 'exit') {
          rl.close();
        } else {
          rl.prompt();
        }
      })
      .catch((error: unknown) => {
        console.error('repl error:', error);
        rl.prompt();
      });
  });

  rl.prompt();
}

// Run main entry point only when file is executed directly
const entry = process.argv[1];
if (entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
