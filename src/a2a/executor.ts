// pattern: Imperative Shell

/**
 * Bridges one inbound A2A message to one run of the agent loop. Failures come
 * back as agent text prefixed "Error: "; execute never rejects.
 */

import { randomUUID } from 'node:crypto';
import type { Agent } from '../agent/types.ts';
import type { AgentMessage, InboundMessage } from './types.ts';

export type CurrencyExecutor = {
  execute(message: InboundMessage): Promise<AgentMessage>;
};

function newMessageId(prefix: 'response' | 'error'): string {
  return `${prefix}-${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

export function extractUserText(message: InboundMessage): string {
  return message.parts
    .flatMap((part) =>
      (part.kind === undefined || part.kind === 'text') && part.text !== undefined ? [part.text] : [],
    )
    .join('\n');
}

export function createCurrencyExecutor(agent: Agent): CurrencyExecutor {
  function reply(prefix: 'response' | 'error', text: string, contextId?: string): AgentMessage {
    return {
      kind: 'message',
      role: 'agent',
      messageId: newMessageId(prefix),
      parts: [{ kind: 'text', text }],
      ...(contextId !== undefined && { contextId }),
    };
  }

  return {
    async execute(message: InboundMessage): Promise<AgentMessage> {
      try {
        const text = await agent.processMessage(extractUserText(message));
        return reply('response', text, message.contextId);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        console.error(`a2a request ${message.messageId} failed: ${errorMsg}`);
        return reply('error', `Error: ${errorMsg}`, message.contextId);
      }
    },
  };
}
