// pattern: Functional Core

/**
 * Context building for the agent loop: the system prompt, the seed messages,
 * and the conversions between tool calls and tool-result blocks.
 */

import type { ContentBlock, Message, TextBlock, ToolResultBlock, ToolUseBlock } from '../model/types.ts';
import type { ToolResult } from '../tool/types.ts';
import type { ConversationTurn } from './types.ts';

export const SYSTEM_PROMPT = `You are a helpful currency conversion assistant. You can:
1. Convert amounts between different currencies
2. Provide current exchange rates between currencies
3. List all supported currencies

Always provide clear and concise responses. When converting currencies, show both the converted amount and the exchange rate used.
If a user asks about a currency that isn't supported, politely let them know and suggest listing the supported currencies.`;

export function buildMessages(
  history: ReadonlyArray<ConversationTurn>,
  userMessage: string,
): Array<Message> {
  return [
    ...history.map((turn): Message => ({ role: turn.role, content: turn.content })),
    { role: 'user', content: userMessage },
  ];
}

export type ParsedArguments =
  | { ok: true; params: Record<string, unknown> }
  | { ok: false; error: string };

/**
 * Decode a tool call's argument text. Empty text means no arguments.
 */
export function parseToolArguments(raw: string): ParsedArguments {
  if (raw.trim() === '') {
    return { ok: true, params: {} };
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `invalid tool arguments: ${reason}` };
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { ok: false, error: 'invalid tool arguments: expected a JSON object' };
  }

  return { ok: true, params: Object.fromEntries(Object.entries(value)) };
}

// Failures reach the model as a single {"error": ...} object.
export function serializeToolResult(call: ToolUseBlock, result: ToolResult): ToolResultBlock {
  if (result.success) {
    return { type: 'tool_result', tool_use_id: call.id, content: result.output };
  }
  return {
    type: 'tool_result',
    tool_use_id: call.id,
    content: JSON.stringify({ error: result.error }),
    is_error: true,
  };
}

export function extractText(blocks: ReadonlyArray<ContentBlock>): string {
  return blocks
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');
}
