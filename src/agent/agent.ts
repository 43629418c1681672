// pattern: Imperative Shell

/**
 * Core agent loop implementation.
 * Drives the model through tool-calling rounds as an explicit state machine
 * until it answers in plain text or the round guard trips.
 */

import {
  SYSTEM_PROMPT,
  buildMessages,
  extractText,
  parseToolArguments,
  serializeToolResult,
} from './context.ts';
import { ToolRoundLimitError } from './types.ts';
import type { Agent, AgentDependencies, ConversationTurn, LoopState } from './types.ts';
import type { ToolResultBlock, ToolUseBlock } from '../model/types.ts';

export function createAgent(deps: AgentDependencies): Agent {
  const maxRounds = deps.config.max_tool_rounds;

  async function executeToolCall(call: ToolUseBlock): Promise<ToolResultBlock> {
    const parsed = parseToolArguments(call.arguments);
    if (!parsed.ok) {
      return serializeToolResult(call, { success: false, error: parsed.error });
    }

    try {
      return serializeToolResult(call, await deps.registry.dispatch(call.name, parsed.params));
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      return serializeToolResult(call, { success: false, error: `handler error: ${errorMsg}` });
    }
  }

  async function processMessage(
    userMessage: string,
    history: ReadonlyArray<ConversationTurn> = [],
  ): Promise<string> {
    const messages = buildMessages(history, userMessage);
    const tools = deps.registry.toModelTools();
    let state: LoopState = { phase: 'awaiting_model', round: 1 };

    while (state.phase !== 'done') {
      switch (state.phase) {
        case 'awaiting_model': {
          // Model errors propagate; retries live in the provider adapter.
          const response = await deps.model.complete({
            messages,
            system: SYSTEM_PROMPT,
            tools,
            tool_choice: 'auto',
            model: deps.config.model_name,
            max_tokens: deps.config.max_tokens,
            temperature: deps.config.temperature,
          });
          state = { phase: 'model_replied', round: state.round, content: response.content };
          break;
        }

        case 'model_replied': {
          const calls: ToolUseBlock[] = state.content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
          if (calls.length === 0) {
            state = { phase: 'done', text: extractText(state.content) };
          } else if (state.round >= maxRounds) {
            throw new ToolRoundLimitError(maxRounds);
          } else {
            state = { phase: 'executing_tools', round: state.round, content: state.content, calls };
          }
          break;
        }

        case 'executing_tools': {
          // Assistant message FIRST (must precede tool results for API ordering)
          messages.push({ role: 'assistant', content: state.content });

          const results: Array<ToolResultBlock> = [];
          for (const call of state.calls) {
            results.push(await executeToolCall(call));
          }
          messages.push({ role: 'user', content: results });

          state = { phase: 'awaiting_model', round: state.round + 1 };
          break;
        }
      }
    }

    return state.text;
  }

  return { processMessage };
}
