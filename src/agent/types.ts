// pattern: Functional Core

/**
 * Agent types for the tool-calling loop.
 * These types define the agent's configuration, dependencies, loop states,
 * and the public interface for the agent.
 */

import type { ContentBlock, ModelProvider, ToolUseBlock } from '../model/types.ts';
import type { ToolRegistry } from '../tool/types.ts';

export type AgentConfig = {
  max_tool_rounds: number;
  model_name: string;
  max_tokens: number;
  temperature?: number;
};

/**
 * A finished exchange kept by the caller between messages. Only final text is
 * carried forward; tool traffic stays inside the turn that produced it.
 */
export type ConversationTurn = {
  role: 'user' | 'assistant';
  content: string;
};

export type AgentDependencies = {
  model: ModelProvider;
  registry: ToolRegistry;
  config: AgentConfig;
};

export type Agent = {
  processMessage(userMessage: string, history?: ReadonlyArray<ConversationTurn>): Promise<string>;
};

export type LoopState =
  | { phase: 'awaiting_model'; round: number }
  | { phase: 'model_replied'; round: number; content: Array<ContentBlock> }
  | { phase: 'executing_tools'; round: number; content: Array<ContentBlock>; calls: Array<ToolUseBlock> }
  | { phase: 'done'; text: string };

export class ToolRoundLimitError extends Error {
  constructor(public rounds: number) {
    super(`tool round limit exceeded (${rounds} rounds)`);
    this.name = 'ToolRoundLimitError';
  }
}
