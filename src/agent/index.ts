// pattern: Functional Core

/**
 * Agent loop module exports
 */

export type { Agent, AgentConfig, AgentDependencies, ConversationTurn, LoopState } from './types.ts';
export { ToolRoundLimitError } from './types.ts';
export { createAgent } from './agent.ts';
export {
  SYSTEM_PROMPT,
  buildMessages,
  parseToolArguments,
  serializeToolResult,
  extractText,
} from './context.ts';
