// pattern: Functional Core

export type {
  TextBlock,
  ToolUseBlock,
  ToolResultBlock,
  ContentBlock,
  ToolDefinition,
  Message,
  ToolChoice,
  ModelRequest,
  ModelResponse,
  ModelErrorCode,
} from "./types.js";

export { ModelError, type ModelProvider } from "./types.js";
export { createAnthropicAdapter, createMessagesAdapter } from "./anthropic.js";
export {
  createOpenAICompatAdapter,
  createAzureOpenAIAdapter,
  createChatCompletionsAdapter,
} from "./openai-compat.js";
export { createModelProvider } from "./factory.js";
export { callWithRetry, type RetryOptions } from "./retry.js";
