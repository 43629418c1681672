// pattern: Imperative Shell

import type { ModelConfig } from "../config/schema.js";
import type { ModelProvider } from "./types.js";
import { createAnthropicAdapter } from "./anthropic.js";
import { createAzureOpenAIAdapter, createOpenAICompatAdapter } from "./openai-compat.js";

export function createModelProvider(config: ModelConfig): ModelProvider {
  switch (config.provider) {
    case "anthropic":
      return createAnthropicAdapter(config);
    case "openai-compat":
      return createOpenAICompatAdapter(config);
    case "azure":
      return createAzureOpenAIAdapter(config);
    default:
      throw new Error(
        `Unknown model provider: ${String(config.provider)}. Valid providers are: 'anthropic', 'openai-compat', 'azure'`
      );
  }
}
