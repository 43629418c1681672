// pattern: Imperative Shell

import Anthropic from "@anthropic-ai/sdk";
import type { ModelConfig } from "../config/schema.js";
import type {
  ContentBlock,
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ToolDefinition,
} from "./types.js";
import { ModelError } from "./types.js";
import { callWithRetry, type RetryOptions } from "./retry.js";

/**
 * The slice of the Anthropic client the adapter uses; tests pass a fake.
 * Only the reply's content blocks are read.
 */
export type MessagesClient = {
  messages: {
    create(
      body: Anthropic.Messages.MessageCreateParamsNonStreaming
    ): Promise<Pick<Anthropic.Messages.Message, "content">>;
  };
};

function toModelError(error: unknown): unknown {
  if (error instanceof Anthropic.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ModelError("api_error", true, error.message || "connection error");
  }
  if (error instanceof Anthropic.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

function isRetryableError(error: unknown): boolean {
  return error instanceof ModelError && error.retryable;
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<Anthropic.Messages.Tool> {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.input_schema, type: "object" },
  }));
}

// Anthropic wants tool input as an object; replaying a malformed call sends {}.
function decodeToolInput(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw);
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
  } catch {
    return {};
  }
  return {};
}

export function normalizeContentBlocks(
  blocks: ReadonlyArray<Anthropic.Messages.ContentBlock>
): Array<ContentBlock> {
  const normalized: Array<ContentBlock> = [];

  for (const block of blocks) {
    if (block.type === "text") {
      normalized.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use") {
      normalized.push({
        type: "tool_use",
        id: block.id,
        name: block.name,
        arguments: JSON.stringify(block.input ?? {}),
      });
    }
  }

  return normalized;
}

export function normalizeMessage(msg: Message): Anthropic.Messages.MessageParam {
  if (typeof msg.content === "string") {
    return {
      role: msg.role,
      content: msg.content,
    };
  }

  const content = msg.content.map((block): Anthropic.Messages.ContentBlockParam => {
    switch (block.type) {
      case "text":
        return { type: "text", text: block.text };
      case "tool_use":
        return {
          type: "tool_use",
          id: block.id,
          name: block.name,
          input: decodeToolInput(block.arguments),
        };
      case "tool_result":
        return {
          type: "tool_result",
          tool_use_id: block.tool_use_id,
          content: block.content,
          is_error: block.is_error,
        };
    }
  });

  return {
    role: msg.role,
    content,
  };
}

export function buildMessageParams(
  request: ModelRequest
): Anthropic.Messages.MessageCreateParamsNonStreaming {
  const hasTools = request.tools !== undefined && request.tools.length > 0;

  return {
    model: request.model,
    max_tokens: request.max_tokens,
    system: request.system,
    temperature: request.temperature,
    messages: request.messages.map(normalizeMessage),
    ...(hasTools && request.tools
      ? {
          tools: normalizeToolDefinitions(request.tools),
          tool_choice: { type: "auto" as const },
        }
      : {}),
  };
}

export function createMessagesAdapter(
  client: MessagesClient,
  retry: Partial<RetryOptions> = {}
): ModelProvider {
  return {
    async complete(request: ModelRequest): Promise<ModelResponse> {
      const response = await callWithRetry(
        async () => {
          try {
            return await client.messages.create(buildMessageParams(request));
          } catch (error) {
            throw toModelError(error);
          }
        },
        isRetryableError,
        {
          onError: (error, attempt) => {
            if (isRetryableError(error)) {
              const message = error instanceof Error ? error.message : String(error);
              console.error(`anthropic request attempt ${attempt + 1} failed: ${message}`);
            }
          },
          ...retry,
        }
      );

      return {
        content: normalizeContentBlocks(response.content),
      };
    },
  };
}

export function createAnthropicAdapter(config: ModelConfig): ModelProvider {
  if (!config.api_key) {
    throw new Error("anthropic adapter requires model.api_key (or ANTHROPIC_API_KEY)");
  }

  const client = new Anthropic({
    apiKey: config.api_key,
    baseURL: config.base_url,
    maxRetries: 0,
  });

  return createMessagesAdapter(client, { maxAttempts: (config.max_retries ?? 3) + 1 });
}
