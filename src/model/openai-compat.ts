// pattern: Imperative Shell

import OpenAI, { AzureOpenAI } from "openai";
import type { ModelConfig } from "../config/schema.js";
import type {
  ContentBlock,
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  TextBlock,
  ToolDefinition,
  ToolResultBlock,
  ToolUseBlock,
} from "./types.js";
import { ModelError } from "./types.js";
import { callWithRetry, type RetryOptions } from "./retry.js";

const DEFAULT_AZURE_API_VERSION = "2024-02-15-preview";

/**
 * The slice of the OpenAI client the adapter uses. Both `OpenAI` and
 * `AzureOpenAI` satisfy it; tests pass an in-process fake.
 */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
};

function toModelError(error: unknown): unknown {
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ModelError("api_error", true, error.message || "connection error");
  }
  if (error instanceof OpenAI.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

function isRetryableError(error: unknown): boolean {
  return error instanceof ModelError && error.retryable;
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<OpenAI.Chat.ChatCompletionTool> {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  }));
}

function normalizeContentBlocks(
  content: string | null,
  toolCalls: Array<OpenAI.Chat.ChatCompletionMessageToolCall> | undefined
): Array<ContentBlock> {
  const blocks: Array<ContentBlock> = [];

  if (content) {
    blocks.push({
      type: "text",
      text: content,
    });
  }

  // Arguments stay as raw JSON text; the agent loop decodes them per call.
  for (const toolCall of toolCalls ?? []) {
    blocks.push({
      type: "tool_use",
      id: toolCall.id,
      name: toolCall.function.name,
      arguments: toolCall.function.arguments,
    });
  }

  return blocks;
}

/**
 * Convert one port message to the chat-completions wire format. A user message
 * carrying tool results expands to one `tool` message per result.
 */
export function normalizeMessage(msg: Message): Array<OpenAI.Chat.ChatCompletionMessageParam> {
  if (typeof msg.content === "string") {
    return msg.role === "user"
      ? [{ role: "user", content: msg.content }]
      : [{ role: "assistant", content: msg.content }];
  }

  const text = msg.content
    .filter((b): b is TextBlock => b.type === "text")
    .map((b) => b.text)
    .join("\n");

  if (msg.role === "assistant") {
    const toolCalls = msg.content
      .filter((b): b is ToolUseBlock => b.type === "tool_use")
      .map((b): OpenAI.Chat.ChatCompletionMessageToolCall => ({
        id: b.id,
        type: "function",
        function: { name: b.name, arguments: b.arguments },
      }));

    const assistant: OpenAI.Chat.ChatCompletionAssistantMessageParam = {
      role: "assistant",
      content: text || null,
    };
    if (toolCalls.length > 0) {
      assistant.tool_calls = toolCalls;
    }
    return [assistant];
  }

  const params: Array<OpenAI.Chat.ChatCompletionMessageParam> = msg.content
    .filter((b): b is ToolResultBlock => b.type === "tool_result")
    .map((b): OpenAI.Chat.ChatCompletionToolMessageParam => ({
      role: "tool",
      tool_call_id: b.tool_use_id,
      content: b.content,
    }));

  if (text) {
    params.push({ role: "user", content: text });
  }

  return params;
}

export function buildChatCompletionParams(
  request: ModelRequest
): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
  const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];

  if (request.system) {
    messages.push({
      role: "system",
      content: request.system,
    });
  }

  messages.push(...request.messages.flatMap(normalizeMessage));

  const hasTools = request.tools !== undefined && request.tools.length > 0;

  return {
    model: request.model,
    max_tokens: request.max_tokens,
    temperature: request.temperature,
    messages,
    ...(hasTools && request.tools
      ? {
          tools: normalizeToolDefinitions(request.tools),
          tool_choice: request.tool_choice ?? "auto",
        }
      : {}),
  };
}

export function createChatCompletionsAdapter(
  client: ChatCompletionsClient,
  retry: Partial<RetryOptions> = {}
): ModelProvider {
  return {
    async complete(request: ModelRequest): Promise<ModelResponse> {
      const response = await callWithRetry(
        async () => {
          try {
            return await client.chat.completions.create(buildChatCompletionParams(request));
          } catch (error) {
            throw toModelError(error);
          }
        },
        isRetryableError,
        {
          onError: (error, attempt) => {
            if (isRetryableError(error)) {
              const message = error instanceof Error ? error.message : String(error);
              console.error(`chat completion attempt ${attempt + 1} failed: ${message}`);
            }
          },
          ...retry,
        }
      );

      const choice = response.choices[0];
      if (!choice) {
        throw new ModelError("api_error", false, "no choices in response");
      }

      return {
        content: normalizeContentBlocks(choice.message.content, choice.message.tool_calls),
      };
    },
  };
}

function requireApiKey(config: ModelConfig, label: string): string {
  if (!config.api_key) {
    throw new Error(`${label} adapter requires model.api_key (or its environment variable)`);
  }
  return config.api_key;
}

function retryFromConfig(config: ModelConfig): Partial<RetryOptions> {
  return { maxAttempts: (config.max_retries ?? 3) + 1 };
}

export function createOpenAICompatAdapter(config: ModelConfig): ModelProvider {
  const client = new OpenAI({
    apiKey: requireApiKey(config, "OpenAI-compatible"),
    baseURL: config.base_url,
    maxRetries: 0,
  });

  return createChatCompletionsAdapter(client, retryFromConfig(config));
}

export function createAzureOpenAIAdapter(config: ModelConfig): ModelProvider {
  if (!config.base_url) {
    throw new Error("Azure OpenAI adapter requires model.base_url (the resource endpoint)");
  }

  const client = new AzureOpenAI({
    apiKey: requireApiKey(config, "Azure OpenAI"),
    endpoint: config.base_url,
    apiVersion: config.api_version ?? DEFAULT_AZURE_API_VERSION,
    deployment: config.name,
    maxRetries: 0,
  });

  return createChatCompletionsAdapter(client, retryFromConfig(config));
}
