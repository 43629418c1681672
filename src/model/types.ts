// pattern: Functional Core

/**
 * Shared types for model providers.
 * These types define the port interface that all model adapters normalize to.
 */

export type TextBlock = {
  type: "text";
  text: string;
};

/**
 * A tool call requested by the model. `arguments` is the raw JSON text the
 * model produced; decoding it is the caller's job.
 */
export type ToolUseBlock = {
  type: "tool_use";
  id: string;
  name: string;
  arguments: string;
};

export type ToolResultBlock = {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
};

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export type ToolDefinition = {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
};

export type Message = {
  role: "user" | "assistant";
  content: string | Array<ContentBlock>;
};

export type ToolChoice = "auto";

export type ModelRequest = {
  messages: ReadonlyArray<Message>;
  system?: string;
  tools?: ReadonlyArray<ToolDefinition>;
  tool_choice?: ToolChoice;
  model: string;
  max_tokens: number;
  temperature?: number;
};

export type ModelResponse = {
  content: Array<ContentBlock>;
};

export type ModelErrorCode = "auth" | "rate_limit" | "timeout" | "api_error";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    public retryable: boolean = false,
    message: string = ""
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export interface ModelProvider {
  complete(request: ModelRequest): Promise<ModelResponse>;
}
