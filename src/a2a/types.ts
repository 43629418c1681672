// pattern: Functional Core

/**
 * A2A wire types: the JSON-RPC envelope, inbound messages (validated with zod),
 * and the outbound agent message and card.
 */

import { z } from 'zod';

export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  TASK_NOT_FOUND: -32001,
  UNSUPPORTED_OPERATION: -32004,
} as const;

export const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: JsonRpcIdSchema.optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

// Non-text parts (files, data) are accepted and ignored.
const PartSchema = z.object({
  kind: z.string().optional(),
  text: z.string().optional(),
});

export const InboundMessageSchema = z.object({
  kind: z.literal('message').optional(),
  role: z.literal('user'),
  parts: z.array(PartSchema),
  messageId: z.string().min(1),
  contextId: z.string().optional(),
  taskId: z.string().optional(),
});

export const MessageSendParamsSchema = z.object({
  message: InboundMessageSchema,
  configuration: z.record(z.unknown()).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;
export type InboundMessage = z.infer<typeof InboundMessageSchema>;

export type TextPart = {
  kind: 'text';
  text: string;
};

export type AgentMessage = {
  kind: 'message';
  role: 'agent';
  messageId: string;
  parts: Array<TextPart>;
  contextId?: string;
};

export type JsonRpcErrorObject = {
  code: number;
  message: string;
  data?: unknown;
};

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: AgentMessage }
  | { jsonrpc: '2.0'; id: JsonRpcId; error: JsonRpcErrorObject };

export type AgentSkill = {
  id: string;
  name: string;
  description: string;
  tags: Array<string>;
  examples: Array<string>;
};

export type AgentCard = {
  name: string;
  description: string;
  url: string;
  version: string;
  protocolVersion: string;
  preferredTransport: 'JSONRPC';
  capabilities: {
    streaming: boolean;
    pushNotifications: boolean;
    stateTransitionHistory: boolean;
  };
  defaultInputModes: Array<string>;
  defaultOutputModes: Array<string>;
  skills: Array<AgentSkill>;
};
