// pattern: Functional Core

export type {
  AgentCard,
  AgentMessage,
  AgentSkill,
  InboundMessage,
  JsonRpcId,
  JsonRpcResponse,
  TextPart,
} from './types.ts';
export { JSON_RPC_ERRORS, InboundMessageSchema, MessageSendParamsSchema } from './types.ts';
export { createAgentCard, resolveAgentUrl } from './card.ts';
export { createCurrencyExecutor, extractUserText, type CurrencyExecutor } from './executor.ts';
export { createA2AApp, handleJsonRpc, AGENT_CARD_PATHS } from './server.ts';
