// pattern: Imperative Shell

/**
 * Express application for the A2A surface: agent card discovery and the
 * JSON-RPC endpoint. Only message/send does work; there are no tasks.
 */

import express, { type ErrorRequestHandler, type Express, type Request, type Response } from 'express';
import type { CurrencyExecutor } from './executor.ts';
import {
  JSON_RPC_ERRORS,
  JsonRpcIdSchema,
  JsonRpcRequestSchema,
  MessageSendParamsSchema,
  type AgentCard,
  type JsonRpcErrorObject,
  type JsonRpcId,
  type JsonRpcResponse,
} from './types.ts';

export const AGENT_CARD_PATHS = ['/.well-known/agent-card.json', '/.well-known/agent.json'] as const;

function failure(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error };
}

// Best effort: an invalid envelope still gets its id back when it has a usable one.
function recoverId(body: unknown): JsonRpcId {
  if (typeof body !== 'object' || body === null || !('id' in body)) {
    return null;
  }
  const parsed = JsonRpcIdSchema.safeParse(body.id);
  return parsed.success ? parsed.data : null;
}

export async function handleJsonRpc(executor: CurrencyExecutor, body: unknown): Promise<JsonRpcResponse> {
  const envelope = JsonRpcRequestSchema.safeParse(body);
  if (!envelope.success) {
    return failure(recoverId(body), {
      code: JSON_RPC_ERRORS.INVALID_REQUEST,
      message: 'Invalid Request',
    });
  }

  const { method, params } = envelope.data;
  const id = envelope.data.id ?? null;

  switch (method) {
    case 'message/send': {
      const parsed = MessageSendParamsSchema.safeParse(params);
      if (!parsed.success) {
        return failure(id, {
          code: JSON_RPC_ERRORS.INVALID_PARAMS,
          message: 'Invalid params',
          data: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
      const result = await executor.execute(parsed.data.message);
      return { jsonrpc: '2.0', id, result };
    }
    case 'message/stream':
      return failure(id, {
        code: JSON_RPC_ERRORS.UNSUPPORTED_OPERATION,
        message: 'Streaming is not supported by this agent',
      });
    case 'tasks/get':
    case 'tasks/cancel':
      return failure(id, { code: JSON_RPC_ERRORS.TASK_NOT_FOUND, message: 'Task not found' });
    default:
      return failure(id, {
        code: JSON_RPC_ERRORS.METHOD_NOT_FOUND,
        message: `Method not found: ${method}`,
      });
  }
}

export function createA2AApp(executor: CurrencyExecutor, card: AgentCard): Express {
  const app = express();
  app.use(express.json());

  for (const path of AGENT_CARD_PATHS) {
    app.get(path, (_req: Request, res: Response) => {
      res.json(card);
    });
  }

  app.post('/', (req, res, next) => {
    handleJsonRpc(executor, req.body)
      .then((response) => {
        res.json(response);
      })
      .catch(next);
  });

  // express.json() rejects unparseable bodies with a SyntaxError.
  const parseErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.json(failure(null, { code: JSON_RPC_ERRORS.PARSE_ERROR, message: 'Parse error' }));
      return;
    }
    next(err);
  };
  app.use(parseErrorHandler);

  return app;
}
