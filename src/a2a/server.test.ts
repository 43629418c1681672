import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createA2AApp } from './server.ts';
import { createAgentCard } from './card.ts';
import { createCurrencyExecutor } from './executor.ts';
import type { Agent } from '../agent/types.ts';

function createApp(reply: (message: string) => Promise<string> = async (m) => `echo: ${m}`) {
  const agent: Agent = { processMessage: vi.fn(reply) };
  const card = createAgentCard({ host: 'localhost', port: 8000 });
  return createA2AApp(createCurrencyExecutor(agent), card);
}

function sendRequest(id: string | number, text: string) {
  return {
    jsonrpc: '2.0',
    id,
    method: 'message/send',
    params: {
      message: {
        kind: 'message',
        role: 'user',
        messageId: 'msg-100',
        contextId: 'ctx-100',
        parts: [{ kind: 'text', text }],
      },
    },
  };
}

describe('createA2AApp', () => {
  describe('agent card', () => {
    it('should serve the card at /.well-known/agent-card.json', async () => {
      const response = await request(createApp()).get('/.well-known/agent-card.json').expect(200);

      expect(response.body.name).toBe('Currency Converter Agent');
      expect(response.body.url).toBe('http://localhost:8000/');
    });

    it('should serve the same card at the legacy path', async () => {
      const app = createApp();
      const current = await request(app).get('/.well-known/agent-card.json').expect(200);
      const legacy = await request(app).get('/.well-known/agent.json').expect(200);

      expect(legacy.body).toEqual(current.body);
    });
  });

  describe('message/send', () => {
    it('should return the agent message as the result', async () => {
      const response = await request(createApp())
        .post('/')
        .send(sendRequest(1, 'Convert 100 USD to EUR'))
        .expect(200);

      expect(response.body.jsonrpc).toBe('2.0');
      expect(response.body.id).toBe(1);
      expect(response.body.result.role).toBe('agent');
      expect(response.body.result.contextId).toBe('ctx-100');
      expect(response.body.result.parts).toEqual([{ kind: 'text', text: 'echo: Convert 100 USD to EUR' }]);
      expect(response.body.result.messageId).toMatch(/^response-[0-9a-f]{8}$/);
    });

    it('should report agent failures as agent text with HTTP 200', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const app = createApp(async () => {
        throw new Error('upstream unavailable');
      });

      const response = await request(app).post('/').send(sendRequest('req-2', 'Hi')).expect(200);

      expect(response.body.id).toBe('req-2');
      expect(response.body.result.parts).toEqual([{ kind: 'text', text: 'Error: upstream unavailable' }]);
      expect(response.body.result.messageId).toMatch(/^error-[0-9a-f]{8}$/);
      vi.restoreAllMocks();
    });

    it('should reject params without a valid user message', async () => {
      const body = sendRequest(3, 'Hi');
      const response = await request(createApp())
        .post('/')
        .send({ ...body, params: { message: { ...body.params.message, role: 'agent' } } })
        .expect(200);

      expect(response.body.id).toBe(3);
      expect(response.body.error.code).toBe(-32602);
      expect(response.body.error.message).toBe('Invalid params');
    });
  });

  describe('json-rpc errors', () => {
    it('should refuse streaming', async () => {
      const response = await request(createApp())
        .post('/')
        .send({ ...sendRequest(4, 'Hi'), method: 'message/stream' })
        .expect(200);

      expect(response.body).toEqual({
        jsonrpc: '2.0',
        id: 4,
        error: { code: -32004, message: 'Streaming is not supported by this agent' },
      });
    });

    it.each(['tasks/get', 'tasks/cancel'])('should answer %s with task not found', async (method) => {
      const response = await request(createApp())
        .post('/')
        .send({ jsonrpc: '2.0', id: 5, method, params: { id: 'task-1' } })
        .expect(200);

      expect(response.body).toEqual({
        jsonrpc: '2.0',
        id: 5,
        error: { code: -32001, message: 'Task not found' },
      });
    });

    it('should answer unknown methods with method not found', async () => {
      const response = await request(createApp())
        .post('/')
        .send({ jsonrpc: '2.0', id: 6, method: 'agent/teleport' })
        .expect(200);

      expect(response.body).toEqual({
        jsonrpc: '2.0',
        id: 6,
        error: { code: -32601, message: 'Method not found: agent/teleport' },
      });
    });

    it('should answer a malformed envelope with invalid request', async () => {
      const response = await request(createApp())
        .post('/')
        .send({ jsonrpc: '1.0', id: 7, method: 'message/send' })
        .expect(200);

      expect(response.body).toEqual({
        jsonrpc: '2.0',
        id: 7,
        error: { code: -32600, message: 'Invalid Request' },
      });
    });

    it('should answer an unparseable body with a parse error', async () => {
      const response = await request(createApp())
        .post('/')
        .set('Content-Type', 'application/json')
        .send('{"jsonrpc": "2.0", "method":')
        .expect(200);

      expect(response.body).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32700, message: 'Parse error' },
      });
    });
  });
});
