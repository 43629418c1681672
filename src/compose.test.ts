import { describe, it, expect } from 'vitest';
import { createCurrencyAgent } from './compose.ts';
import { AppConfigSchema } from './config/schema.ts';
import type { ModelProvider, ModelRequest, ModelResponse } from './model/types.ts';

describe('createCurrencyAgent', () => {
  const config = AppConfigSchema.parse({
    agent: { max_tool_rounds: 4, max_tokens: 300 },
    model: { provider: 'openai-compat', name: 'gpt-4o-mini', api_key: 'test-secret' },
  });

  it('should run the loop with the configured model settings and the currency tools', async () => {
    const requests: Array<ModelRequest> = [];
    const replies: Array<ModelResponse> = [
      {
        content: [
          {
            type: 'tool_use',
            id: 'call_1',
            name: 'convert_currency',
            arguments: '{"amount":50,"from_currency":"EUR","to_currency":"USD"}',
          },
        ],
      },
      { content: [{ type: 'text', text: '50 EUR is 54.35 USD.' }] },
    ];
    const model: ModelProvider = {
      async complete(request) {
        requests.push({ ...request, messages: [...request.messages] });
        const next = replies.shift();
        if (!next) {
          throw new Error('no reply left');
        }
        return next;
      },
    };

    const agent = createCurrencyAgent(config, { model });
    const reply = await agent.processMessage('Convert 50 EUR to USD');

    expect(reply).toBe('50 EUR is 54.35 USD.');
    expect(requests[0]?.model).toBe('gpt-4o-mini');
    expect(requests[0]?.max_tokens).toBe(300);
    expect(requests[1]?.messages[2]).toEqual({
      role: 'user',
      content: [
        {
          type: 'tool_result',
          tool_use_id: 'call_1',
          content:
            '{"original_amount":50,"from_currency":"EUR","to_currency":"USD","converted_amount":54.35,"exchange_rate":1.086957}',
        },
      ],
    });
  });

  it('should reject an invalid rate table', () => {
    expect(() => createCurrencyAgent(config, { rates: { USD: 1, EUR: -1 } })).toThrow(
      'rate for EUR must be a positive number, got -1',
    );
  });

  it('should build a provider from config when none is given', () => {
    expect(() => createCurrencyAgent(config)).not.toThrow();
  });
});
