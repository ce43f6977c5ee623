import { describe, expect, it } from 'vitest';
import { ProviderError } from '../../src/errors/index.js';
import { AnthropicProvider } from '../../src/providers/adapters/anthropic.js';
import { MockProvider } from '../../src/providers/adapters/mock.js';
import { OpenAIProvider } from '../../src/providers/adapters/openai.js';
import type { FetchLike } from '../../src/providers/resilient-fetch.js';
import { parseComposition, parsePlan } from '../../src/agents/parsing.js';

interface CapturedRequest {
  url: string;
  headers: Headers;
  body: unknown;
}

function jsonFetch(status: number, payload: unknown): { fetchImpl: FetchLike; requests: CapturedRequest[] } {
  const requests: CapturedRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    requests.push({
      url,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
    });
    return new Response(JSON.stringify(payload), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  };
  return { fetchImpl, requests };
}

describe('OpenAIProvider', () => {
  it('should send a chat completion request and map the reply', async () => {
    const { fetchImpl, requests } = jsonFetch(200, {
      choices: [{ message: { content: 'Hello Ada' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', baseUrl: 'http://openai.test', fetchImpl });

    const response = await provider.chat([{ role: 'user', content: 'Hi' }], { maxTokens: 300, temperature: 0.5 });

    expect(response).toEqual({ content: 'Hello Ada', stopReason: 'end_turn', usage: { inputTokens: 12, outputTokens: 3 } });
    expect(requests[0].url).toBe('http://openai.test/chat/completions');
    expect(requests[0].headers.get('authorization')).toBe('Bearer test-secret');
    expect(requests[0].body).toEqual({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'Hi' }],
      max_tokens: 300,
      temperature: 0.5,
    });
  });

  it('should map a length stop to max_tokens', async () => {
    const { fetchImpl } = jsonFetch(200, { choices: [{ message: { content: null }, finish_reason: 'length' }] });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', fetchImpl });

    expect(await provider.chat([{ role: 'user', content: 'Hi' }])).toEqual({ content: '', stopReason: 'max_tokens' });
  });

  it('should report authentication failures', async () => {
    const { fetchImpl } = jsonFetch(401, { error: 'bad key' });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', fetchImpl });

    await expect(provider.chat([{ role: 'user', content: 'Hi' }])).rejects.toThrow('Authentication failed for openai');
  });

  it('should reject malformed bodies', async () => {
    const { fetchImpl } = jsonFetch(200, { choices: [] });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', fetchImpl });

    const failure = provider.chat([{ role: 'user', content: 'Hi' }]);
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('openai returned an unexpected response');
  });
});

describe('AnthropicProvider', () => {
  it('should lift system messages and join text blocks', async () => {
    const { fetchImpl, requests } = jsonFetch(200, {
      content: [
        { type: 'text', text: 'Hello ' },
        { type: 'text', text: 'Ada' },
      ],
      stop_reason: 'end_turn',
    });
    const provider = new AnthropicProvider({ apiKey: 'test-secret', baseUrl: 'http://anthropic.test', fetchImpl });

    const response = await provider.chat([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Hi' },
    ]);

    expect(response).toEqual({ content: 'Hello Ada', stopReason: 'end_turn' });
    expect(requests[0].url).toBe('http://anthropic.test/v1/messages');
    expect(requests[0].headers.get('x-api-key')).toBe('test-secret');
    expect(requests[0].body).toEqual({
      model: 'claude-3-5-haiku-latest',
      max_tokens: 1024,
      temperature: 0.7,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Hi' }],
    });
  });

  it('should report client errors with the body', async () => {
    const { fetchImpl } = jsonFetch(400, { error: 'bad request' });
    const provider = new AnthropicProvider({ apiKey: 'test-secret', fetchImpl });

    await expect(provider.chat([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
      'anthropic rejected the request (400): {"error":"bad request"}',
    );
  });
});

describe('MockProvider', () => {
  it('should answer planning prompts in the planner format', async () => {
    const provider = new MockProvider();
    const prompt = 'SUBTASKS:\n[Current Request]\nUSER: What is my name?';

    const response = await provider.chat([{ role: 'user', content: prompt }]);

    expect(parsePlan(response.content)).toEqual({
      subtasks: [
        'Retrieve conversation history for context',
        'Analyze the request: What is my name?',
        'Compose a reply grounded in the history',
      ],
      dataAccessPlan: 'Query messages collection for session history',
    });
    expect(provider.callCount).toBe(1);
  });

  it('should answer composition prompts with three suggestions', async () => {
    const provider = new MockProvider();

    const response = await provider.chat([{ role: 'user', content: 'ANSWER:\n[Current Request]\nUSER: Hello' }]);
    const parsed = parseComposition(response.content);

    expect(parsed.answer).toBe('Mock response to: Hello. The analysis has been completed with relevant findings.');
    expect(parsed.suggestions).toHaveLength(3);
  });
});
