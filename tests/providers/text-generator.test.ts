import { describe, expect, it } from 'vitest';
import { CancellationError, createCancellationTokenSource } from '../../src/integrations/cancellation.js';
import {
  FixedResponseGenerator,
  ProviderTextGenerator,
  createTextGenerator,
  getProvider,
  listProviders,
} from '../../src/providers/index.js';
import type { ChatOptions, ChatResponse, LLMProvider, Message } from '../../src/providers/index.js';

class RecordingProvider implements LLMProvider {
  readonly name = 'recording';
  readonly defaultModel = 'recording-model';
  readonly calls: Array<{ messages: Message[]; options?: ChatOptions }> = [];

  isConfigured(): boolean {
    return true;
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages, options });
    return { content: 'recorded', stopReason: 'end_turn' };
  }
}

describe('ProviderTextGenerator', () => {
  it('should send the prompt as a single user message', async () => {
    const provider = new RecordingProvider();
    const generator = new ProviderTextGenerator(provider);

    const text = await generator.generate('Plan this', { maxTokens: 300, temperature: 0.5 });

    expect(text).toBe('recorded');
    expect(generator.name).toBe('recording');
    expect(provider.calls).toEqual([
      {
        messages: [{ role: 'user', content: 'Plan this' }],
        options: { maxTokens: 300, temperature: 0.5, cancellationToken: undefined },
      },
    ]);
  });
});

describe('FixedResponseGenerator', () => {
  it('should consume responses in order and repeat the last', async () => {
    const generator = new FixedResponseGenerator(['first', 'second']);
    const options = { maxTokens: 10, temperature: 0 };

    expect(await generator.generate('a', options)).toBe('first');
    expect(await generator.generate('b', options)).toBe('second');
    expect(await generator.generate('c', options)).toBe('second');
    expect(generator.calls.map((c) => c.prompt)).toEqual(['a', 'b', 'c']);
  });

  it('should compute responses from the prompt', async () => {
    const generator = new FixedResponseGenerator((prompt) => prompt.toUpperCase());
    expect(await generator.generate('hello', { maxTokens: 10, temperature: 0 })).toBe('HELLO');
  });

  it('should reject when cancelled', async () => {
    const source = createCancellationTokenSource();
    source.cancel('stop');
    const generator = new FixedResponseGenerator('unused');

    await expect(
      generator.generate('x', { maxTokens: 10, temperature: 0, cancellationToken: source.token }),
    ).rejects.toBeInstanceOf(CancellationError);
  });
});

describe('provider resolution', () => {
  it('should fall back to the mock provider without keys', async () => {
    const provider = await getProvider({ type: 'auto' }, {});
    expect(provider.name).toBe('mock');
  });

  it('should prefer configured providers by priority', async () => {
    const provider = await getProvider({}, { OPENAI_API_KEY: 'test-secret' });
    expect(provider.name).toBe('openai');
  });

  it('should use an explicit provider with a key from settings', async () => {
    const generator = await createTextGenerator({ type: 'anthropic', apiKey: 'test-secret' }, {});
    expect(generator.name).toBe('anthropic');
  });

  it('should reject an explicit provider without a key', async () => {
    await expect(getProvider({ type: 'openai' }, {})).rejects.toThrow('openai is not configured: API key is not set');
  });

  it('should list providers by priority', () => {
    expect(listProviders({}).map((p) => [p.name, p.configured])).toEqual([
      ['anthropic', false],
      ['openai', false],
      ['mock', true],
    ]);
  });
});
