/**
 * Anthropic Provider Adapter
 *
 * Messages API over fetch. System messages are lifted into the `system`
 * field; the rest are sent as the conversation.
 */

import { z } from 'zod';
import type { ChatOptions, ChatResponse, HttpProviderConfig, LLMProvider, Message } from '../types.js';
import { registerProvider, hasEnv, requireEnv } from '../provider.js';
import { resilientFetch, type FetchLike, type NetworkConfig } from '../resilient-fetch.js';
import {
  handleHttpError,
  logRetry,
  networkConfigFrom,
  parseJsonBody,
  wrapTransportError,
} from './http-shared.js';

// =============================================================================
// ANTHROPIC API TYPES
// =============================================================================

const AnthropicMessageSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
  stop_reason: z.string().nullable(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

// =============================================================================
// ANTHROPIC PROVIDER
// =============================================================================

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly defaultModel = 'claude-3-5-haiku-latest';

  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private networkConfig: NetworkConfig;
  private fetchImpl?: FetchLike;

  constructor(config?: HttpProviderConfig) {
    this.apiKey = config?.apiKey ?? requireEnv('ANTHROPIC_API_KEY');
    this.model = config?.model ?? this.defaultModel;
    this.baseUrl = config?.baseUrl ?? 'https://api.anthropic.com';
    this.networkConfig = networkConfigFrom(config ?? { apiKey: this.apiKey }, 120000);
    this.fetchImpl = config?.fetchImpl;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatResponse> {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const conversation = messages.flatMap((m) =>
      m.role === 'system' ? [] : [{ role: m.role, content: m.content }],
    );

    const body = {
      model: options.model ?? this.model,
      max_tokens: options.maxTokens ?? 1024,
      temperature: options.temperature ?? 0.7,
      ...(system && { system }),
      messages: conversation,
      ...(options.stopSequences && { stop_sequences: options.stopSequences }),
    };

    try {
      const { response } = await resilientFetch({
        url: `${this.baseUrl}/v1/messages`,
        init: {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': this.apiKey,
            'anthropic-version': '2023-06-01',
          },
          body: JSON.stringify(body),
        },
        providerName: this.name,
        networkConfig: this.networkConfig,
        cancellationToken: options.cancellationToken,
        onRetry: logRetry(this.name),
        fetchImpl: this.fetchImpl,
      });

      if (!response.ok) {
        throw handleHttpError(this.name, response.status, await response.text());
      }

      const data = await parseJsonBody(this.name, response, AnthropicMessageSchema);
      const content = data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('');

      return {
        content,
        stopReason: this.mapStopReason(data.stop_reason),
        ...(data.usage && {
          usage: {
            inputTokens: data.usage.input_tokens,
            outputTokens: data.usage.output_tokens,
          },
        }),
      };
    } catch (error) {
      throw wrapTransportError(this.name, error);
    }
  }

  private mapStopReason(reason: string | null): ChatResponse['stopReason'] {
    switch (reason) {
      case 'max_tokens':
        return 'max_tokens';
      case 'stop_sequence':
        return 'stop_sequence';
      default:
        return 'end_turn';
    }
  }
}

registerProvider('anthropic', {
  priority: 1,
  detect: (env) => hasEnv('ANTHROPIC_API_KEY', env),
  create: async (settings, env) =>
    new AnthropicProvider({
      apiKey: settings.apiKey ?? requireEnv('ANTHROPIC_API_KEY', env),
      model: settings.model,
      baseUrl: settings.baseUrl,
      timeoutMs: settings.timeoutMs,
      maxRetries: settings.maxRetries,
    }),
});
