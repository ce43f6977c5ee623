/**
 * OpenAI Provider Adapter
 *
 * Chat Completions over fetch, with the network policy from resilientFetch.
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
// OPENAI API TYPES
// =============================================================================

const OpenAIChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

// =============================================================================
// OPENAI PROVIDER
// =============================================================================

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  readonly defaultModel = 'gpt-4o-mini';

  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private networkConfig: NetworkConfig;
  private fetchImpl?: FetchLike;

  constructor(config?: HttpProviderConfig) {
    this.apiKey = config?.apiKey ?? requireEnv('OPENAI_API_KEY');
    this.model = config?.model ?? this.defaultModel;
    this.baseUrl = config?.baseUrl ?? 'https://api.openai.com/v1';
    this.networkConfig = networkConfigFrom(config ?? { apiKey: this.apiKey }, 60000);
    this.fetchImpl = config?.fetchImpl;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatResponse> {
    const body = {
      model: options.model ?? this.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      max_tokens: options.maxTokens ?? 1024,
      temperature: options.temperature ?? 0.7,
      ...(options.stopSequences && { stop: options.stopSequences }),
    };

    try {
      const { response } = await resilientFetch({
        url: `${this.baseUrl}/chat/completions`,
        init: {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
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

      const data = await parseJsonBody(this.name, response, OpenAIChatCompletionSchema);
      const choice = data.choices[0];

      return {
        content: choice.message.content ?? '',
        stopReason: this.mapStopReason(choice.finish_reason),
        ...(data.usage && {
          usage: {
            inputTokens: data.usage.prompt_tokens,
            outputTokens: data.usage.completion_tokens,
          },
        }),
      };
    } catch (error) {
      throw wrapTransportError(this.name, error);
    }
  }

  private mapStopReason(reason: string | null): ChatResponse['stopReason'] {
    switch (reason) {
      case 'length':
        return 'max_tokens';
      case 'stop':
      default:
        return 'end_turn';
    }
  }
}

registerProvider('openai', {
  priority: 2,
  detect: (env) => hasEnv('OPENAI_API_KEY', env),
  create: async (settings, env) =>
    new OpenAIProvider({
      apiKey: settings.apiKey ?? requireEnv('OPENAI_API_KEY', env),
      model: settings.model,
      baseUrl: settings.baseUrl,
      timeoutMs: settings.timeoutMs,
      maxRetries: settings.maxRetries,
    }),
});
