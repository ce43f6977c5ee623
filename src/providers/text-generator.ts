/**
 * Text generators: the single-prompt interface the Planner, Composer and
 * generative summarizer call.
 */

import type { GenerateOptions, TextGenerator } from '../core/collaborators.js';
import { CancellationToken, race } from '../integrations/cancellation.js';
import type { LLMProvider } from './types.js';

/**
 * Adapts a chat provider to `TextGenerator`: one user message per call.
 */
export class ProviderTextGenerator implements TextGenerator {
  constructor(private readonly provider: LLMProvider) {}

  get name(): string {
    return this.provider.name;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const response = await this.provider.chat([{ role: 'user', content: prompt }], {
      maxTokens: options.maxTokens,
      temperature: options.temperature,
      cancellationToken: options.cancellationToken,
    });
    return response.content;
  }
}

export type FixedResponse = string | Error | ((prompt: string, options: GenerateOptions) => string);

export interface GenerateCall {
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Deterministic generator for tests and offline runs.
 *
 * Responses are consumed in order; the last one repeats once the queue is
 * down to it. An `Error` entry rejects that call.
 */
export class FixedResponseGenerator implements TextGenerator {
  readonly name = 'fixed';
  readonly calls: GenerateCall[] = [];

  private queue: FixedResponse[];

  constructor(responses: FixedResponse | FixedResponse[] = '') {
    this.queue = Array.isArray(responses) ? [...responses] : [responses];
    if (this.queue.length === 0) this.queue.push('');
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, maxTokens: options.maxTokens, temperature: options.temperature });
    const next = this.queue.length > 1 ? this.queue.shift() : this.queue[0];
    const token = options.cancellationToken ?? CancellationToken.None;

    if (next instanceof Error) {
      throw next;
    }
    const text = typeof next === 'function' ? next(prompt, options) : (next ?? '');
    return race(Promise.resolve(text), token);
  }
}
