/**
 * Provider Abstraction Types
 *
 * Chat-style provider interface shared by the HTTP adapters and the mock.
 * The pipeline itself only sees `TextGenerator` (core/collaborators.ts);
 * `ProviderTextGenerator` bridges the two.
 */

import type { CancellationToken } from '../integrations/cancellation.js';
import type { FetchLike } from './resilient-fetch.js';

// =============================================================================
// MESSAGE TYPES
// =============================================================================

export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

// =============================================================================
// PROVIDER INTERFACE
// =============================================================================

export interface ChatOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;

  /** Temperature for randomness (0-1) */
  temperature?: number;

  stopSequences?: string[];

  /** Model override (uses provider default if not specified) */
  model?: string;

  cancellationToken?: CancellationToken;
}

export interface ChatResponse {
  content: string;

  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence';

  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMProvider {
  /** Provider name for logging/debugging */
  readonly name: string;

  readonly defaultModel: string;

  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;

  isConfigured(): boolean;
}

// =============================================================================
// PROVIDER CONFIGURATION
// =============================================================================

export interface HttpProviderConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Injected in tests; defaults to the global fetch */
  fetchImpl?: FetchLike;
}

export interface MockProviderConfig {
  /** Simulated latency per call in ms (default: 0) */
  latencyMs?: number;
}

export type ProviderConfig =
  | { type: 'anthropic'; config: HttpProviderConfig }
  | { type: 'openai'; config: HttpProviderConfig }
  | { type: 'mock'; config?: MockProviderConfig };
