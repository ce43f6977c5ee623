/**
 * Chat Service
 *
 * One call per chat request: make sure the session exists, pack the
 * context, build the initial state and stream the pipeline's events. The
 * commit hook writes the finished interaction through the ChatRepository.
 */

import { randomUUID } from 'node:crypto';
import type { StageDeps, StageRegistry } from '../agents/types.js';
import type { ContextConfig, RelayConfig } from '../config/schema.js';
import type { Summarizer, TextGenerator } from '../core/collaborators.js';
import { EventRelay } from '../core/event-relay.js';
import { PipelineController } from '../core/pipeline-controller.js';
import type { ChatRequest, RelayEvent } from '../core/protocol/types.js';
import { createRequestState } from '../core/request-state.js';
import { formatError, formatErrorForLog } from '../errors/index.js';
import { CancellationToken, isCancellationError } from '../integrations/cancellation.js';
import { ContextPacker } from '../integrations/context/context-packer.js';
import { ChatRepository } from '../integrations/persistence/chat-repository.js';
import type { DocumentStore } from '../integrations/persistence/document-store.js';
import { ConversationMemory } from '../integrations/persistence/memory-store.js';
import { DocumentTools } from '../integrations/tools/document-tools.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import { systemClock, type Clock } from '../integrations/utilities/time.js';
import type { RequestState } from '../types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ChatServiceDeps {
  store: DocumentStore;
  generator: TextGenerator;
  summarizer: Summarizer;
  clock?: Clock;
  logger?: StructuredLogger;
  /** Stage overrides; unset stages use the built-in agents */
  stages?: Partial<StageRegistry>;
}

export interface ChatServiceConfig {
  context: ContextConfig;
  relay: RelayConfig;
  findLimit: number;
}

export interface ChatOptions {
  cancellationToken?: CancellationToken;
  /** Trace id for the request's logs; generated when absent */
  requestId?: string;
}

// =============================================================================
// SERVICE
// =============================================================================

export class ChatService {
  readonly memory: ConversationMemory;
  readonly repository: ChatRepository;
  private readonly packer: ContextPacker;
  private readonly tools: DocumentTools;
  private readonly relay: EventRelay;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly deps: ChatServiceDeps,
    private readonly config: ChatServiceConfig,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createComponentLogger('ChatService');
    this.memory = new ConversationMemory(deps.store);
    this.repository = new ChatRepository(deps.store);
    this.tools = new DocumentTools(deps.store);
    this.packer = new ContextPacker(this.memory, deps.summarizer, config.context);
    this.relay = new EventRelay(new PipelineController({ stages: deps.stages }), {
      tokenDelayMs: config.relay.tokenDelayMs,
    });
  }

  async *chat(request: ChatRequest, options: ChatOptions = {}): AsyncGenerator<RelayEvent, void, undefined> {
    const requestId = options.requestId ?? randomUUID();
    const cancellationToken = options.cancellationToken ?? CancellationToken.None;
    const log = this.logger.withTrace(requestId).withContext({ sessionId: request.sessionId });
    const requestStart = this.clock.now();

    log.info('Chat request received', { userId: request.userId, promptLength: request.prompt.length });

    let initial: RequestState;
    try {
      await this.memory.ensureSession(request.sessionId, request.userId);
      const packed = await this.packer.pack(request.sessionId, request.userId, request.prompt, {
        cancellationToken,
      });
      log.debug('Context packed', {
        tokenEstimate: packed.tokenEstimate,
        recentTurns: packed.recentTurns.length,
        summaryUpdated: packed.summaryUpdated,
      });
      initial = createRequestState({
        sessionId: request.sessionId,
        userId: request.userId,
        userPrompt: request.prompt,
        context: packed.context,
        summary: packed.summary,
        recentTurns: packed.recentTurns,
        requestStart,
      });
    } catch (err) {
      if (isCancellationError(err)) {
        log.info('Request cancelled before the pipeline started', { reason: err.message });
        return;
      }
      log.error('Context packing failed', { error: formatErrorForLog(err) });
      yield { type: 'error', error: formatError(err) };
      return;
    }

    const stageDeps: StageDeps = {
      generator: this.deps.generator,
      query: this.tools,
      clock: this.clock,
      logger: log,
      cancellationToken,
      findLimit: this.config.findLimit,
    };

    yield* this.relay.stream(initial, stageDeps, {
      onCommit: async (state, timings) => {
        const ids = await this.repository.commitInteraction({
          sessionId: state.sessionId,
          userId: state.userId,
          prompt: state.userPrompt,
          answer: state.finalAnswer,
          suggestions: state.suggestions,
          toolCalls: state.toolCalls,
          timings,
          agentTimings: state.timings,
        });
        log.debug('Interaction committed', { ...ids });
      },
    });
  }
}
