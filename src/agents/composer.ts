/**
 * Composer: produces the final answer and exactly three follow-up
 * suggestions, with layered fallbacks when the model output is unusable.
 */

import { formatErrorForLog, isCancellationError } from '../errors/index.js';
import { completeStage } from '../core/request-state.js';
import { race } from '../integrations/cancellation.js';
import type { Finding, RequestState } from '../types.js';
import { parseComposition } from './parsing.js';
import { COMPOSER_GENERATION, SUGGESTION_COUNT, type StageDeps } from './types.js';

export const DEFAULT_SUGGESTIONS: readonly string[] = [
  'Can you tell me more about this?',
  'What else would you like to know?',
  'Should we explore this topic further?',
];

export const ERROR_SUGGESTIONS: readonly string[] = [
  'Tell me more about what you need',
  'Can you clarify your question?',
  'What would you like to know next?',
];

export function buildCompositionPrompt(state: RequestState): string {
  const findingsText =
    state.findings.length > 0
      ? state.findings.map((f) => `- ${f.result}`).join('\n')
      : 'No specific findings';

  return `You are a helpful AI assistant. Generate a natural, conversational response.

CONVERSATION CONTEXT:
${state.context}

ANALYSIS RESULTS:
${findingsText}

QUALITY CHECK: ${state.validationFeedback}

Task: Provide a helpful, natural response to the user's request. If the conversation history contains relevant information (like the user's name, preferences, or previous topics), reference it appropriately.

Generate your response in this format:
ANSWER:
[Your natural, conversational response here]

SUGGESTIONS:
1. [Relevant follow-up question or action]
2. [Another relevant suggestion]
3. [Third suggestion]
`;
}

/**
 * Pad by position from the defaults, then cut to three.
 */
export function normalizeSuggestions(suggestions: readonly string[]): string[] {
  const out = [...suggestions];
  while (out.length < SUGGESTION_COUNT) {
    out.push(DEFAULT_SUGGESTIONS[out.length]);
  }
  return out.slice(0, SUGGESTION_COUNT);
}

export function fallbackAnswer(response: string, prompt: string, findings: readonly Finding[]): string {
  if (response.length > 20 && !response.startsWith('ANSWER:')) {
    return response.trim();
  }
  const lead = `I understand you're asking about: ${prompt}. `;
  return findings.length > 0
    ? `${lead}Based on my analysis: ${findings[0].result}`
    : `${lead}Let me help you with that.`;
}

export function errorAnswer(prompt: string, findings: readonly Finding[]): string {
  const analysis = findings.length > 0 ? `Analysis shows: ${findings[0].result}. ` : '';
  return `I received your message: '${prompt}'. ${analysis}How can I help you further?`;
}

export async function runComposer(state: RequestState, deps: StageDeps): Promise<RequestState> {
  const startedAt = deps.clock.now();
  const log = deps.logger.withContext({ stage: 'composer' });

  let finalAnswer: string;
  let suggestions: string[];

  try {
    const response = await race(
      deps.generator.generate(buildCompositionPrompt(state), {
        ...COMPOSER_GENERATION,
        cancellationToken: deps.cancellationToken,
      }),
      deps.cancellationToken,
    );
    const parsed = parseComposition(response);
    finalAnswer = parsed.answer;
    if (!finalAnswer) {
      log.warn('No answer section in composer output, using fallback');
      finalAnswer = fallbackAnswer(response, state.userPrompt, state.findings);
    }
    suggestions = normalizeSuggestions(parsed.suggestions);
  } catch (err) {
    if (isCancellationError(err)) throw err;
    log.error('Composer generation failed', { error: formatErrorForLog(err) });
    finalAnswer = errorAnswer(state.userPrompt, state.findings);
    suggestions = [...ERROR_SUGGESTIONS];
  }

  const completedAt = deps.clock.now();
  return completeStage(state, 'composer', completedAt - startedAt, {
    finalAnswer,
    suggestions,
    completedAt,
  });
}
