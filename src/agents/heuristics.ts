/**
 * Keyword heuristics. Deliberately literal: plain lower-cased substring
 * checks, no stemming or word boundaries.
 */

export const HISTORY_KEYWORDS: readonly string[] = [
  'my',
  'our',
  'previous',
  'earlier',
  'last',
  'before',
  'conversation',
  'discussed',
  'mentioned',
  'said',
];

export const DATA_KEYWORDS: readonly string[] = [
  'query',
  'fetch',
  'retrieve',
  'history',
  'data',
  'conversation',
  'previous',
  'earlier',
  'past',
  'messages',
];

/** Number of leading prompt words the relevance check looks for */
export const RELEVANCE_WORD_COUNT = 5;

function containsAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

/** Does the prompt refer back to earlier conversation? */
export function needsHistory(prompt: string): boolean {
  return containsAny(prompt, HISTORY_KEYWORDS);
}

/** Does the subtask need a document query? */
export function needsData(subtask: string): boolean {
  return containsAny(subtask, DATA_KEYWORDS);
}

/**
 * Relevance: how many of the prompt's first five words (as a set) occur as
 * substrings of the findings text.
 */
export function relevanceScore(prompt: string, findingsText: string): number {
  const words = new Set(
    prompt
      .toLowerCase()
      .split(/\s+/)
      .filter((w) => w.length > 0)
      .slice(0, RELEVANCE_WORD_COUNT),
  );
  const haystack = findingsText.toLowerCase();
  let score = 0;
  for (const word of words) {
    if (haystack.includes(word)) score++;
  }
  return score;
}

export interface HeuristicPlan {
  subtasks: string[];
  dataAccessPlan: string;
}

/**
 * Plan used when generation fails or yields no subtasks.
 */
export function heuristicPlan(prompt: string): HeuristicPlan {
  const head = prompt.slice(0, 50);
  if (needsHistory(prompt)) {
    return {
      subtasks: [
        'Retrieve conversation history to understand context',
        `Analyze user's request: ${head}`,
        'Formulate contextual response based on history',
      ],
      dataAccessPlan: 'Query messages collection for session history',
    };
  }
  return {
    subtasks: [
      `Understand the request: ${head}`,
      'Gather relevant information',
      'Prepare comprehensive response',
    ],
    dataAccessPlan: 'No database access needed for this request',
  };
}
