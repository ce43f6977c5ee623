/**
 * Parsers for the sectioned text the Planner and Composer ask the model for:
 *
 *   SUBTASKS:            ANSWER: ...
 *   1. ...               SUGGESTIONS:
 *   DATA_PLAN: ...       - ...
 */

/** Items this short or shorter are dropped */
export const MIN_ITEM_LENGTH = 5;

const LIST_MARKER = /^[\d\-•*]/;
const LIST_PREFIX = /^(?:\d+[.)]?|[-•*])\s*/;

/**
 * If the line starts with one of the labels (case-insensitive), the text
 * after it, trimmed; otherwise null.
 */
export function labelRest(line: string, labels: readonly string[]): string | null {
  const upper = line.toUpperCase();
  for (const label of labels) {
    if (upper.startsWith(label)) {
      return line.slice(label.length).trim();
    }
  }
  return null;
}

/**
 * A numbered or bulleted line with its marker stripped, or null when the
 * line is not a list item or the item is too short.
 */
export function parseListItem(line: string): string | null {
  const trimmed = line.trim();
  if (!LIST_MARKER.test(trimmed)) return null;
  const item = trimmed.replace(LIST_PREFIX, '').trim();
  return item.length > MIN_ITEM_LENGTH ? item : null;
}

export interface ParsedPlan {
  subtasks: string[];
  dataAccessPlan: string;
}

export function parsePlan(response: string): ParsedPlan {
  const subtasks: string[] = [];
  const planParts: string[] = [];
  let section: 'none' | 'subtasks' | 'plan' = 'none';

  for (const raw of response.trim().split('\n')) {
    const line = raw.trim();

    if (labelRest(line, ['SUBTASKS:']) !== null) {
      section = 'subtasks';
      continue;
    }
    const planRest = labelRest(line, ['DATA_PLAN:', 'DATA PLAN:']);
    if (planRest !== null) {
      section = 'plan';
      if (planRest) planParts.push(planRest);
      continue;
    }
    if (!line) continue;

    if (section === 'subtasks') {
      const item = parseListItem(line);
      if (item) subtasks.push(item);
    } else if (section === 'plan') {
      planParts.push(line);
    }
  }

  return { subtasks, dataAccessPlan: planParts.join(' ').trim() };
}

export interface ParsedComposition {
  answer: string;
  suggestions: string[];
}

export function parseComposition(response: string): ParsedComposition {
  const answerLines: string[] = [];
  const suggestions: string[] = [];
  let section: 'none' | 'answer' | 'suggestions' = 'none';

  for (const raw of response.trim().split('\n')) {
    const line = raw.trim();

    const answerRest = labelRest(line, ['ANSWER:']);
    if (answerRest !== null) {
      section = 'answer';
      if (answerRest) answerLines.push(answerRest);
      continue;
    }
    if (labelRest(line, ['SUGGESTIONS:']) !== null) {
      section = 'suggestions';
      continue;
    }
    if (!line) continue;

    if (section === 'answer') {
      answerLines.push(line);
    } else if (section === 'suggestions') {
      const item = parseListItem(line);
      if (item) suggestions.push(item);
    }
  }

  return { answer: answerLines.join(' ').trim(), suggestions };
}
