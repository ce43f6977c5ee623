import { describe, expect, it } from 'vitest';
import { labelRest, parseComposition, parseListItem, parsePlan } from '../../src/agents/parsing.js';
import { heuristicPlan, needsData, needsHistory, relevanceScore } from '../../src/agents/heuristics.js';

describe('parseListItem', () => {
  it('should strip numbered and bulleted markers', () => {
    expect(parseListItem('1. Retrieve the messages')).toBe('Retrieve the messages');
    expect(parseListItem('3) Third item here')).toBe('Third item here');
    expect(parseListItem('10. Tenth subtask')).toBe('Tenth subtask');
    expect(parseListItem('-   dashed item')).toBe('dashed item');
    expect(parseListItem('• bullet item')).toBe('bullet item');
    expect(parseListItem('* starred item')).toBe('starred item');
  });

  it('should reject unmarked lines and short items', () => {
    expect(parseListItem('Plain line of text')).toBeNull();
    expect(parseListItem('- ok')).toBeNull();
    expect(parseListItem('1. Hello')).toBeNull();
    expect(parseListItem('1. Hello!')).toBe('Hello!');
  });
});

describe('labelRest', () => {
  it('should match labels case-insensitively', () => {
    expect(labelRest('answer: hi there', ['ANSWER:'])).toBe('hi there');
    expect(labelRest('DATA PLAN:', ['DATA_PLAN:', 'DATA PLAN:'])).toBe('');
    expect(labelRest('Something else', ['ANSWER:'])).toBeNull();
  });
});

describe('parsePlan', () => {
  it('should read subtasks and a multi-line data plan', () => {
    const response = [
      'SUBTASKS:',
      '1. Retrieve the previous messages',
      '2. Summarize them',
      '- ok',
      '',
      'DATA_PLAN: Query messages collection',
      'for this session',
    ].join('\n');

    expect(parsePlan(response)).toEqual({
      subtasks: ['Retrieve the previous messages', 'Summarize them'],
      dataAccessPlan: 'Query messages collection for this session',
    });
  });

  it('should ignore text before the first section', () => {
    expect(parsePlan('Sure, here is a plan.\n1. Not in a section\nDATA PLAN:\nNo database access needed')).toEqual({
      subtasks: [],
      dataAccessPlan: 'No database access needed',
    });
  });
});

describe('parseComposition', () => {
  it('should read the answer and suggestions', () => {
    const response = [
      'ANSWER: Your name is Ada.',
      'You told me earlier.',
      '',
      'SUGGESTIONS:',
      '1. Ask about tea',
      '2. Share a hobby',
    ].join('\n');

    expect(parseComposition(response)).toEqual({
      answer: 'Your name is Ada. You told me earlier.',
      suggestions: ['Ask about tea', 'Share a hobby'],
    });
  });

  it('should return an empty answer without the label', () => {
    expect(parseComposition('Just some prose without sections')).toEqual({ answer: '', suggestions: [] });
  });
});

describe('heuristics', () => {
  it('should detect prompts that refer to history', () => {
    expect(needsHistory('What is my name?')).toBe(true);
    expect(needsHistory('What did we talk about BEFORE?')).toBe(true);
    expect(needsHistory('Hello there')).toBe(false);
  });

  it('should detect subtasks that need data', () => {
    expect(needsData('Retrieve conversation history to understand context')).toBe(true);
    expect(needsData('Prepare comprehensive response')).toBe(false);
  });

  it('should score relevance over the first five prompt words', () => {
    expect(relevanceScore('What is my name today please', 'Your name is Ada')).toBe(2);
    expect(relevanceScore('name name name', 'name')).toBe(1);
    expect(relevanceScore('zebra', 'Completed: something')).toBe(0);
  });

  it('should build a history plan for history prompts', () => {
    expect(heuristicPlan('What did we discuss before?')).toEqual({
      subtasks: [
        'Retrieve conversation history to understand context',
        "Analyze user's request: What did we discuss before?",
        'Formulate contextual response based on history',
      ],
      dataAccessPlan: 'Query messages collection for session history',
    });
  });

  it('should build a generic plan otherwise', () => {
    expect(heuristicPlan('Hello there')).toEqual({
      subtasks: ['Understand the request: Hello there', 'Gather relevant information', 'Prepare comprehensive response'],
      dataAccessPlan: 'No database access needed for this request',
    });
  });
});
