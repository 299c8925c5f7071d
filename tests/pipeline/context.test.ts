/**
 * Chat Context Assembly Tests
 */

import { describe, it, expect } from 'vitest';
import { buildChatPrompt, clipDocument, TRUNCATION_MARKER } from '../../src/pipeline/context.js';
import { CHAT_INSTRUCTIONS } from '../../src/pipeline/prompts.js';
import type { ChatTurn } from '../../src/types.js';

describe('clipDocument', () => {
  it('should leave text within the bound untouched', () => {
    expect(clipDocument('abcd', 4)).toEqual({ excerpt: 'abcd', clipped: false });
  });

  it('should keep the head of longer text', () => {
    expect(clipDocument('abcdefghij', 4)).toEqual({ excerpt: 'abcd', clipped: true });
  });
});

describe('buildChatPrompt', () => {
  const history: ChatTurn[] = [
    { role: 'user', text: 'What is the main result?', index: 0, createdAt: '2026-01-15T10:00:00.000Z' },
    { role: 'assistant', text: '<p>A faster solver.</p>', index: 1, createdAt: '2026-01-15T10:00:00.000Z' },
  ];

  it('should lay out instructions, context, history and the new message', () => {
    const prompt = buildChatPrompt('Paper text.', history, 'How much faster?', 100);

    expect(prompt).toBe(
      [
        CHAT_INSTRUCTIONS,
        '',
        'CONTEXT (paper excerpt):',
        'Paper text.',
        '',
        'CONVERSATION:',
        'User: What is the main result?',
        'Assistant: <p>A faster solver.</p>',
        'User: How much faster?',
        'Assistant:',
      ].join('\n')
    );
  });

  it('should mark a clipped excerpt', () => {
    const prompt = buildChatPrompt('abcdefghij', [], 'Hi', 4);

    expect(prompt).toContain(`CONTEXT (paper excerpt):\nabcd\n${TRUNCATION_MARKER}\n\nCONVERSATION:`);
    expect(prompt).not.toContain('abcde');
  });

  it('should end with the new message when there is no history', () => {
    const prompt = buildChatPrompt('Paper text.', [], 'Hi', 100);

    expect(prompt.endsWith('CONVERSATION:\nUser: Hi\nAssistant:')).toBe(true);
    expect(prompt).not.toContain(TRUNCATION_MARKER);
  });

  it('should include every prior turn oldest first', () => {
    const turns: ChatTurn[] = Array.from({ length: 6 }, (_, i): ChatTurn => ({
      role: i % 2 === 0 ? 'user' : 'assistant',
      text: `turn ${i}`,
      index: i,
      createdAt: '2026-01-15T10:00:00.000Z',
    }));

    const prompt = buildChatPrompt('Paper text.', turns, 'next', 100);

    expect(prompt).toContain(
      'User: turn 0\nAssistant: turn 1\nUser: turn 2\nAssistant: turn 3\nUser: turn 4\nAssistant: turn 5\nUser: next'
    );
  });
});
