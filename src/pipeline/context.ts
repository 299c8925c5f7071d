/**
 * Chat Context Assembly
 *
 * Builds the single prompt a chat turn sends to the model: grounding
 * instructions, a clipped excerpt of the paper, the whole conversation so
 * far, and the new message.
 *
 * Clipping always keeps the first `maxContextChars` characters of the paper,
 * where the abstract and introduction sit.
 */

import type { ChatTurn } from '../types.js';
import { CHAT_INSTRUCTIONS } from './prompts.js';

export const TRUNCATION_MARKER = '[excerpt truncated]';

const ROLE_LABELS: Record<ChatTurn['role'], string> = {
  user: 'User',
  assistant: 'Assistant',
};

export function clipDocument(documentText: string, maxContextChars: number): { excerpt: string; clipped: boolean } {
  if (documentText.length <= maxContextChars) {
    return { excerpt: documentText, clipped: false };
  }
  return { excerpt: documentText.slice(0, Math.max(0, maxContextChars)), clipped: true };
}

export function buildChatPrompt(
  documentText: string,
  history: readonly Pick<ChatTurn, 'role' | 'text'>[],
  newMessage: string,
  maxContextChars: number
): string {
  const { excerpt, clipped } = clipDocument(documentText, maxContextChars);

  const sections = [
    CHAT_INSTRUCTIONS,
    '',
    'CONTEXT (paper excerpt):',
    excerpt,
    ...(clipped ? [TRUNCATION_MARKER] : []),
    '',
    'CONVERSATION:',
    ...history.map((turn) => `${ROLE_LABELS[turn.role]}: ${turn.text}`),
    `${ROLE_LABELS.user}: ${newMessage}`,
    `${ROLE_LABELS.assistant}:`,
  ];

  return sections.join('\n');
}
