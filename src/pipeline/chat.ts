/**
 * Grounded Chat
 *
 * One turn = read history, assemble the prompt, one model call, append the
 * user and assistant turns together. The whole turn holds a lock on its
 * (session, document) pair, so concurrent turns for the same pair line up
 * and their turns never interleave. A failed model call appends nothing.
 */

import type { CachedPaper, ChatTurn } from '../types.js';
import type { TextGenerator } from '../models/gateway.js';
import type { PaperRepository } from '../storage/papers.js';
import { sessionKey } from '../storage/papers.js';
import { fromGatewayFailure } from '../errors.js';
import { KeyedMutex } from '../utils/mutex.js';
import { buildChatPrompt } from './context.js';

export interface ChatOptions {
  maxContextChars?: number;
}

export interface ChatReply {
  answer: string;
  /** The two turns appended by this reply */
  turns: ChatTurn[];
}

export class PaperChat {
  private readonly maxContextChars: number;
  private locks = new KeyedMutex();

  constructor(
    private readonly generator: TextGenerator,
    private readonly repository: PaperRepository,
    options: ChatOptions = {}
  ) {
    this.maxContextChars = options.maxContextChars ?? 60_000;
  }

  async reply(sessionId: string, paper: CachedPaper, message: string): Promise<ChatReply> {
    return this.locks.run(sessionKey(sessionId, paper.url), async () => {
      const history = await this.repository.getHistory(sessionId, paper.url);
      const prompt = buildChatPrompt(paper.text, history, message, this.maxContextChars);

      const result = await this.generator.generate(prompt, { temperature: 0.3 }, 'chat');
      if (!result.ok) {
        throw fromGatewayFailure(result.error);
      }

      const answer = result.text.trim();
      const turns = await this.repository.appendTurns(sessionId, paper.url, [
        { role: 'user', text: message },
        { role: 'assistant', text: answer },
      ]);

      return { answer, turns };
    });
  }
}
