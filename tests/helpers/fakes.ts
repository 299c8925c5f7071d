/**
 * In-process stand-ins for the model gateway and the extractor.
 */

import type { GatewayFailure, GatewayResult, GenerationOptions, TextGenerator } from '../../src/models/gateway.js';
import type { Extractor } from '../../src/extraction/extractor.js';
import type { ExtractedDocument } from '../../src/types.js';

export interface RecordedCall {
  prompt: string;
  options?: GenerationOptions;
  purpose?: string;
}

export type Responder = (prompt: string, purpose: string) => GatewayResult | string | Promise<GatewayResult | string>;

export function failure(kind: GatewayFailure['kind'], message = 'test failure'): GatewayResult {
  return { ok: false, error: { kind, message, attempts: 1 } };
}

/**
 * Answers with whatever the responder returns; plain strings become successes.
 */
export class FakeGenerator implements TextGenerator {
  calls: RecordedCall[] = [];

  constructor(private responder: Responder = (_prompt, purpose) => `output for ${purpose}`) {}

  async generate(prompt: string, options?: GenerationOptions, purpose?: string): Promise<GatewayResult> {
    this.calls.push({ prompt, options, purpose });
    const answer = await this.responder(prompt, purpose ?? '');
    return typeof answer === 'string' ? { ok: true, text: answer, attempts: 1 } : answer;
  }

  purposes(): string[] {
    return this.calls.map((call) => call.purpose ?? '');
  }
}

export class FakeExtractor implements Extractor {
  urls: string[] = [];

  constructor(private produce: (url: string) => ExtractedDocument | Promise<ExtractedDocument>) {}

  async extract(url: string): Promise<ExtractedDocument> {
    this.urls.push(url);
    return this.produce(url);
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
