/**
 * Map-Reduce Summarization
 *
 * Map: one tier-independent summary per chunk, fanned out up to a
 * concurrency bound. A chunk whose call fails is replaced by a placeholder
 * so one bad chunk cannot sink the paper.
 * Reduce: a single synthesis call over the partials, in document order,
 * calibrated to the requested complexity tier.
 *
 * Per-chunk summaries never leave this module; only the final text does.
 */

import type { ComplexityTier, SummaryRecord } from '../types.js';
import type { TextGenerator } from '../models/gateway.js';
import { PaperError } from '../errors.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { splitText } from './chunking.js';
import { DEFAULT_SUMMARY_PROMPTS, fillTemplate, type SummaryPrompts } from './prompts.js';

// =============================================================================
// STATE MACHINE
// =============================================================================

export type SummaryPhase = 'PENDING_MAP' | 'MAPPING' | 'PENDING_REDUCE' | 'REDUCING' | 'DONE' | 'FAILED';

const TRANSITIONS: Record<SummaryPhase, readonly SummaryPhase[]> = {
  PENDING_MAP: ['MAPPING', 'FAILED'],
  MAPPING: ['PENDING_REDUCE', 'FAILED'],
  PENDING_REDUCE: ['REDUCING', 'FAILED'],
  REDUCING: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export const PARTIAL_SUMMARY_DEGRADED = 'PARTIAL_SUMMARY_DEGRADED';

class SummaryRun {
  private current: SummaryPhase = 'PENDING_MAP';

  constructor(
    private readonly tier: ComplexityTier,
    private readonly onPhase?: (phase: SummaryPhase, tier: ComplexityTier) => void
  ) {
    this.onPhase?.(this.current, tier);
  }

  get phase(): SummaryPhase {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  advance(next: SummaryPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal summary transition ${this.current} -> ${next}`);
    }
    console.log(`[Summarizer] ${this.tier}: ${this.current} -> ${next}`);
    this.current = next;
    this.onPhase?.(next, this.tier);
  }
}

// =============================================================================
// SUMMARIZER
// =============================================================================

export interface SummarizerOptions {
  maxChunkChars?: number;
  /** Map-phase fan-out */
  concurrency?: number;
  prompts?: SummaryPrompts;
  onPhase?: (phase: SummaryPhase, tier: ComplexityTier) => void;
  now?: () => Date;
}

interface PartialSummary {
  ok: boolean;
  text: string;
}

export class MapReduceSummarizer {
  private readonly maxChunkChars: number;
  private readonly concurrency: number;
  private readonly prompts: SummaryPrompts;
  private readonly onPhase?: (phase: SummaryPhase, tier: ComplexityTier) => void;
  private readonly now: () => Date;

  constructor(
    private readonly generator: TextGenerator,
    options: SummarizerOptions = {}
  ) {
    this.maxChunkChars = options.maxChunkChars ?? 20_000;
    this.concurrency = options.concurrency ?? 4;
    this.prompts = options.prompts ?? DEFAULT_SUMMARY_PROMPTS;
    this.onPhase = options.onPhase;
    this.now = options.now ?? (() => new Date());
  }

  async summarize(text: string, tier: ComplexityTier): Promise<SummaryRecord> {
    const run = new SummaryRun(tier, this.onPhase);

    try {
      const chunks = splitText(text, this.maxChunkChars);
      if (chunks.length === 0) {
        throw new PaperError('EXTRACTION_FAILED', 'The document contains no text to summarize');
      }

      run.advance('MAPPING');
      console.log(`[Summarizer] Mapping ${chunks.length} chunk(s) for ${tier}`);
      const partials = await mapWithConcurrency(chunks, this.concurrency, (chunk, index) =>
        this.mapChunk(chunk, index, chunks.length)
      );

      const failedChunks = partials.filter((partial) => !partial.ok).length;
      if (failedChunks === chunks.length) {
        throw new PaperError('MODEL_UNAVAILABLE', 'The language model could not summarize any part of the paper');
      }
      if (failedChunks > 0) {
        console.warn(`[Summarizer] ${PARTIAL_SUMMARY_DEGRADED}: ${failedChunks}/${chunks.length} chunk(s) failed`);
      }

      run.advance('PENDING_REDUCE');
      const prompt = this.buildReducePrompt(partials, tier);

      run.advance('REDUCING');
      const result = await this.generator.generate(prompt, { temperature: 0.3 }, `reduce ${tier}`);
      if (!result.ok) {
        throw new PaperError('UPSTREAM_ERROR', 'The language model failed to produce the final summary');
      }

      run.advance('DONE');
      return {
        text: result.text,
        tier,
        chunkCount: chunks.length,
        failedChunks,
        degraded: failedChunks > 0,
        generatedAt: this.now().toISOString(),
      };
    } catch (error) {
      if (!run.isTerminal) run.advance('FAILED');
      throw error;
    }
  }

  private async mapChunk(chunk: string, index: number, total: number): Promise<PartialSummary> {
    const prompt = fillTemplate(this.prompts.map, { chunk, index: index + 1, total });

    try {
      const result = await this.generator.generate(prompt, { temperature: 0.2 }, `map ${index + 1}/${total}`);
      if (result.ok) return { ok: true, text: result.text.trim() };
      console.warn(`[Summarizer] Chunk ${index + 1}/${total} failed: ${result.error.kind}`);
    } catch (error) {
      console.warn(`[Summarizer] Chunk ${index + 1}/${total} threw: ${error instanceof Error ? error.message : String(error)}`);
    }

    return { ok: false, text: `[Part ${index + 1} of ${total} could not be summarized]` };
  }

  private buildReducePrompt(partials: PartialSummary[], tier: ComplexityTier): string {
    const total = partials.length;
    const joined = partials.map((partial, i) => `[Part ${i + 1}/${total}]\n${partial.text}`).join('\n\n');

    return fillTemplate(this.prompts.reduce, {
      tier,
      guidance: this.prompts.tiers[tier],
      partials: joined,
    });
  }
}
