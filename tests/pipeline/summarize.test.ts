/**
 * Map-Reduce Summarizer Tests
 */

import { describe, it, expect } from 'vitest';
import { MapReduceSummarizer, type SummaryPhase } from '../../src/pipeline/summarize.js';
import { DEFAULT_SUMMARY_PROMPTS } from '../../src/pipeline/prompts.js';
import { PaperError } from '../../src/errors.js';
import { FakeGenerator, delay, failure } from '../helpers/fakes.js';

// Three paragraphs that never fit two to a 20-character chunk
const PAPER = 'Alpha beta gamma.\n\nDelta epsilon zeta.\n\nEta theta iota.';
const FIXED_NOW = new Date('2026-01-15T10:00:00.000Z');

function createSummarizer(generator: FakeGenerator, phases?: SummaryPhase[]) {
  return new MapReduceSummarizer(generator, {
    maxChunkChars: 20,
    concurrency: 2,
    now: () => FIXED_NOW,
    onPhase: phases ? (phase) => phases.push(phase) : undefined,
  });
}

describe('MapReduceSummarizer', () => {
  describe('summarize', () => {
    it('should map every chunk and reduce once', async () => {
      const generator = new FakeGenerator();
      const summarizer = createSummarizer(generator);

      const summary = await summarizer.summarize(PAPER, 'LOW');

      expect(summary).toEqual({
        text: 'output for reduce LOW',
        tier: 'LOW',
        chunkCount: 3,
        failedChunks: 0,
        degraded: false,
        generatedAt: '2026-01-15T10:00:00.000Z',
      });
      expect(generator.purposes().sort()).toEqual(['map 1/3', 'map 2/3', 'map 3/3', 'reduce LOW']);
    });

    it('should put each chunk into its own map prompt', async () => {
      const generator = new FakeGenerator();
      await createSummarizer(generator).summarize(PAPER, 'LOW');

      const mapPrompt = generator.calls.find((call) => call.purpose === 'map 2/3')?.prompt ?? '';
      expect(mapPrompt).toContain('CHUNK (2 of 3)');
      expect(mapPrompt.endsWith('CHUNK:\nDelta epsilon zeta.')).toBe(true);
    });

    it('should feed partials to the reduce prompt in document order', async () => {
      // Earlier chunks finish last
      const generator = new FakeGenerator(async (_prompt, purpose) => {
        if (purpose === 'map 1/3') await delay(30);
        if (purpose === 'map 2/3') await delay(15);
        return `partial ${purpose}`;
      });

      await createSummarizer(generator).summarize(PAPER, 'LOW');

      const reducePrompt = generator.calls.find((call) => call.purpose === 'reduce LOW')?.prompt ?? '';
      expect(reducePrompt).toContain(
        '[Part 1/3]\npartial map 1/3\n\n[Part 2/3]\npartial map 2/3\n\n[Part 3/3]\npartial map 3/3'
      );
      expect(reducePrompt).toContain('Target complexity: LOW');
      expect(reducePrompt).toContain(DEFAULT_SUMMARY_PROMPTS.tiers.LOW);
    });

    it('should keep at most `concurrency` map calls in flight', async () => {
      let inFlight = 0;
      let peak = 0;
      const generator = new FakeGenerator(async (_prompt, purpose) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight -= 1;
        return `partial ${purpose}`;
      });

      await createSummarizer(generator).summarize(PAPER, 'MEDIUM');

      expect(peak).toBe(2);
    });

    it('should use tier-specific guidance only in the reduce step', async () => {
      const generator = new FakeGenerator();
      const summarizer = createSummarizer(generator);

      await summarizer.summarize(PAPER, 'LOW');
      await summarizer.summarize(PAPER, 'HIGH');

      const low = generator.calls.filter((call) => call.purpose?.startsWith('map')).slice(0, 3);
      const high = generator.calls.filter((call) => call.purpose?.startsWith('map')).slice(3);
      expect(high.map((call) => call.prompt).sort()).toEqual(low.map((call) => call.prompt).sort());

      const reduceHigh = generator.calls.find((call) => call.purpose === 'reduce HIGH')?.prompt ?? '';
      expect(reduceHigh).toContain(DEFAULT_SUMMARY_PROMPTS.tiers.HIGH);
      expect(reduceHigh).not.toContain(DEFAULT_SUMMARY_PROMPTS.tiers.LOW);
    });

    it('should report every phase in order', async () => {
      const phases: SummaryPhase[] = [];
      await createSummarizer(new FakeGenerator(), phases).summarize(PAPER, 'LOW');

      expect(phases).toEqual(['PENDING_MAP', 'MAPPING', 'PENDING_REDUCE', 'REDUCING', 'DONE']);
    });
  });

  describe('failures', () => {
    it('should replace a failed chunk with a placeholder and flag the result', async () => {
      const generator = new FakeGenerator((_prompt, purpose) =>
        purpose === 'map 2/3' ? failure('TIMEOUT') : `partial ${purpose}`
      );

      const summary = await createSummarizer(generator).summarize(PAPER, 'LOW');

      expect(summary.degraded).toBe(true);
      expect(summary.failedChunks).toBe(1);
      const reducePrompt = generator.calls.find((call) => call.purpose === 'reduce LOW')?.prompt ?? '';
      expect(reducePrompt).toContain('[Part 2/3]\n[Part 2 of 3 could not be summarized]');
    });

    it('should treat a thrown generator error like a failed chunk', async () => {
      const generator = new FakeGenerator((_prompt, purpose) => {
        if (purpose === 'map 3/3') throw new Error('socket hang up');
        return `partial ${purpose}`;
      });

      const summary = await createSummarizer(generator).summarize(PAPER, 'LOW');

      expect(summary.failedChunks).toBe(1);
      expect(summary.text).toBe('partial reduce LOW');
    });

    it('should fail with MODEL_UNAVAILABLE when every chunk fails', async () => {
      const phases: SummaryPhase[] = [];
      const generator = new FakeGenerator(() => failure('RATE_LIMITED'));

      const attempt = createSummarizer(generator, phases).summarize(PAPER, 'LOW');

      await expect(attempt).rejects.toBeInstanceOf(PaperError);
      await expect(attempt).rejects.toMatchObject({ code: 'MODEL_UNAVAILABLE' });
      expect(generator.purposes()).not.toContain('reduce LOW');
      expect(phases).toEqual(['PENDING_MAP', 'MAPPING', 'FAILED']);
    });

    it('should fail with EXTRACTION_FAILED on an empty document without calling the model', async () => {
      const phases: SummaryPhase[] = [];
      const generator = new FakeGenerator();

      await expect(createSummarizer(generator, phases).summarize('  \n ', 'LOW')).rejects.toMatchObject({
        code: 'EXTRACTION_FAILED',
      });
      expect(generator.calls).toHaveLength(0);
      expect(phases).toEqual(['PENDING_MAP', 'FAILED']);
    });

    it('should fail with UPSTREAM_ERROR when the reduce call fails', async () => {
      const phases: SummaryPhase[] = [];
      const generator = new FakeGenerator((_prompt, purpose) =>
        purpose.startsWith('reduce') ? failure('RATE_LIMITED') : `partial ${purpose}`
      );

      await expect(createSummarizer(generator, phases).summarize(PAPER, 'HIGH')).rejects.toMatchObject({
        code: 'UPSTREAM_ERROR',
      });
      expect(phases[phases.length - 1]).toBe('FAILED');
    });
  });
});
