/**
 * Paper Service
 *
 * Request-level orchestration:
 *   summarize: cache lookup (text) -> [miss: extract] -> map-reduce -> cache store
 *   chat:      cache lookup (text + history) -> grounded chat turn
 *
 * A cache miss is always a correct path. Extraction per document and
 * summarization per (document, tier) each run once even when requests race:
 * both sit behind a per-key lock with a second cache check inside it.
 */

import type { CachedPaper, ComplexityTier, ExtractedDocument, SummaryRecord } from '../types.js';
import { ExtractionError, PaperError, fromExtractionError } from '../errors.js';
import type { Extractor } from '../extraction/extractor.js';
import { canonicalizeUrl } from '../extraction/extractor.js';
import type { PaperRepository } from '../storage/papers.js';
import { KeyedMutex } from '../utils/mutex.js';
import type { MapReduceSummarizer } from './summarize.js';
import type { PaperChat } from './chat.js';

export interface SummaryOutcome {
  url: string;
  summary: SummaryRecord;
  /** Served from the cache without a model call */
  cached: boolean;
}

export interface ChatOutcome {
  answer: string;
  historyLength: number;
}

export interface PaperServiceDeps {
  repository: PaperRepository;
  extractor: Extractor;
  summarizer: MapReduceSummarizer;
  chat: PaperChat;
  now?: () => Date;
}

export class PaperService {
  private readonly repository: PaperRepository;
  private readonly extractor: Extractor;
  private readonly summarizer: MapReduceSummarizer;
  private readonly chat: PaperChat;
  private readonly now: () => Date;
  private locks = new KeyedMutex();

  constructor(deps: PaperServiceDeps) {
    this.repository = deps.repository;
    this.extractor = deps.extractor;
    this.summarizer = deps.summarizer;
    this.chat = deps.chat;
    this.now = deps.now ?? (() => new Date());
  }

  async summarize(paperUrl: string, tier: ComplexityTier): Promise<SummaryOutcome> {
    const url = canonicalizeUrl(paperUrl);
    const paper = await this.loadPaper(url);

    const existing = paper.summaries[tier];
    if (existing) {
      console.log(`[PaperService] Cache hit for ${url} (${tier})`);
      return { url, summary: existing, cached: true };
    }

    return this.locks.run(`summary:${tier}:${url}`, async () => {
      const latest = await this.repository.getPaper(url);
      const raced = latest?.summaries[tier];
      if (raced) {
        return { url, summary: raced, cached: true };
      }

      const summary = await this.summarizer.summarize(paper.text, tier);
      await this.repository.saveSummary(latest ?? paper, summary);
      console.log(
        `[PaperService] Summarized ${url} (${tier}): ${summary.chunkCount} chunk(s)` +
          (summary.degraded ? `, ${summary.failedChunks} failed` : '')
      );
      return { url, summary, cached: false };
    });
  }

  async ask(paperUrl: string, sessionId: string, message: string): Promise<ChatOutcome> {
    const url = canonicalizeUrl(paperUrl);
    const paper = await this.repository.getPaper(url);
    if (!paper) {
      throw new PaperError('NO_DOCUMENT_FOR_SESSION', 'Please summarize the paper first');
    }

    const reply = await this.chat.reply(sessionId, paper, message);
    const last = reply.turns[reply.turns.length - 1];
    return { answer: reply.answer, historyLength: last ? last.index + 1 : 0 };
  }

  private async loadPaper(url: string): Promise<CachedPaper> {
    const cached = await this.repository.getPaper(url);
    if (cached) return cached;

    return this.locks.run(`extract:${url}`, async () => {
      const raced = await this.repository.getPaper(url);
      if (raced) return raced;

      let extracted: ExtractedDocument;
      try {
        extracted = await this.extractor.extract(url);
      } catch (error) {
        if (error instanceof ExtractionError) {
          console.warn(`[PaperService] Extraction failed for ${url}: ${error.reason} ${error.message}`);
          throw fromExtractionError(error);
        }
        throw error;
      }

      if (!extracted.text.trim()) {
        throw new PaperError('EXTRACTION_FAILED', 'No text could be extracted from the provided URL');
      }

      const paper: CachedPaper = {
        url,
        text: extracted.text,
        sourceKind: extracted.sourceKind,
        extractedAt: this.now().toISOString(),
        summaries: {},
      };
      await this.repository.savePaper(paper);
      return paper;
    });
  }
}
