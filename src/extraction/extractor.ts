/**
 * Paper Extraction
 *
 * Resolves a paper URL to its canonical form and pulls plain text out of the
 * PDF or HTML behind it. arXiv abstract pages are redirected to their PDF.
 */

import type { ExtractedDocument } from '../types.js';
import { ExtractionError, PaperError } from '../errors.js';
import { htmlToText } from './html.js';
import { extractPdfText, isPdfBytes } from './pdf.js';

export interface Extractor {
  extract(url: string): Promise<ExtractedDocument>;
}

const ARXIV_URL = /^https?:\/\/(?:www\.)?arxiv\.org\/(?:abs|pdf)\/([\w.\-/]+?)(?:\.pdf)?\/?(?:[?#].*)?$/i;

/**
 * Canonical document identity used as the cache key.
 */
export function canonicalizeUrl(input: string): string {
  const trimmed = input.trim();

  const arxiv = ARXIV_URL.exec(trimmed);
  if (arxiv) {
    return `https://arxiv.org/pdf/${arxiv[1]}.pdf`;
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new PaperError('INVALID_REQUEST', 'Please enter a valid http(s) URL');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new PaperError('INVALID_REQUEST', 'Please enter a valid http(s) URL');
  }

  parsed.hash = '';
  return parsed.toString();
}

export interface HttpExtractorOptions {
  timeoutMs?: number;
  /** Fewer non-blank characters than this counts as an empty document */
  minTextChars?: number;
  userAgent?: string;
  fetch?: typeof fetch;
  parsePdf?: (data: Uint8Array) => Promise<string>;
}

export class HttpExtractor implements Extractor {
  private readonly timeoutMs: number;
  private readonly minTextChars: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly parsePdf: (data: Uint8Array) => Promise<string>;

  constructor(options: HttpExtractorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 45_000;
    this.minTextChars = options.minTextChars ?? 200;
    this.userAgent = options.userAgent ?? 'Mozilla/5.0 (PaperDigestBot)';
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.parsePdf = options.parsePdf ?? extractPdfText;
  }

  async extract(url: string): Promise<ExtractedDocument> {
    const target = canonicalizeUrl(url);
    const response = await this.download(target);

    const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
    const looksLikePdf = contentType.includes('pdf') || new URL(target).pathname.toLowerCase().endsWith('.pdf');

    let document: ExtractedDocument;
    if (looksLikePdf) {
      const bytes = new Uint8Array(await response.arrayBuffer());
      if (!isPdfBytes(bytes)) {
        throw new ExtractionError('UNSUPPORTED_FORMAT', `${target} did not return a PDF`);
      }
      document = { text: await this.readPdf(target, bytes), sourceKind: 'pdf' };
    } else if (contentType === '' || contentType.startsWith('text/') || contentType.includes('html')) {
      document = { text: htmlToText(await response.text()), sourceKind: 'html' };
    } else {
      throw new ExtractionError('UNSUPPORTED_FORMAT', `Unsupported content type "${contentType}" at ${target}`);
    }

    const length = document.text.replace(/\s+/g, '').length;
    if (length < this.minTextChars) {
      throw new ExtractionError('EMPTY_DOCUMENT', `Only ${length} characters of text found at ${target}`);
    }

    console.log(`[Extractor] ${document.sourceKind.toUpperCase()} ${target}: ${document.text.length} chars`);
    return document;
  }

  private async download(target: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(target, {
        headers: { 'User-Agent': this.userAgent },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionError('UNREACHABLE', `Could not fetch ${target}: ${message}`);
    }

    if (!response.ok) {
      throw new ExtractionError('UNREACHABLE', `${target} returned HTTP ${response.status}`);
    }
    return response;
  }

  private async readPdf(target: string, bytes: Uint8Array): Promise<string> {
    try {
      return await this.parsePdf(bytes);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionError('UNSUPPORTED_FORMAT', `Could not read PDF at ${target}: ${message}`);
    }
  }
}
