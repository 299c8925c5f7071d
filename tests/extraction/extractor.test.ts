/**
 * Extraction Tests
 *
 * URL canonicalization, HTML cleanup and the HTTP extractor with an
 * injected fetch and PDF parser.
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpExtractor, canonicalizeUrl } from '../../src/extraction/extractor.js';
import { decodeEntities, htmlToText } from '../../src/extraction/html.js';
import { isPdfBytes } from '../../src/extraction/pdf.js';
import { ExtractionError } from '../../src/errors.js';

const ARTICLE_HTML =
  '<html><head><title>T</title></head><body><nav>Menu</nav><article>' +
  '<h1>Title</h1><p>First &amp; foremost.</p><p>Second<br>line</p>' +
  '</article></body></html>';

function respondWith(body: string, contentType: string, status = 200) {
  return vi.fn(async (_input: unknown, _init?: unknown) =>
    new Response(body, { status, headers: { 'content-type': contentType } })
  );
}

describe('canonicalizeUrl', () => {
  it('should point arXiv abstract pages at their PDF', () => {
    expect(canonicalizeUrl('https://arxiv.org/abs/2401.00001')).toBe('https://arxiv.org/pdf/2401.00001.pdf');
    expect(canonicalizeUrl('http://www.arxiv.org/abs/2401.00001v2/')).toBe('https://arxiv.org/pdf/2401.00001v2.pdf');
  });

  it('should normalize arXiv PDF links with and without extension', () => {
    expect(canonicalizeUrl('https://arxiv.org/pdf/2401.00001')).toBe('https://arxiv.org/pdf/2401.00001.pdf');
    expect(canonicalizeUrl('https://arxiv.org/pdf/2401.00001.pdf')).toBe('https://arxiv.org/pdf/2401.00001.pdf');
  });

  it('should keep old-style arXiv identifiers', () => {
    expect(canonicalizeUrl('https://arxiv.org/abs/hep-th/9901001')).toBe('https://arxiv.org/pdf/hep-th/9901001.pdf');
  });

  it('should drop the fragment of other URLs', () => {
    expect(canonicalizeUrl(' https://example.com/paper.html#results ')).toBe('https://example.com/paper.html');
    expect(canonicalizeUrl('https://example.com')).toBe('https://example.com/');
  });

  it('should reject anything that is not an http(s) URL', () => {
    expect(() => canonicalizeUrl('not a url')).toThrow('Please enter a valid http(s) URL');
    expect(() => canonicalizeUrl('ftp://example.com/paper.pdf')).toThrow('Please enter a valid http(s) URL');
  });
});

describe('htmlToText', () => {
  it('should keep the article region as paragraphs', () => {
    expect(htmlToText(ARTICLE_HTML)).toBe('Title\n\nFirst & foremost.\n\nSecond\nline');
  });

  it('should drop scripts, styles and comments', () => {
    const html = '<div>Kept<script>var x = 1;</script><style>p{}</style><!-- note --></div>';
    expect(htmlToText(html)).toBe('Kept');
  });

  it('should decode numeric and named entities', () => {
    expect(decodeEntities('&#65;&#x42;&lt;&unknown;')).toBe('AB<&unknown;');
  });
});

describe('isPdfBytes', () => {
  it('should check the PDF signature', () => {
    expect(isPdfBytes(Buffer.from('%PDF-1.7\n'))).toBe(true);
    expect(isPdfBytes(Buffer.from('<html>'))).toBe(false);
    expect(isPdfBytes(Buffer.from('%PD'))).toBe(false);
  });
});

describe('HttpExtractor', () => {
  it('should extract text from an HTML page', async () => {
    const fetch = respondWith(ARTICLE_HTML, 'text/html; charset=utf-8');
    const extractor = new HttpExtractor({ fetch, minTextChars: 10 });

    const document = await extractor.extract('https://example.com/paper.html');

    expect(document).toEqual({ text: 'Title\n\nFirst & foremost.\n\nSecond\nline', sourceKind: 'html' });
    expect(fetch).toHaveBeenCalledWith(
      'https://example.com/paper.html',
      expect.objectContaining({ headers: { 'User-Agent': 'Mozilla/5.0 (PaperDigestBot)' } })
    );
  });

  it('should parse a PDF response', async () => {
    const parsePdf = vi.fn(async (_data: Uint8Array) => 'Text recovered from the PDF pages.');
    const fetch = respondWith('%PDF-1.7 body', 'application/pdf');
    const extractor = new HttpExtractor({ fetch, parsePdf, minTextChars: 10 });

    const document = await extractor.extract('https://arxiv.org/abs/2401.00001');

    expect(document).toEqual({ text: 'Text recovered from the PDF pages.', sourceKind: 'pdf' });
    expect(fetch.mock.calls[0]?.[0]).toBe('https://arxiv.org/pdf/2401.00001.pdf');
    expect(Buffer.from(parsePdf.mock.calls[0]?.[0] ?? []).toString('latin1')).toBe('%PDF-1.7 body');
  });

  it('should treat a .pdf path as a PDF whatever the content type', async () => {
    const parsePdf = vi.fn(async (_data: Uint8Array) => 'Text recovered from the PDF pages.');
    const extractor = new HttpExtractor({
      fetch: respondWith('%PDF-1.4 body', 'application/octet-stream'),
      parsePdf,
      minTextChars: 10,
    });

    const document = await extractor.extract('https://example.com/files/paper.pdf');

    expect(document.sourceKind).toBe('pdf');
    expect(parsePdf).toHaveBeenCalledTimes(1);
  });

  it('should reject a PDF response without the PDF signature', async () => {
    const extractor = new HttpExtractor({ fetch: respondWith('<html>login</html>', 'application/pdf') });

    await expect(extractor.extract('https://example.com/paper.pdf')).rejects.toMatchObject({
      reason: 'UNSUPPORTED_FORMAT',
    });
  });

  it('should report an unreadable PDF as unsupported', async () => {
    const extractor = new HttpExtractor({
      fetch: respondWith('%PDF-1.7 broken', 'application/pdf'),
      parsePdf: async () => {
        throw new Error('Invalid PDF structure');
      },
    });

    await expect(extractor.extract('https://example.com/paper.pdf')).rejects.toMatchObject({
      reason: 'UNSUPPORTED_FORMAT',
    });
  });

  it('should reject other content types', async () => {
    const extractor = new HttpExtractor({ fetch: respondWith('binary', 'image/png') });

    await expect(extractor.extract('https://example.com/figure')).rejects.toMatchObject({
      reason: 'UNSUPPORTED_FORMAT',
    });
  });

  it('should report HTTP errors as unreachable', async () => {
    const extractor = new HttpExtractor({ fetch: respondWith('missing', 'text/html', 404) });

    const attempt = extractor.extract('https://example.com/missing');

    await expect(attempt).rejects.toBeInstanceOf(ExtractionError);
    await expect(attempt).rejects.toMatchObject({ reason: 'UNREACHABLE' });
  });

  it('should report network failures as unreachable', async () => {
    const extractor = new HttpExtractor({
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(extractor.extract('https://example.com/paper')).rejects.toMatchObject({ reason: 'UNREACHABLE' });
  });

  it('should reject pages with too little text', async () => {
    const extractor = new HttpExtractor({ fetch: respondWith('<p>Too short.</p>', 'text/html') });

    await expect(extractor.extract('https://example.com/stub')).rejects.toMatchObject({
      reason: 'EMPTY_DOCUMENT',
    });
  });
});
