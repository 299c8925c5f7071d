/**
 * PDF text extraction with pdfjs-dist (legacy build, which runs under Node).
 */

const PDF_MAGIC = '%PDF-';

export function isPdfBytes(bytes: Uint8Array): boolean {
  if (bytes.length < PDF_MAGIC.length) return false;
  return Buffer.from(bytes.subarray(0, PDF_MAGIC.length)).toString('latin1') === PDF_MAGIC;
}

/**
 * Pages are joined by a blank line; text items ending a line keep their break.
 */
export async function extractPdfText(data: Uint8Array): Promise<string> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const pdf = await pdfjs.getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();

      let text = '';
      for (const item of content.items) {
        if ('str' in item) {
          text += item.str;
          if (item.hasEOL) text += '\n';
        }
      }

      pages.push(text.trim());
      page.cleanup();
    }
    return pages.filter((page) => page.length > 0).join('\n\n');
  } finally {
    await pdf.destroy();
  }
}
