/**
 * PDF Text Extraction
 *
 * Extracts text from PDF files using pdfjs-dist.
 */

import path from 'path';
import { logger } from '../logger';

type PdfJs = typeof import('pdfjs-dist');

let pdfjs: PdfJs | null = null;

/**
 * Load pdfjs-dist on first use, so processes that never see a PDF do not pay for it.
 */
async function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjs) {
    const lib = await import('pdfjs-dist');
    // Configure worker for Node.js environment
    lib.GlobalWorkerOptions.workerSrc = path.join(
      path.dirname(require.resolve('pdfjs-dist/package.json')),
      'build/pdf.worker.js'
    );
    pdfjs = lib;
  }
  return pdfjs;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

/**
 * Extract text from a PDF, preserving line structure.
 *
 * Groups text items by Y position to maintain document layout, so that
 * label/value pairs on one visual line stay together for the model.
 */
export async function extractPdfPages(data: Uint8Array): Promise<PageText[]> {
  const pdfjsLib = await loadPdfJs();
  const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;
  const pages: PageText[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Group text items by Y position to preserve line structure
      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Round Y position to group items on the same line
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // Sort Y positions descending (top to bottom on page)
      const lines = Array.from(itemsByY.keys())
        .sort((a, b) => b - a)
        .map((y) =>
          (itemsByY.get(y) ?? [])
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str)
            .join(' ')
            .trim()
        )
        .filter((line) => line !== '');

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
    }
  } finally {
    await pdf.destroy();
  }

  logger.debug('PDF text extraction complete', {
    totalPages: pages.length,
    totalChars: pages.reduce((sum, p) => sum + p.text.length, 0),
  });

  return pages;
}

export async function extractTextFromPdf(data: Uint8Array): Promise<string> {
  const pages = await extractPdfPages(data);
  return pages.map((p) => p.text).join('\n\n');
}
