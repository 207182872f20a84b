/**
 * Text Extraction
 *
 * Turns an uploaded file into raw text: plain text is decoded as UTF-8,
 * PDFs are read from their text layer and images go through OCR.
 */

import { EmptyDocumentError } from '../errors';
import { IMAGE_EXTENSIONS, resolveFileType, type UploadedFile } from '../files';
import { logger } from '../logger';
import { recognizeImage, type OcrOptions } from './ocr';
import { extractTextFromPdf } from './pdf';

export interface TextExtractor {
  extract(file: UploadedFile): Promise<string>;
}

export interface DefaultTextExtractorOptions {
  ocr: OcrOptions;
  /** Replaces the pdfjs-dist reader */
  readPdf?: (data: Uint8Array) => Promise<string>;
  /** Replaces the tesseract.js recognizer */
  recognize?: (image: Buffer, options: OcrOptions) => Promise<string>;
}

export class DefaultTextExtractor implements TextExtractor {
  private readonly readPdf: (data: Uint8Array) => Promise<string>;
  private readonly recognize: (image: Buffer, options: OcrOptions) => Promise<string>;

  constructor(private readonly options: DefaultTextExtractorOptions) {
    this.readPdf = options.readPdf ?? extractTextFromPdf;
    this.recognize = options.recognize ?? recognizeImage;
  }

  /**
   * @throws EmptyDocumentError when the file yields no text
   */
  async extract(file: UploadedFile): Promise<string> {
    const { fileType } = resolveFileType(file.originalname);
    const start = Date.now();

    let text: string;
    let method: 'text' | 'pdf' | 'ocr';
    if (fileType === '.pdf') {
      method = 'pdf';
      text = await this.readPdf(new Uint8Array(file.buffer));
    } else if (IMAGE_EXTENSIONS.some((ext) => ext === fileType)) {
      method = 'ocr';
      text = await this.recognize(file.buffer, this.options.ocr);
    } else {
      method = 'text';
      text = file.buffer.toString('utf-8');
    }

    logger.info('Text extracted', {
      filename: file.originalname,
      method,
      chars: text.length,
      duration_ms: Date.now() - start,
    });

    if (text.trim() === '') {
      throw new EmptyDocumentError(`No text could be extracted from ${file.originalname}`);
    }
    return text;
  }
}

export { extractTextFromPdf, type PageText } from './pdf';
export { recognizeImage, resolveLangPath, type OcrOptions } from './ocr';
