/**
 * Image OCR
 *
 * tesseract.js recognition for uploaded images and camera captures.
 * English data is read from the installed @tesseract.js-data/eng package;
 * OCR_LANG_PATH points at a directory holding data for other languages.
 */

import path from 'path';
import { logger } from '../logger';

export interface OcrOptions {
  language: string;
  langPath?: string;
}

/** Directory of the LSTM model in @tesseract.js-data/eng, matching OEM 1 */
const ENG_MODEL_DIR = '4.0.0_best_int';

/**
 * Local language data directory. Without one tesseract.js downloads the
 * model from its CDN.
 */
export function resolveLangPath(options: OcrOptions): string | undefined {
  if (options.langPath) {
    return options.langPath;
  }
  if (options.language !== 'eng') {
    return undefined;
  }
  return path.join(path.dirname(require.resolve('@tesseract.js-data/eng/package.json')), ENG_MODEL_DIR);
}

export async function recognizeImage(image: Buffer, options: OcrOptions): Promise<string> {
  const { default: Tesseract } = await import('tesseract.js');
  const langPath = resolveLangPath(options);
  const worker = await Tesseract.createWorker(options.language, 1, langPath ? { langPath } : {});

  try {
    const { data } = await worker.recognize(image);
    logger.debug('OCR complete', {
      language: options.language,
      confidence: data.confidence,
      chars: data.text.length,
    });
    return data.text;
  } finally {
    await worker.terminate();
  }
}
