/**
 * Term Extractor
 *
 * Downloads a filing, reads the first pages of text and runs the term
 * pattern chains. Download and parse failures mean "no terms": the result is
 * an empty object, never a throw.
 */

import type { AxiosInstance } from 'axios';
import { errorMessage, isRecoverable, ParseError } from './errors.js';
import { fetchBytes } from './http.js';
import { createLogger } from './logger.js';
import { isPdf, PdfTextReader } from './pdf-text.js';
import { extractTermsFromText } from './term-patterns.js';
import type { ExtractedTerms, Filing } from './types.js';

const log = createLogger('TermExtractor');

export interface TermExtractorOptions {
  http: AxiosInstance;
  readPdfText: PdfTextReader;
  hkdUsdRate: number;
  maxPdfBytes: number;
  maxPages: number;
}

export class TermExtractor {
  constructor(private readonly options: TermExtractorOptions) {}

  async extractTerms(filing: Filing): Promise<ExtractedTerms> {
    try {
      const text = await this.downloadText(filing.url);
      const terms = extractTermsFromText(text, this.options.hkdUsdRate);
      log.info(`${filing.url}: ${Object.keys(terms).length} field(s)`);
      return terms;
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      log.warn(`No terms from ${filing.url}: ${errorMessage(error)}`);
      return {};
    }
  }

  private async downloadText(url: string): Promise<string> {
    const { http, maxPdfBytes, maxPages, readPdfText } = this.options;
    const data = await fetchBytes(http, url, maxPdfBytes);
    if (!isPdf(data)) {
      throw new ParseError(`Not a PDF document: ${url}`, url);
    }
    return readPdfText(data, maxPages);
  }
}
