/**
 * PDF → plain text, first N pages only
 */

import { PDFParse } from 'pdf-parse';
import { ParseError } from './errors.js';

export type PdfTextReader = (data: Buffer, maxPages: number) => Promise<string>;

export const PDF_MAGIC = '%PDF-';

export function isPdf(data: Buffer): boolean {
  return data.subarray(0, PDF_MAGIC.length).toString('latin1') === PDF_MAGIC;
}

export const readPdfText: PdfTextReader = async (data, maxPages) => {
  const parser = new PDFParse({ data: new Uint8Array(data) });
  try {
    const result = await parser.getText({ first: maxPages });
    return result.pages
      .slice(0, maxPages)
      .map((p) => p.text)
      .join('\n');
  } catch (error) {
    throw new ParseError(`Unreadable PDF: ${error instanceof Error ? error.message : String(error)}`, 'pdf', {
      cause: error,
    });
  } finally {
    await parser.destroy();
  }
};
