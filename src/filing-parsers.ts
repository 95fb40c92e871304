/**
 * HKEX title search response parsers. The servlet answers JSON (sometimes a
 * JSON string wrapped in JSON), the xhtml endpoint answers an HTML results table.
 */

import * as cheerio from 'cheerio';
import { extractFirstDate, parseDate } from './dates.js';
import { isRecord } from './calendar-parsers.js';
import { HKEX_NEWS_HOST } from './hkex-endpoints.js';
import type { Filing } from './types.js';

/**
 * A search hit before matching: the filing plus the issuer name HKEX reports
 */
export interface FilingCandidate {
  filing: Filing;
  stockName: string;
}

const TITLE_KEYS = ['title', 'TITLE', 'docTitle', 'headline', 'documentTitle'];
const URL_KEYS = ['url', 'FILE_LINK', 'docUrl', 'fileLink', 'documentUrl'];
const DATE_KEYS = ['publishedDate', 'DATE_TIME', 'date', 'publishDate'];
const NAME_KEYS = ['STOCK_NAME', 'stockName', 'issuer', 'company'];

export function normalizeHkexUrl(url: string): string {
  if (url.startsWith('http')) return url;
  if (url.startsWith('/')) return `${HKEX_NEWS_HOST}${url}`;
  return `${HKEX_NEWS_HOST}/${url}`;
}

function pickFirst(node: Record<string, unknown>, keys: string[]): string | null {
  for (const key of keys) {
    const value = node[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return null;
}

/**
 * Servlet titles carry HTML markup and entities ("Rules&#39; compliance<br/>")
 */
export function stripTags(text: string): string {
  const spaced = text.replace(/<[^>]*>/g, ' ');
  return cheerio.load(spaced, null, false).root().text().replace(/\s+/g, ' ').trim();
}

export function tryParseJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

/**
 * Walk a JSON payload for nodes carrying a title and a URL
 */
export function parseFilingsJson(payload: unknown, source: string): FilingCandidate[] {
  const candidates: FilingCandidate[] = [];
  const stack: unknown[] = [payload];

  while (stack.length > 0) {
    const node = stack.pop();
    if (typeof node === 'string') {
      // servlet nests its result list as a JSON string under "result"
      const nested = tryParseJson(node);
      if (nested !== undefined) stack.push(nested);
    } else if (Array.isArray(node)) {
      for (let i = node.length - 1; i >= 0; i--) stack.push(node[i]);
    } else if (isRecord(node)) {
      const title = pickFirst(node, TITLE_KEYS);
      const url = pickFirst(node, URL_KEYS);
      if (title && url) {
        candidates.push({
          filing: {
            title: stripTags(title),
            url: normalizeHkexUrl(url),
            publishedDate: parseDate(pickFirst(node, DATE_KEYS)),
            source,
          },
          stockName: stripTags(pickFirst(node, NAME_KEYS) ?? ''),
        });
      }
      for (const value of Object.values(node).reverse()) stack.push(value);
    }
  }

  return dedupeCandidates(candidates);
}

function isFilingLink(href: string): boolean {
  const lower = href.toLowerCase();
  return ['.pdf', '.htm', '.html'].some((ext) => lower.endsWith(ext));
}

/**
 * Anchors to documents in an HTML results page; the date and issuer come
 * from the enclosing row (or parent) text
 */
export function parseFilingsHtml(html: string, source: string): FilingCandidate[] {
  const $ = cheerio.load(html);
  const candidates: FilingCandidate[] = [];

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    if (!isFilingLink(href)) return;

    const title = $(el).text().replace(/\s+/g, ' ').trim();
    const row = $(el).closest('tr');
    const container = row.length > 0 ? row : $(el).parent();
    const contextText = container.text().replace(/\s+/g, ' ').trim();
    const stockName = row.length > 0
      ? row.find('td.stock-short-name, td.col-stock-short-name').first().text().replace(/\s+/g, ' ').trim()
      : '';

    candidates.push({
      filing: {
        title: title || contextText,
        url: normalizeHkexUrl(href),
        publishedDate: extractFirstDate(contextText),
        source,
      },
      stockName: stockName || contextText,
    });
  });

  return dedupeCandidates(candidates);
}

function dedupeCandidates(candidates: FilingCandidate[]): FilingCandidate[] {
  const seen = new Set<string>();
  return candidates.filter((c) => {
    if (seen.has(c.filing.url)) return false;
    seen.add(c.filing.url);
    return true;
  });
}
