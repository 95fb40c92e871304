/**
 * HKEX Filing Search
 *
 * Title search against HKEXnews for a company, matched back to the company
 * name and ranked newest first. No match is a normal, empty result.
 */

import type { AxiosInstance } from 'axios';
import { addDays } from './dates.js';
import { errorMessage, isRecoverable } from './errors.js';
import { fetchText } from './http.js';
import { HKEX_SEARCH_ENDPOINTS, SearchEndpoint } from './hkex-endpoints.js';
import { nameTokens, normalizeCompanyKey } from './name-normalizer.js';
import { FilingCandidate, parseFilingsHtml, parseFilingsJson, tryParseJson } from './filing-parsers.js';
import { createLogger } from './logger.js';
import type { Filing } from './types.js';

const log = createLogger('FilingSearch');

// Words too common in HK issuer names to identify a company on their own
const GENERIC_TOKENS = new Set(['holdings', 'holding', 'group', 'international', 'technology', 'technologies']);

const SEARCH_WINDOW_DAYS = 730;

/**
 * How well a search hit matches the company:
 * 3 full key contained, 2 distinctive part contained, 1 most words present, 0 no match
 */
export function matchScore(companyName: string, candidateText: string): number {
  const key = normalizeCompanyKey(companyName);
  if (!key) return 0;

  const haystack = candidateText.toLowerCase().replace(/[^a-z0-9]+/g, '');
  if (haystack.includes(key)) return 3;

  const core = nameTokens(companyName).filter((t) => !GENERIC_TOKENS.has(t));
  const coreKey = core.join('');
  if (coreKey.length >= 4 && haystack.includes(coreKey)) return 2;

  const significant = core.filter((t) => t.length >= 3);
  if (significant.length === 0) return 0;
  const words = new Set(candidateText.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean));
  const hits = significant.filter((t) => words.has(t)).length;
  return hits / significant.length >= 2 / 3 ? 1 : 0;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Newest first, undated last; then match score, title, url
 */
export function rankFilings(filings: readonly Filing[], scores: ReadonlyMap<string, number> = new Map()): Filing[] {
  return [...filings].sort((a, b) => {
    if (a.publishedDate !== b.publishedDate) {
      if (a.publishedDate === null) return 1;
      if (b.publishedDate === null) return -1;
      return compareText(b.publishedDate, a.publishedDate);
    }
    const byScore = (scores.get(b.url) ?? 0) - (scores.get(a.url) ?? 0);
    if (byScore !== 0) return byScore;
    return compareText(a.title, b.title) || compareText(a.url, b.url);
  });
}

export function dedupeFilings(filings: readonly Filing[]): Filing[] {
  const seen = new Set<string>();
  return filings.filter((f) => {
    if (seen.has(f.url)) return false;
    seen.add(f.url);
    return true;
  });
}

function compactDate(iso: string): string {
  return iso.replace(/-/g, '');
}

export function buildSearchParams(companyName: string, today: string): Record<string, string> {
  return {
    lang: 'EN',
    searchType: 'SEHK',
    searchMethod: 'TITLE',
    market: 'SEHK',
    title: companyName,
    searchFromDate: compactDate(addDays(today, -SEARCH_WINDOW_DAYS)),
    searchToDate: compactDate(today),
    sortDir: '0',
    sortByOptions: 'DateTime',
  };
}

export interface FilingSearchOptions {
  http: AxiosInstance;
  today: () => string;
  endpoints?: ReadonlyArray<SearchEndpoint>;
}

export class FilingSearch {
  private readonly http: AxiosInstance;
  private readonly today: () => string;
  private readonly endpoints: ReadonlyArray<SearchEndpoint>;

  constructor(options: FilingSearchOptions) {
    this.http = options.http;
    this.today = options.today;
    this.endpoints = options.endpoints ?? HKEX_SEARCH_ENDPOINTS;
  }

  /**
   * Ranked filings matching the company. The first endpoint with a match wins.
   */
  async searchFilings(companyName: string): Promise<Filing[]> {
    if (!companyName.trim()) return [];
    const params = buildSearchParams(companyName, this.today());

    for (const endpoint of this.endpoints) {
      try {
        const body = await fetchText(this.http, endpoint.url, { method: endpoint.method, params });
        const json = tryParseJson(body);
        let candidates = json !== undefined ? parseFilingsJson(json, endpoint.source) : [];
        if (candidates.length === 0) candidates = parseFilingsHtml(body, endpoint.source);

        const matched = this.match(companyName, candidates);
        if (matched.length > 0) return matched;
      } catch (error) {
        if (!isRecoverable(error)) throw error;
        log.warn(`${endpoint.source} search failed for "${companyName}": ${errorMessage(error)}`);
      }
    }
    return [];
  }

  private match(companyName: string, candidates: FilingCandidate[]): Filing[] {
    const scores = new Map<string, number>();
    const kept: Filing[] = [];
    for (const { filing, stockName } of candidates) {
      const score = matchScore(companyName, `${stockName} ${filing.title}`);
      if (score === 0) continue;
      scores.set(filing.url, score);
      kept.push(filing);
    }
    return rankFilings(kept, scores);
  }
}
