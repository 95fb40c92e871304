/**
 * HKEX public endpoints. Page shapes live in calendar-parsers.ts and
 * filing-parsers.ts; only the locations live here.
 */

export const HKEX_NEWS_HOST = 'https://www1.hkexnews.hk';
export const HKEX_NEWS_BASE = 'https://www2.hkexnews.hk';

export const HKEX_IPO_CALENDAR_URL =
  'https://www.hkex.com.hk/Market-Data/IPO-Activity/IPO-Calendar?sc_lang=en';

export const HKEX_NEW_LISTING_MAIN_URL =
  `${HKEX_NEWS_BASE}/New-Listings/New-Listing-Information/Main-Board?sc_lang=en`;

export const HKEX_NEW_LISTING_REPORT_SEGMENT = '/New-Listing-Report/Main/';

export const HKEX_APPLICATION_PROOF_URL = `${HKEX_NEWS_HOST}/app/appindex.html`;

export const HKEX_APPLICATION_INDEX_URLS: ReadonlyArray<{ board: string; url: string }> = [
  { board: 'Main Board', url: `${HKEX_NEWS_HOST}/app/documents/sehkconsolidatedindex.xlsx` },
  { board: 'GEM', url: `${HKEX_NEWS_HOST}/app/documents/gemconsolidatedindex.xlsx` },
];

export interface SearchEndpoint {
  source: string;
  url: string;
  method: 'get' | 'post';
}

export const HKEX_SEARCH_ENDPOINTS: ReadonlyArray<SearchEndpoint> = [
  { source: 'servlet', url: `${HKEX_NEWS_HOST}/search/titleSearchServlet.do`, method: 'post' },
  { source: 'xhtml', url: `${HKEX_NEWS_HOST}/search/titlesearch.xhtml`, method: 'get' },
];

/**
 * Calendar page candidates: an env-supplied URL first, then the public page
 */
export function calendarPageUrls(configured: string | null): string[] {
  return [configured, HKEX_IPO_CALENDAR_URL].filter((u): u is string => Boolean(u));
}
