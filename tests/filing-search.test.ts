import { describe, it, expect } from 'vitest';
import { parseFilingsHtml, parseFilingsJson, stripTags, tryParseJson } from '../src/filing-parsers.js';
import { buildSearchParams, FilingSearch, matchScore, rankFilings } from '../src/filing-search.js';
import { createHttpClient } from '../src/http.js';
import { HKEX_SEARCH_ENDPOINTS } from '../src/hkex-endpoints.js';
import type { Filing } from '../src/types.js';
import { fakeHttp, formBody, timesOut } from './helpers/fake-http.js';

const [SERVLET, XHTML] = HKEX_SEARCH_ENDPOINTS;

const SERVLET_BODY = JSON.stringify({
  hasNextRow: false,
  result: JSON.stringify([
    { FILE_LINK: '/listedco/listconews/sehk/2024/0902/ap.pdf', TITLE: 'Application Proof', STOCK_NAME: 'ALPHA BIOTECH HOLDINGS', DATE_TIME: '02/09/2024 19:00' },
    { FILE_LINK: '/listedco/listconews/sehk/2025/0110/prospectus.pdf', TITLE: 'Prospectus', STOCK_NAME: 'ALPHA BIOTECH HOLDINGS', DATE_TIME: '10/01/2025 22:30' },
    { FILE_LINK: '/listedco/listconews/sehk/2025/0111/other.pdf', TITLE: 'Announcement', STOCK_NAME: 'OMEGA FOODS', DATE_TIME: '11/01/2025 08:00' },
    { FILE_LINK: '/listedco/listconews/sehk/notice.htm', TITLE: 'Formal notice', STOCK_NAME: 'ALPHA BIOTECH' },
  ]),
});

const XHTML_BODY = `
<table>
  <tr>
    <td class="release-time">03/01/2025 18:00</td>
    <td class="stock-short-name">BETA ROBOTICS-B</td>
    <td><a href="/listedco/listconews/sehk/2025/0103/beta-notice.htm">Notice</a></td>
  </tr>
  <tr>
    <td class="release-time">15/01/2025 19:00</td>
    <td class="stock-short-name">BETA ROBOTICS-B</td>
    <td><a href="/listedco/listconews/sehk/2025/0115/beta.pdf">Global Offering</a></td>
  </tr>
</table>`;

function filing(title: string, publishedDate: string | null, url = `https://example.com/${title}.pdf`): Filing {
  return { title, url, publishedDate, source: 'test' };
}

describe('filing response parsers', () => {
  it('walks nested servlet JSON in document order', () => {
    const candidates = parseFilingsJson(tryParseJson(SERVLET_BODY), 'servlet');
    expect(candidates.map((c) => c.filing.title)).toEqual(['Application Proof', 'Prospectus', 'Announcement', 'Formal notice']);
    expect(candidates[1]).toEqual({
      filing: {
        title: 'Prospectus',
        url: 'https://www1.hkexnews.hk/listedco/listconews/sehk/2025/0110/prospectus.pdf',
        publishedDate: '2025-01-10',
        source: 'servlet',
      },
      stockName: 'ALPHA BIOTECH HOLDINGS',
    });
    expect(candidates[3].filing.publishedDate).toBeNull();
  });

  it('reads anchors and row dates from HTML results', () => {
    const candidates = parseFilingsHtml(XHTML_BODY, 'xhtml');
    expect(candidates.map((c) => [c.filing.title, c.filing.publishedDate, c.stockName])).toEqual([
      ['Notice', '2025-01-03', 'BETA ROBOTICS-B'],
      ['Global Offering', '2025-01-15', 'BETA ROBOTICS-B'],
    ]);
  });

  it('dedupes by URL', () => {
    const html = '<p><a href="/a.pdf">One</a></p><p><a href="/a.pdf">Two</a></p>';
    expect(parseFilingsHtml(html, 'xhtml').map((c) => c.filing.title)).toEqual(['One']);
  });

  it('drops markup and decodes entities in servlet titles', () => {
    expect(stripTags('Directors&#39; Report<br/>&amp; Accounts')).toBe("Directors' Report & Accounts");
    expect(stripTags('&quot;Global&quot;  Offering')).toBe('"Global" Offering');
  });

  it('only treats object or array bodies as JSON', () => {
    expect(tryParseJson('<html></html>')).toBeUndefined();
    expect(tryParseJson('{broken')).toBeUndefined();
    expect(tryParseJson(' [1] ')).toEqual([1]);
  });
});

describe('matchScore', () => {
  it('scores full key, distinctive part and token overlap', () => {
    expect(matchScore('Alpha Biotech Holdings', 'ALPHA BIOTECH HOLDINGS Prospectus')).toBe(3);
    expect(matchScore('Alpha Biotech Holdings', 'ALPHA BIOTECH Formal notice')).toBe(2);
    expect(matchScore('Northern Star Pharma Holdings', 'Star Pharma and Northern update')).toBe(1);
    expect(matchScore('Alpha Biotech Holdings', 'OMEGA FOODS Announcement')).toBe(0);
  });
});

describe('rankFilings', () => {
  it('orders newest first with undated filings last', () => {
    const ranked = rankFilings([
      filing('b', null),
      filing('c', '2024-05-01'),
      filing('a', '2025-01-01'),
      filing('d', null),
    ]);
    expect(ranked.map((f) => f.title)).toEqual(['a', 'c', 'b', 'd']);
  });

  it('breaks date ties on score, then title', () => {
    const x = filing('x', '2025-01-01');
    const y = filing('y', '2025-01-01');
    const z = filing('z', '2025-01-01');
    const scores = new Map([[x.url, 1], [y.url, 1], [z.url, 3]]);
    expect(rankFilings([y, x, z], scores).map((f) => f.title)).toEqual(['z', 'x', 'y']);
  });
});

describe('FilingSearch', () => {
  it('returns matching servlet hits ranked newest first', async () => {
    const http = fakeHttp({ [SERVLET.url]: { body: SERVLET_BODY } });
    const search = new FilingSearch({ http: createHttpClient({ timeoutMs: 1000, adapter: http.adapter }), today: () => '2025-02-01' });

    const filings = await search.searchFilings('Alpha Biotech Holdings');

    expect(filings.map((f) => [f.title, f.publishedDate])).toEqual([
      ['Prospectus', '2025-01-10'],
      ['Application Proof', '2024-09-02'],
      ['Formal notice', null],
    ]);
    expect(http.calls).toHaveLength(1);
    expect(http.calls[0].method).toBe('post');
    const form = formBody(http.calls[0]);
    expect(form.get('title')).toBe('Alpha Biotech Holdings');
    expect(form.get('searchFromDate')).toBe('20230202');
    expect(form.get('searchToDate')).toBe('20250201');
    expect(form.get('lang')).toBe('EN');
  });

  it('falls back to the xhtml endpoint when the servlet fails', async () => {
    const http = fakeHttp({
      [SERVLET.url]: { status: 500, body: 'error' },
      [XHTML.url]: { body: XHTML_BODY },
    });
    const search = new FilingSearch({ http: createHttpClient({ timeoutMs: 1000, adapter: http.adapter }), today: () => '2025-02-01' });

    const filings = await search.searchFilings('Beta Robotics Co., Ltd. - B');

    expect(filings).toEqual([
      { title: 'Global Offering', url: 'https://www1.hkexnews.hk/listedco/listconews/sehk/2025/0115/beta.pdf', publishedDate: '2025-01-15', source: 'xhtml' },
      { title: 'Notice', url: 'https://www1.hkexnews.hk/listedco/listconews/sehk/2025/0103/beta-notice.htm', publishedDate: '2025-01-03', source: 'xhtml' },
    ]);
    expect(http.calls[1].params).toMatchObject({ title: 'Beta Robotics Co., Ltd. - B', searchMethod: 'TITLE' });
  });

  it('returns an empty list when nothing matches or every endpoint fails', async () => {
    const unmatched = fakeHttp({ [SERVLET.url]: { body: SERVLET_BODY }, [XHTML.url]: { body: XHTML_BODY } });
    const down = fakeHttp({});
    const today = (): string => '2025-02-01';

    await expect(
      new FilingSearch({ http: createHttpClient({ timeoutMs: 1000, adapter: unmatched.adapter }), today }).searchFilings('Zeta Mining'),
    ).resolves.toEqual([]);
    await expect(
      new FilingSearch({ http: createHttpClient({ timeoutMs: 1000, adapter: down.adapter }), today }).searchFilings('Alpha Biotech Holdings'),
    ).resolves.toEqual([]);
    expect(down.calls).toHaveLength(2);
  });

  it('returns an empty list when both endpoints time out', async () => {
    const http = fakeHttp({}, timesOut());
    const search = new FilingSearch({ http: createHttpClient({ timeoutMs: 1000, adapter: http.adapter }), today: () => '2025-02-01' });

    await expect(search.searchFilings('Alpha Biotech Holdings')).resolves.toEqual([]);
    expect(http.calls.map((c) => c.url)).toEqual([SERVLET.url, XHTML.url]);
  });

  it('skips the request for a blank name', async () => {
    const http = fakeHttp({});
    const search = new FilingSearch({ http: createHttpClient({ timeoutMs: 1000, adapter: http.adapter }), today: () => '2025-02-01' });
    await expect(search.searchFilings('  ')).resolves.toEqual([]);
    expect(http.calls).toHaveLength(0);
  });
});

describe('buildSearchParams', () => {
  it('searches titles over the two years up to today', () => {
    expect(buildSearchParams('Alpha', '2025-02-01')).toEqual({
      lang: 'EN',
      searchType: 'SEHK',
      searchMethod: 'TITLE',
      market: 'SEHK',
      title: 'Alpha',
      searchFromDate: '20230202',
      searchToDate: '20250201',
      sortDir: '0',
      sortByOptions: 'DateTime',
    });
  });
});
