import { describe, it, expect } from 'vitest';
import {
  createCalendarEntry,
  parseApplicationIndex,
  parseCalendarPage,
  parseListingReport,
  parseListingReportLinks,
  parseNewListingDocuments,
} from '../src/calendar-parsers.js';
import { ParseError } from '../src/errors.js';
import { HKEX_APPLICATION_PROOF_URL, HKEX_NEW_LISTING_MAIN_URL } from '../src/hkex-endpoints.js';
import { APPLICATION_INDEX_ROWS, buildWorkbook, LISTING_REPORT_ROWS, NEW_LISTING_PAGE } from './helpers/fixtures.js';

describe('parseListingReportLinks', () => {
  it('returns absolute workbook links, newest year first', () => {
    expect(parseListingReportLinks(NEW_LISTING_PAGE)).toEqual([
      'https://www2.hkexnews.hk/-/media/HKEXnews/Homepage/New-Listings/New-Listing-Information/New-Listing-Report/Main/NLR2025_Eng.xlsx',
      'https://www2.hkexnews.hk/-/media/HKEXnews/Homepage/New-Listings/New-Listing-Information/New-Listing-Report/Main/NLR2024_Eng.xlsx',
    ]);
  });
});

describe('parseNewListingDocuments', () => {
  it('keys document links by stock code', () => {
    const docs = parseNewListingDocuments(NEW_LISTING_PAGE);
    expect([...docs.keys()]).toEqual(['02617']);
    expect(docs.get('02617')).toEqual({
      companyName: 'ALPHA BIOTECH HOLDINGS',
      announcementUrl: 'https://www2.hkexnews.hk/listedco/listconews/sehk/2025/0106/ann.pdf',
      prospectusUrl: 'https://www2.hkexnews.hk/listedco/listconews/sehk/2025/0106/prospectus.pdf',
      allotmentUrl: null,
    });
  });

  it('is empty without a documents table', () => {
    expect(parseNewListingDocuments('<table><tr><th>Other</th></tr></table>').size).toBe(0);
  });
});

describe('parseListingReport', () => {
  it('reads listed companies with dates, funds and price', () => {
    const entries = parseListingReport(buildWorkbook(LISTING_REPORT_ROWS), 'NLR2025.xlsx');

    expect(entries.map((e) => e.companyName)).toEqual(['Alpha Biotech Holdings Limited', 'Kappa Retail Group']);
    expect(entries[0]).toEqual({
      companyName: 'Alpha Biotech Holdings Limited',
      stockCode: '02617',
      industry: null,
      board: 'Main Board',
      bookbuildingStart: '2025-01-06',
      bookbuildingEnd: '2025-01-06',
      bookbuildingLabel: 'Prospectus',
      listingDate: '2025-01-14',
      rawStatus: null,
      fundsRaisedHkd: 780000000,
      offerPriceHkd: 12.5,
      companyPageUrl: HKEX_NEW_LISTING_MAIN_URL,
      announcementUrl: null,
      prospectusUrl: null,
      allotmentUrl: null,
      source: 'listing-report',
    });
    expect(entries[1].stockCode).toBe('09988');
    expect(entries[1].fundsRaisedHkd).toBeNull();
  });

  it('raises ParseError without the header row', () => {
    const data = buildWorkbook([['Something else'], ['a', 'b']]);
    expect(() => parseListingReport(data, 'bad.xlsx')).toThrow(ParseError);
  });

  it('raises ParseError for bytes that are not a workbook', () => {
    expect(() => parseListingReport(Buffer.from('<html>maintenance</html>'), 'bad.xlsx')).toThrow(ParseError);
  });
});

describe('parseApplicationIndex', () => {
  it('reads dated applicants with their status', () => {
    const entries = parseApplicationIndex(buildWorkbook(APPLICATION_INDEX_ROWS), 'GEM', 'gem.xlsx');

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      companyName: 'Beta Robotics Co., Ltd. - B',
      board: 'GEM',
      bookbuildingStart: '2025-02-20',
      bookbuildingEnd: '2025-02-20',
      bookbuildingLabel: 'Application proof',
      listingDate: null,
      rawStatus: 'Active',
      companyPageUrl: HKEX_APPLICATION_PROOF_URL,
      source: 'application-proof',
    });
    expect(entries[1].rawStatus).toBe('Withdrawn');
  });
});

describe('parseCalendarPage', () => {
  it('reads calendar tables', () => {
    const html = `
      <table>
        <thead><tr><th>Company</th><th>Stock Code</th><th>Bookbuilding</th><th>Listing Date</th></tr></thead>
        <tbody>
          <tr><td><a href="/ipo/delta">Delta Logistics Holdings Ltd</a></td><td>1234</td><td>10-13 Mar 2025</td><td>19 Mar 2025</td></tr>
        </tbody>
      </table>`;

    const [entry, ...rest] = parseCalendarPage(html, 'https://www.hkex.com.hk/Market-Data/IPO-Activity/IPO-Calendar');
    expect(rest).toEqual([]);
    expect(entry).toMatchObject({
      companyName: 'Delta Logistics Holdings Ltd',
      stockCode: '01234',
      bookbuildingStart: '2025-03-10',
      bookbuildingEnd: '2025-03-13',
      listingDate: '2025-03-19',
      companyPageUrl: 'https://www.hkex.com.hk/ipo/delta',
      source: 'hkex-calendar',
    });
  });

  it('prefers embedded calendar state', () => {
    const html = `
      <script>
        window.__INITIAL_STATE__ = {"ipoCalendar":{"items":[
          {"company":"Epsilon Semiconductor Limited","stockCode":"3321","offerPeriod":"2 Apr 2025 - 7 Apr 2025","listingDate":"2025-04-11","status":"Upcoming"}
        ]}};
      </script>
      <table><tr><th>Listing</th></tr></table>`;

    const entries = parseCalendarPage(html, 'https://example.com/calendar');
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      companyName: 'Epsilon Semiconductor Limited',
      stockCode: '03321',
      bookbuildingStart: '2025-04-02',
      bookbuildingEnd: '2025-04-07',
      listingDate: '2025-04-11',
      rawStatus: 'Upcoming',
    });
  });

  it('raises ParseError for a page with no calendar', () => {
    expect(() => parseCalendarPage('<p>Under maintenance</p>', 'https://example.com/calendar')).toThrow(ParseError);
  });
});

describe('createCalendarEntry', () => {
  it('applies the date ordering rule', () => {
    const entry = createCalendarEntry({
      companyName: '  Zeta   Holdings ',
      bookbuildingStart: '2025-03-13',
      bookbuildingEnd: '2025-03-10',
      listingDate: '2025-03-11',
      source: 'hkex-calendar',
    });
    expect(entry.companyName).toBe('Zeta Holdings');
    expect([entry.bookbuildingStart, entry.bookbuildingEnd, entry.listingDate]).toEqual([
      '2025-03-10',
      '2025-03-11',
      '2025-03-11',
    ]);
  });
});
