/**
 * HKEX Calendar Page Parsers
 *
 * Every assumption about the shape of the HKEX listing pages and workbooks
 * lives here:
 * 1. New Listing Information page → yearly New Listing Report links + documents table
 * 2. New Listing Report workbook → prospectus/listing dates, funds raised
 * 3. Application proof consolidated index workbook → applicants + first posting date
 * 4. Legacy IPO calendar page → embedded JSON state, or HTML tables
 */

import * as cheerio from 'cheerio';
import * as XLSX from 'xlsx';
import { ParseError } from './errors.js';
import { absoluteUrl } from './http.js';
import { extractDateRange, extractFirstDate, orderWindow, parseDate } from './dates.js';
import { parseNumber } from './fx.js';
import { normalizeStockCode } from './name-normalizer.js';
import {
  HKEX_APPLICATION_PROOF_URL,
  HKEX_NEWS_BASE,
  HKEX_NEW_LISTING_MAIN_URL,
  HKEX_NEW_LISTING_REPORT_SEGMENT,
} from './hkex-endpoints.js';
import type { CalendarEntry, CalendarEntrySource } from './types.js';

export interface ListingDocuments {
  companyName: string;
  announcementUrl: string | null;
  prospectusUrl: string | null;
  allotmentUrl: string | null;
}

type Cell = unknown;
type Row = Cell[];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cellText(value: Cell): string {
  if (value === null || value === undefined) return '';
  return String(value).replace(/\s+/g, ' ').trim();
}

/**
 * Build a CalendarEntry with defaults and the date ordering invariant applied
 */
export function createCalendarEntry(
  fields: Partial<CalendarEntry> & { companyName: string; source: CalendarEntrySource },
): CalendarEntry {
  const [start, end, listing] = orderWindow(
    fields.bookbuildingStart ?? null,
    fields.bookbuildingEnd ?? null,
    fields.listingDate ?? null,
  );
  return {
    companyName: fields.companyName.replace(/\s+/g, ' ').trim(),
    stockCode: fields.stockCode ? fields.stockCode : null,
    industry: fields.industry ? fields.industry : null,
    board: fields.board ?? null,
    bookbuildingStart: start,
    bookbuildingEnd: end,
    bookbuildingLabel: fields.bookbuildingLabel ?? 'Bookbuilding',
    listingDate: listing,
    rawStatus: fields.rawStatus ? fields.rawStatus : null,
    fundsRaisedHkd: fields.fundsRaisedHkd ?? null,
    offerPriceHkd: fields.offerPriceHkd ?? null,
    companyPageUrl: fields.companyPageUrl ?? null,
    announcementUrl: fields.announcementUrl ?? null,
    prospectusUrl: fields.prospectusUrl ?? null,
    allotmentUrl: fields.allotmentUrl ?? null,
    source: fields.source,
  };
}

// ---------------------------------------------------------------------------
// New Listing Information page
// ---------------------------------------------------------------------------

/**
 * Yearly New Listing Report workbook links, newest year first
 */
export function parseListingReportLinks(html: string): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();
  const segment = HKEX_NEW_LISTING_REPORT_SEGMENT.toLowerCase();

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    const lower = href.toLowerCase();
    if (!lower.endsWith('.xlsx') || !lower.includes(segment)) return;
    links.add(absoluteUrl(href, HKEX_NEWS_BASE));
  });

  const year = (url: string): number => {
    const m = url.match(/(\d{4})/);
    return m ? parseInt(m[1], 10) : 0;
  };
  return [...links].sort((a, b) => year(b) - year(a) || a.localeCompare(b));
}

/**
 * Documents table (Stock Code | Stock Name | Announcement | Prospectus | Allotment)
 * keyed by five-digit stock code. Missing table → empty map.
 */
export function parseNewListingDocuments(html: string): Map<string, ListingDocuments> {
  const $ = cheerio.load(html);
  const documents = new Map<string, ListingDocuments>();

  const table = $('table')
    .filter((_, t) => {
      const headers = $(t)
        .find('th')
        .map((__, th) => $(th).text().trim())
        .get();
      return headers.includes('Stock Code') && headers.includes('Stock Name');
    })
    .first();
  if (table.length === 0) return documents;

  table.find('tr').each((_, row) => {
    const cells = $(row).find('td');
    if (cells.length < 5) return;
    const link = (i: number): string | null => {
      const href = $(cells[i]).find('a[href]').first().attr('href');
      return href ? absoluteUrl(href, HKEX_NEWS_BASE) : null;
    };
    const stockCode = normalizeStockCode($(cells[0]).text().trim());
    if (!stockCode) return;
    documents.set(stockCode, {
      companyName: $(cells[1]).text().replace(/\s+/g, ' ').trim(),
      announcementUrl: link(2),
      prospectusUrl: link(3),
      allotmentUrl: link(4),
    });
  });

  return documents;
}

// ---------------------------------------------------------------------------
// Workbooks
// ---------------------------------------------------------------------------

function readRows(data: Buffer, source: string): Row[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer' });
  } catch (error) {
    throw new ParseError(`Unreadable workbook: ${source}`, source, { cause: error });
  }
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) throw new ParseError(`Workbook has no sheets: ${source}`, source);
  return XLSX.utils.sheet_to_json<Row>(sheet, { header: 1, defval: null, raw: true });
}

function findHeaderRow(rows: Row[], required: string[]): number {
  return rows.findIndex((row) => {
    const values = row.map(cellText);
    return required.every((label) => values.some((v) => v.toLowerCase().includes(label.toLowerCase())));
  });
}

function findColumn(header: Row, candidates: string[], fallback: number | null = null): number | null {
  const labels = header.map((c) => cellText(c).toLowerCase());
  for (const candidate of candidates) {
    const idx = labels.findIndex((l) => l.includes(candidate.toLowerCase()));
    if (idx >= 0) return idx;
  }
  return fallback;
}

function at(row: Row, idx: number | null): Cell {
  return idx === null ? null : row[idx] ?? null;
}

/**
 * New Listing Report: one row per listed company
 */
export function parseListingReport(data: Buffer, source: string): CalendarEntry[] {
  const rows = readRows(data, source);
  const headerIdx = findHeaderRow(rows, ['Stock Code', 'Company Name']);
  if (headerIdx < 0) {
    throw new ParseError(`No Stock Code/Company Name header in listing report ${source}`, source);
  }

  const header = rows[headerIdx];
  const codeCol = findColumn(header, ['Stock Code'], 1);
  const nameCol = findColumn(header, ['Company Name'], 2);
  const prospectusCol = findColumn(header, ['Prospectus Date'], 3);
  const listingCol = findColumn(header, ['Listing Date'], 4);
  const fundsCol = findColumn(header, ['Funds Raised'], 8);
  const priceCol = findColumn(header, ['Subscription Price', 'Offer Price'], 9);
  const industryCol = findColumn(header, ['Industry', 'Sector']);

  const entries: CalendarEntry[] = [];
  for (const row of rows.slice(headerIdx + 1)) {
    const stockCode = normalizeStockCode(at(row, codeCol));
    const companyName = cellText(at(row, nameCol));
    if (!stockCode || !companyName) continue;

    const prospectusDate = parseDate(at(row, prospectusCol));
    entries.push(
      createCalendarEntry({
        companyName,
        stockCode,
        industry: cellText(at(row, industryCol)) || null,
        board: 'Main Board',
        bookbuildingStart: prospectusDate,
        bookbuildingEnd: prospectusDate,
        bookbuildingLabel: 'Prospectus',
        listingDate: parseDate(at(row, listingCol)),
        fundsRaisedHkd: parseNumber(at(row, fundsCol)),
        offerPriceHkd: parseNumber(at(row, priceCol)),
        companyPageUrl: HKEX_NEW_LISTING_MAIN_URL,
        source: 'listing-report',
      }),
    );
  }
  return entries;
}

/**
 * Application proof consolidated index: applicants without a listing date yet
 */
export function parseApplicationIndex(data: Buffer, board: string, source: string): CalendarEntry[] {
  const rows = readRows(data, source);
  const headerIdx = findHeaderRow(rows, ['Applicant']);
  if (headerIdx < 0) {
    throw new ParseError(`No Applicant header in application index ${source}`, source);
  }

  const header = rows[headerIdx];
  const dateCol = findColumn(header, ['Date of First Posting']);
  const applicantCol = findColumn(header, ['Applicant']);
  const statusCol = findColumn(header, ['Status']);
  if (dateCol === null || applicantCol === null) {
    throw new ParseError(`Missing posting date column in application index ${source}`, source);
  }

  const entries: CalendarEntry[] = [];
  for (const row of rows.slice(headerIdx + 1)) {
    const postingDate = parseDate(at(row, dateCol));
    const applicant = cellText(at(row, applicantCol));
    if (!applicant || !postingDate) continue;
    entries.push(
      createCalendarEntry({
        companyName: applicant,
        board,
        bookbuildingStart: postingDate,
        bookbuildingEnd: postingDate,
        bookbuildingLabel: 'Application proof',
        rawStatus: cellText(at(row, statusCol)) || null,
        companyPageUrl: HKEX_APPLICATION_PROOF_URL,
        source: 'application-proof',
      }),
    );
  }
  return entries;
}

// ---------------------------------------------------------------------------
// Legacy IPO calendar page
// ---------------------------------------------------------------------------

function pickString(node: Record<string, unknown>, keys: string[]): string | null {
  for (const key of keys) {
    const value = node[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return null;
}

function entryFromJson(node: Record<string, unknown>): CalendarEntry | null {
  const companyName = pickString(node, ['company', 'issuer', 'companyName', 'name']);
  if (!companyName) return null;

  let start = parseDate(pickString(node, ['bookbuildingStart', 'bookbuilding_start', 'offerStart']));
  let end = parseDate(pickString(node, ['bookbuildingEnd', 'bookbuilding_end', 'offerEnd']));
  const period = pickString(node, ['bookbuilding', 'offerPeriod']);
  if (!start && period) [start, end] = extractDateRange(period);

  return createCalendarEntry({
    companyName,
    stockCode: normalizeStockCode(pickString(node, ['stockCode', 'stock_code', 'code'])) || null,
    industry: pickString(node, ['industry', 'sector']),
    bookbuildingStart: start,
    bookbuildingEnd: end ?? start,
    listingDate: parseDate(pickString(node, ['listingDate', 'listing_date', 'tradeDate', 'trade_date'])),
    rawStatus: pickString(node, ['status']),
    companyPageUrl: pickString(node, ['url', 'companyUrl']),
    source: 'hkex-calendar',
  });
}

function looksLikeCalendarList(value: unknown): value is Record<string, unknown>[] {
  if (!Array.isArray(value) || value.length === 0 || !value.every(isRecord)) return false;
  const keys = Object.keys(value[0]).map((k) => k.toLowerCase());
  return keys.includes('company') || keys.includes('issuer') || keys.includes('listingdate');
}

function findCalendarList(payload: unknown): Record<string, unknown>[] | null {
  if (looksLikeCalendarList(payload)) return payload;
  if (Array.isArray(payload)) {
    for (const item of payload) {
      const nested = findCalendarList(item);
      if (nested) return nested;
    }
  } else if (isRecord(payload)) {
    for (const value of Object.values(payload)) {
      const nested = findCalendarList(value);
      if (nested) return nested;
    }
  }
  return null;
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function calendarFromScripts($: cheerio.CheerioAPI): CalendarEntry[] {
  const scripts = $('script')
    .map((_, el) => $(el).html() ?? '')
    .get();

  for (const text of scripts) {
    const lowered = text.toLowerCase();
    if (!lowered.includes('ipo') || !lowered.includes('calendar')) continue;

    const state = text.match(/__INITIAL_STATE__\s*=\s*(\{[\s\S]*\});/);
    if (state) {
      const list = findCalendarList(tryJson(state[1]));
      if (list) return list.map(entryFromJson).filter((e): e is CalendarEntry => e !== null);
    }

    for (const match of text.matchAll(/\[\{[\s\S]*?\}\]/g)) {
      const candidate = tryJson(match[0]);
      if (looksLikeCalendarList(candidate)) {
        return candidate.map(entryFromJson).filter((e): e is CalendarEntry => e !== null);
      }
    }
  }
  return [];
}

const HEADER_FIELDS = ['company', 'stockCode', 'bookbuilding', 'listingDate', 'industry'] as const;
type HeaderField = (typeof HEADER_FIELDS)[number];

const HEADER_MAP: Record<HeaderField, string[]> = {
  company: ['company', 'issuer', 'applicant', 'company name'],
  stockCode: ['stock code', 'code'],
  bookbuilding: ['bookbuilding', 'offer period', 'book building'],
  listingDate: ['listing date', 'trade date', 'listing'],
  industry: ['industry', 'sector'],
};

function calendarFromTables($: cheerio.CheerioAPI, pageUrl: string): CalendarEntry[] {
  const entries: CalendarEntry[] = [];

  $('table').each((_, table) => {
    const headers = $(table)
      .find('th')
      .map((__, th) => $(th).text().replace(/\s+/g, ' ').trim().toLowerCase())
      .get();
    if (headers.length === 0 || !headers.some((h) => h.includes('listing') || h.includes('trade'))) return;

    const columns = new Map<HeaderField, number>();
    for (const field of HEADER_FIELDS) {
      const idx = headers.findIndex((h) => HEADER_MAP[field].some((c) => h.includes(c)));
      if (idx >= 0) columns.set(field, idx);
    }

    $(table)
      .find('tr')
      .each((__, row) => {
        const cells = $(row).find('td');
        if (cells.length === 0) return;
        const texts = cells.map((___, c) => $(c).text().replace(/\s+/g, ' ').trim()).get();
        const text = (field: HeaderField): string => {
          const idx = columns.get(field);
          return idx !== undefined && idx < texts.length ? texts[idx] : '';
        };

        const companyIdx = columns.get('company') ?? 0;
        const companyName = texts[companyIdx] ?? '';
        if (!companyName) return;

        const href = $(cells[companyIdx]).find('a[href]').first().attr('href');
        const [start, end] = extractDateRange(text('bookbuilding'));

        entries.push(
          createCalendarEntry({
            companyName,
            stockCode: normalizeStockCode(text('stockCode')) || null,
            industry: text('industry') || null,
            bookbuildingStart: start,
            bookbuildingEnd: end,
            listingDate: extractFirstDate(text('listingDate')),
            companyPageUrl: href ? absoluteUrl(href, pageUrl) : null,
            source: 'hkex-calendar',
          }),
        );
      });
  });

  return entries;
}

/**
 * Legacy calendar page: embedded JSON state first, then listing tables.
 * A page with neither is an unrecognized structure.
 */
export function parseCalendarPage(html: string, pageUrl: string): CalendarEntry[] {
  const $ = cheerio.load(html);

  const fromScripts = calendarFromScripts($);
  if (fromScripts.length > 0) return fromScripts;

  if ($('table').length === 0) {
    throw new ParseError(`No calendar data or tables on ${pageUrl}`, pageUrl);
  }
  return calendarFromTables($, pageUrl);
}
