/**
 * Calendar Source
 *
 * Raw IPO list from HKEX, best effort:
 * 1. New Listing Report workbooks, enriched with the documents table (by stock code)
 * 2. Application proof indexes (Main Board + GEM)
 * 3. Legacy IPO calendar page, only when 1 and 2 together found nothing
 *
 * A source that fails is recorded in `errors` and skipped. Total failure is an
 * empty entry list, never a throw.
 */

import type { AxiosInstance } from 'axios';
import {
  parseApplicationIndex,
  parseCalendarPage,
  parseListingReport,
  parseListingReportLinks,
  parseNewListingDocuments,
} from './calendar-parsers.js';
import { errorMessage, isRecoverable, NetworkError, ParseError } from './errors.js';
import { fetchBytes, fetchText } from './http.js';
import {
  calendarPageUrls,
  HKEX_APPLICATION_INDEX_URLS,
  HKEX_NEW_LISTING_MAIN_URL,
} from './hkex-endpoints.js';
import { createLogger } from './logger.js';
import type { CalendarEntry, CalendarFetchReport } from './types.js';

const log = createLogger('CalendarSource');

// Workbooks are a few hundred KB; this only guards against a runaway body
const MAX_WORKBOOK_BYTES = 20_000_000;

export interface CalendarSourceOptions {
  http: AxiosInstance;
  calendarUrl: string | null;
}

export class CalendarSource {
  private readonly http: AxiosInstance;
  private readonly calendarUrl: string | null;

  constructor(options: CalendarSourceOptions) {
    this.http = options.http;
    this.calendarUrl = options.calendarUrl;
  }

  async fetchCalendar(): Promise<CalendarEntry[]> {
    const report = await this.fetchCalendarReport();
    return report.entries;
  }

  async fetchCalendarReport(): Promise<CalendarFetchReport> {
    const errors: string[] = [];

    const listed = await this.attempt('HKEX new listing report', errors, () => this.fetchListingReports(errors));
    const applications = await this.attempt('HKEX application proof', errors, () =>
      this.fetchApplicationProofs(errors),
    );

    const entries = [...listed, ...applications];
    if (entries.length > 0) {
      log.info(`${listed.length} listing report + ${applications.length} application proof entries`);
      return { entries, source: listed.length > 0 ? 'listing-report' : 'application-proof', errors };
    }

    const legacy = await this.attempt('HKEX calendar', errors, () => this.fetchCalendarPage());
    if (legacy.length > 0) {
      log.info(`${legacy.length} entries from the HKEX calendar page`);
      return { entries: legacy, source: 'hkex-calendar', errors };
    }

    log.warn(`No live calendar entries (${errors.length} source error(s))`);
    return { entries: [], source: 'none', errors };
  }

  private async attempt(
    label: string,
    errors: string[],
    load: () => Promise<CalendarEntry[]>,
  ): Promise<CalendarEntry[]> {
    try {
      return await load();
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      const message = `${label} fetch failed: ${errorMessage(error)}`;
      log.warn(message);
      errors.push(message);
      return [];
    }
  }

  private async fetchListingReports(errors: string[]): Promise<CalendarEntry[]> {
    const html = await fetchText(this.http, HKEX_NEW_LISTING_MAIN_URL);
    const reportLinks = parseListingReportLinks(html);
    if (reportLinks.length === 0) {
      throw new ParseError('No New Listing Report links on the new listing page', HKEX_NEW_LISTING_MAIN_URL);
    }
    const documents = parseNewListingDocuments(html);

    const entries: CalendarEntry[] = [];
    for (const link of reportLinks) {
      // one bad year does not discard the others
      entries.push(...(await this.attempt(`Listing report ${link}`, errors, async () => {
        const data = await fetchBytes(this.http, link, MAX_WORKBOOK_BYTES);
        return parseListingReport(data, link);
      })));
    }

    return entries.map((entry) => {
      const docs = entry.stockCode ? documents.get(entry.stockCode) : undefined;
      if (!docs) return entry;
      return {
        ...entry,
        companyName: entry.companyName || docs.companyName,
        announcementUrl: docs.announcementUrl,
        prospectusUrl: docs.prospectusUrl,
        allotmentUrl: docs.allotmentUrl,
        companyPageUrl: docs.prospectusUrl ?? docs.announcementUrl ?? entry.companyPageUrl,
      };
    });
  }

  private async fetchApplicationProofs(errors: string[]): Promise<CalendarEntry[]> {
    const entries: CalendarEntry[] = [];
    for (const { board, url } of HKEX_APPLICATION_INDEX_URLS) {
      entries.push(...(await this.attempt(`${board} application index`, errors, async () => {
        const data = await fetchBytes(this.http, url, MAX_WORKBOOK_BYTES);
        return parseApplicationIndex(data, board, url);
      })));
    }
    return entries;
  }

  private async fetchCalendarPage(): Promise<CalendarEntry[]> {
    let lastError: NetworkError | ParseError | null = null;
    for (const url of calendarPageUrls(this.calendarUrl)) {
      try {
        const html = await fetchText(this.http, url);
        const entries = parseCalendarPage(html, url);
        if (entries.length > 0) return entries;
        lastError = new ParseError(`HKEX calendar returned empty data from ${url}`, url);
      } catch (error) {
        if (!isRecoverable(error)) throw error;
        lastError = error;
      }
    }
    if (lastError) throw lastError;
    return [];
  }
}
