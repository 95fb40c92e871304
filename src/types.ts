/**
 * Shared types for the IPO calendar pipeline
 */

export type IpoStatus = 'upcoming' | 'bookbuilding' | 'listed' | 'withdrawn';

export type DataOrigin = 'live' | 'override' | 'sample';

export type CalendarEntrySource = 'listing-report' | 'application-proof' | 'hkex-calendar';

export type Currency = 'HKD' | 'USD';

export interface Filing {
  readonly title: string;
  readonly url: string;
  readonly publishedDate: string | null;  // ISO date (YYYY-MM-DD)
  readonly source: string;                // e.g. "manual", "hkexnews", "servlet"
}

/**
 * Partial record straight off the calendar sources, before filings/terms/overrides
 */
export interface CalendarEntry {
  companyName: string;
  stockCode: string | null;
  industry: string | null;
  board: string | null;
  bookbuildingStart: string | null;
  bookbuildingEnd: string | null;
  bookbuildingLabel: string;
  listingDate: string | null;
  rawStatus: string | null;
  fundsRaisedHkd: number | null;
  offerPriceHkd: number | null;
  companyPageUrl: string | null;
  announcementUrl: string | null;
  prospectusUrl: string | null;
  allotmentUrl: string | null;
  source: CalendarEntrySource;
}

export interface IpoRecord {
  companyName: string;
  normalizedKey: string;
  stockCode: string | null;
  industry: string | null;
  board: string | null;
  bookbuildingStart: string | null;
  bookbuildingEnd: string | null;
  bookbuildingLabel: string;
  listingDate: string | null;
  status: IpoStatus;
  applicationStatus: string | null;
  termSheetUrl: string | null;
  companyPageUrl: string | null;
  ipoValueUsd: number | null;
  raiseAmountUsd: number | null;
  offerPriceHkd: number | null;
  valuationMultiple: string | null;
  businessModel: string | null;
  financialTrend: string | null;
  filings: Filing[];
  dataOrigin: DataOrigin;
}

/**
 * Deal terms recovered from a filing; every field independently optional
 */
export interface ExtractedTerms {
  raiseAmountUsd?: number;
  ipoValueUsd?: number;
  offerPriceHkd?: number;
  valuationMultiple?: string;
  businessModel?: string;
  financialTrend?: string;
}

/**
 * Fields an override entry may replace. Present keys win, `null` clears.
 */
export interface OverrideFields {
  companyName?: string;
  stockCode?: string | null;
  industry?: string | null;
  bookbuildingStart?: string | null;
  bookbuildingEnd?: string | null;
  listingDate?: string | null;
  termSheetUrl?: string | null;
  companyPageUrl?: string | null;
  ipoValueUsd?: number | null;
  raiseAmountUsd?: number | null;
  offerPriceHkd?: number | null;
  valuationMultiple?: string | null;
  businessModel?: string | null;
  financialTrend?: string | null;
  filings?: Filing[];
}

export type OverrideMap = ReadonlyMap<string, OverrideFields>;

export interface CalendarFetchReport {
  entries: CalendarEntry[];
  source: CalendarEntrySource | 'none';
  errors: string[];
}

export interface CalendarRun {
  source: 'live' | 'sample';
  errors: string[];
  records: IpoRecord[];
}

export type CalendarEventType = 'bookbuilding' | 'application' | 'listing';

export interface CalendarEvent {
  date: string;
  type: CalendarEventType;
  label: string;
  record: IpoRecord;
}
