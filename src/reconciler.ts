/**
 * Reconciliation Engine
 *
 * One run per calendar refresh:
 * 1. Fetch the calendar (empty → the sample dataset, nothing else runs)
 * 2. Per live entry: seed + search filings, extract terms from the first PDF that yields any
 * 3. Overlay the override for the company, field by field
 * 4. Derive status against today (Hong Kong date)
 * 5. Tag the origin: override when any override field applied, else live
 *
 * Every collaborator and setting comes in through the constructor.
 */

import { orderWindow } from './dates.js';
import { dedupeFilings, rankFilings } from './filing-search.js';
import { convertToUsd } from './fx.js';
import { createIpoRecord, deriveStatus, sortRecords } from './ipo-record.js';
import { createLogger } from './logger.js';
import { normalizeCompanyKey } from './name-normalizer.js';
import { lookupOverride } from './override-store.js';
import { hasTerms } from './term-patterns.js';
import { mapWithConcurrency } from './worker-pool.js';
import type {
  CalendarEntry,
  CalendarFetchReport,
  CalendarRun,
  ExtractedTerms,
  Filing,
  IpoRecord,
  OverrideFields,
  OverrideMap,
} from './types.js';

const log = createLogger('Reconciler');

export interface CalendarProvider {
  fetchCalendarReport(): Promise<CalendarFetchReport>;
}

export interface FilingSearcher {
  searchFilings(companyName: string): Promise<Filing[]>;
}

export interface TermSource {
  extractTerms(filing: Filing): Promise<ExtractedTerms>;
}

export interface SampleProvider {
  load(): IpoRecord[];
}

export interface ReconciliationOptions {
  calendar: CalendarProvider;
  sample: SampleProvider;
  /** null disables filing search and term extraction */
  filingSearch: FilingSearcher | null;
  termExtractor: TermSource | null;
  /** Called once per run; a ConfigError here aborts the run */
  loadOverrides: () => OverrideMap;
  hkdUsdRate: number;
  maxFilings: number;
  concurrency: number;
  /** Today as an ISO date */
  today: () => string;
  useLive?: boolean;
}

const TERM_SHEET_TITLES = [
  'prospectus',
  'application proof',
  'hearing information pack',
  'term sheet',
  'offering circular',
];

export function isTermSheetLike(filing: Filing): boolean {
  const title = filing.title.toLowerCase();
  return TERM_SHEET_TITLES.some((keyword) => title.includes(keyword));
}

export function isPdfUrl(url: string): boolean {
  return url.toLowerCase().split(/[?#]/)[0].endsWith('.pdf');
}

/**
 * PDF filings to try, term-sheet-like titles first, otherwise in the given order
 */
export function extractionCandidates(filings: readonly Filing[]): Filing[] {
  const pdfs = filings.filter((f) => isPdfUrl(f.url));
  return [...pdfs.filter(isTermSheetLike), ...pdfs.filter((f) => !isTermSheetLike(f))];
}

/**
 * Filings known from the listing page itself, before any search
 */
export function seedFilings(entry: CalendarEntry): Filing[] {
  const seeded: Filing[] = [];
  const prospectusDate = entry.bookbuildingStart;
  if (entry.announcementUrl) {
    seeded.push({ title: 'New listing announcement', url: entry.announcementUrl, publishedDate: prospectusDate, source: 'hkexnews' });
  }
  if (entry.prospectusUrl) {
    seeded.push({ title: 'Prospectus', url: entry.prospectusUrl, publishedDate: prospectusDate, source: 'hkexnews' });
  }
  if (entry.allotmentUrl) {
    seeded.push({ title: 'Allotment results', url: entry.allotmentUrl, publishedDate: entry.listingDate, source: 'hkexnews' });
  }
  return seeded;
}

/**
 * One entry per normalized key: first entry wins, its gaps filled from later ones
 */
export function mergeEntries(entries: readonly CalendarEntry[]): CalendarEntry[] {
  const merged = new Map<string, CalendarEntry>();
  for (const entry of entries) {
    const key = normalizeCompanyKey(entry.companyName);
    if (!key) continue;
    const first = merged.get(key);
    merged.set(key, first ? fillMissing(first, entry) : entry);
  }
  return [...merged.values()];
}

function fillMissing(a: CalendarEntry, b: CalendarEntry): CalendarEntry {
  const [start, end, listing] = orderWindow(
    a.bookbuildingStart ?? b.bookbuildingStart,
    a.bookbuildingEnd ?? b.bookbuildingEnd,
    a.listingDate ?? b.listingDate,
  );
  return {
    ...a,
    stockCode: a.stockCode ?? b.stockCode,
    industry: a.industry ?? b.industry,
    board: a.board ?? b.board,
    bookbuildingStart: start,
    bookbuildingEnd: end,
    listingDate: listing,
    rawStatus: a.rawStatus ?? b.rawStatus,
    fundsRaisedHkd: a.fundsRaisedHkd ?? b.fundsRaisedHkd,
    offerPriceHkd: a.offerPriceHkd ?? b.offerPriceHkd,
    companyPageUrl: a.companyPageUrl ?? b.companyPageUrl,
    announcementUrl: a.announcementUrl ?? b.announcementUrl,
    prospectusUrl: a.prospectusUrl ?? b.prospectusUrl,
    allotmentUrl: a.allotmentUrl ?? b.allotmentUrl,
  };
}

/**
 * Present override fields replace the record's; returns whether any applied
 */
export function applyOverride(record: IpoRecord, override: OverrideFields | undefined): [IpoRecord, boolean] {
  if (!override) return [record, false];
  const next: IpoRecord = { ...record };
  let applied = false;

  if (override.companyName !== undefined) { next.companyName = override.companyName; applied = true; }
  if (override.stockCode !== undefined) { next.stockCode = override.stockCode; applied = true; }
  if (override.industry !== undefined) { next.industry = override.industry; applied = true; }
  if (override.bookbuildingStart !== undefined) { next.bookbuildingStart = override.bookbuildingStart; applied = true; }
  if (override.bookbuildingEnd !== undefined) { next.bookbuildingEnd = override.bookbuildingEnd; applied = true; }
  if (override.listingDate !== undefined) { next.listingDate = override.listingDate; applied = true; }
  if (override.termSheetUrl !== undefined) { next.termSheetUrl = override.termSheetUrl; applied = true; }
  if (override.companyPageUrl !== undefined) { next.companyPageUrl = override.companyPageUrl; applied = true; }
  if (override.ipoValueUsd !== undefined) { next.ipoValueUsd = override.ipoValueUsd; applied = true; }
  if (override.raiseAmountUsd !== undefined) { next.raiseAmountUsd = override.raiseAmountUsd; applied = true; }
  if (override.offerPriceHkd !== undefined) { next.offerPriceHkd = override.offerPriceHkd; applied = true; }
  if (override.valuationMultiple !== undefined) { next.valuationMultiple = override.valuationMultiple; applied = true; }
  if (override.businessModel !== undefined) { next.businessModel = override.businessModel; applied = true; }
  if (override.financialTrend !== undefined) { next.financialTrend = override.financialTrend; applied = true; }
  if (override.filings !== undefined) { next.filings = [...override.filings]; applied = true; }

  return [next, applied];
}

export class ReconciliationEngine {
  constructor(private readonly options: ReconciliationOptions) {}

  async reconcile(): Promise<CalendarRun> {
    const { calendar, sample, useLive = true } = this.options;
    const overrides = this.options.loadOverrides();
    const today = this.options.today();

    const report: CalendarFetchReport = useLive
      ? await calendar.fetchCalendarReport()
      : { entries: [], source: 'none', errors: [] };

    if (report.entries.length === 0) {
      const records = sample.load();
      log.info(`Live calendar empty, serving ${records.length} sample record(s)`);
      return { source: 'sample', errors: report.errors, records };
    }

    const entries = mergeEntries(report.entries);
    log.info(`Reconciling ${entries.length} entries from ${report.source}`);
    const records = await mapWithConcurrency(entries, this.options.concurrency, (entry) =>
      this.resolveEntry(entry, overrides, today),
    );

    return { source: 'live', errors: report.errors, records: sortRecords(records) };
  }

  private async resolveEntry(entry: CalendarEntry, overrides: OverrideMap, today: string): Promise<IpoRecord> {
    const override = lookupOverride(overrides, entry.companyName, entry.stockCode);
    const filings = override?.filings ? [...override.filings] : await this.resolveFilings(entry);
    const [terms, yielding] = await this.extract(filings);

    const termSheet = yielding ?? filings.find(isTermSheetLike) ?? null;
    const fundsRaisedUsd =
      entry.fundsRaisedHkd !== null && entry.fundsRaisedHkd > 0
        ? convertToUsd(entry.fundsRaisedHkd, 'HKD', this.options.hkdUsdRate)
        : null;

    const live: IpoRecord = {
      ...createIpoRecord(entry.companyName, 'live'),
      stockCode: entry.stockCode,
      industry: entry.industry,
      board: entry.board,
      bookbuildingStart: entry.bookbuildingStart,
      bookbuildingEnd: entry.bookbuildingEnd,
      bookbuildingLabel: entry.bookbuildingLabel,
      listingDate: entry.listingDate,
      applicationStatus: entry.rawStatus,
      termSheetUrl: termSheet?.url ?? entry.prospectusUrl ?? filings[0]?.url ?? null,
      companyPageUrl: entry.companyPageUrl,
      ipoValueUsd: terms.ipoValueUsd ?? null,
      raiseAmountUsd: terms.raiseAmountUsd ?? fundsRaisedUsd,
      offerPriceHkd: entry.offerPriceHkd ?? terms.offerPriceHkd ?? null,
      valuationMultiple: terms.valuationMultiple ?? null,
      businessModel: terms.businessModel ?? null,
      financialTrend: terms.financialTrend ?? null,
      filings,
    };

    const [record, applied] = applyOverride(live, override);
    return {
      ...record,
      status: deriveStatus(record, entry.rawStatus, today),
      dataOrigin: applied ? 'override' : 'live',
    };
  }

  private async resolveFilings(entry: CalendarEntry): Promise<Filing[]> {
    const searched = this.options.filingSearch ? await this.options.filingSearch.searchFilings(entry.companyName) : [];
    return rankFilings(dedupeFilings([...seedFilings(entry), ...searched])).slice(0, this.options.maxFilings);
  }

  /**
   * Terms from the first candidate yielding any field, and that candidate
   */
  private async extract(filings: Filing[]): Promise<[ExtractedTerms, Filing | null]> {
    const extractor = this.options.termExtractor;
    if (!extractor) return [{}, null];
    for (const candidate of extractionCandidates(filings)) {
      const terms = await extractor.extractTerms(candidate);
      if (hasTerms(terms)) return [terms, candidate];
    }
    return [{}, null];
  }
}
