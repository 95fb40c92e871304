/**
 * Sample Fallback Provider
 *
 * Static calendar shipped in data/sample-ipo-calendar.json, used whenever the
 * live calendar comes back empty. Dates are moved forward by whole months when
 * the newest sample date is more than 60 days old, so the earliest sample month
 * becomes the current month. A missing file is an empty sample; a file that
 * exists but does not validate is a ConfigError.
 */

import fs from 'fs';
import { z } from 'zod';
import { addDays, addMonths, monthIndex } from './dates.js';
import { ConfigError, errorMessage } from './errors.js';
import { createIpoRecord, deriveStatus, sortRecords } from './ipo-record.js';
import { createLogger } from './logger.js';
import { describeIssue, FilingSchema, isoDate, stockCode } from './schemas.js';
import type { IpoRecord } from './types.js';

const log = createLogger('SampleCalendar');

const STALE_AFTER_DAYS = 60;

const SampleEntrySchema = z.object({
  company_name: z.string().min(1),
  stock_code: stockCode.nullable().optional(),
  industry: z.string().nullable().optional(),
  board: z.string().nullable().optional(),
  bookbuilding_start: isoDate.nullable().optional(),
  bookbuilding_end: isoDate.nullable().optional(),
  bookbuilding_label: z.string().optional(),
  listing_date: isoDate.nullable().optional(),
  application_status: z.string().nullable().optional(),
  term_sheet_url: z.string().nullable().optional(),
  company_page_url: z.string().nullable().optional(),
  ipo_value_usd: z.number().nullable().optional(),
  raise_amount_usd: z.number().nullable().optional(),
  offer_price_hkd: z.number().nullable().optional(),
  valuation_multiple: z.string().nullable().optional(),
  business_model: z.string().nullable().optional(),
  financial_trend: z.string().nullable().optional(),
  filings: z.array(FilingSchema).optional(),
});

const SampleFileSchema = z.object({ records: z.array(SampleEntrySchema) });

type SampleEntry = z.infer<typeof SampleEntrySchema>;

function toRecord(entry: SampleEntry): IpoRecord {
  const record = createIpoRecord(entry.company_name, 'sample');
  return {
    ...record,
    stockCode: entry.stock_code ?? null,
    industry: entry.industry ?? null,
    board: entry.board ?? null,
    bookbuildingStart: entry.bookbuilding_start ?? null,
    bookbuildingEnd: entry.bookbuilding_end ?? null,
    bookbuildingLabel: entry.bookbuilding_label ?? record.bookbuildingLabel,
    listingDate: entry.listing_date ?? null,
    applicationStatus: entry.application_status ?? null,
    termSheetUrl: entry.term_sheet_url ?? null,
    companyPageUrl: entry.company_page_url ?? null,
    ipoValueUsd: entry.ipo_value_usd ?? null,
    raiseAmountUsd: entry.raise_amount_usd ?? null,
    offerPriceHkd: entry.offer_price_hkd ?? null,
    valuationMultiple: entry.valuation_multiple ?? null,
    businessModel: entry.business_model ?? null,
    financialTrend: entry.financial_trend ?? null,
    filings: entry.filings ?? [],
  };
}

function sampleDates(records: IpoRecord[]): string[] {
  return records
    .flatMap((r) => [r.bookbuildingStart, r.bookbuildingEnd, r.listingDate])
    .filter((d): d is string => d !== null)
    .sort();
}

/**
 * Whole months to add so that a stale sample starts in the current month
 */
export function sampleShiftMonths(records: IpoRecord[], today: string): number {
  const dates = sampleDates(records);
  if (dates.length === 0) return 0;
  const earliest = dates[0];
  const latest = dates[dates.length - 1];
  if (latest >= addDays(today, -STALE_AFTER_DAYS)) return 0;
  return monthIndex(today) - monthIndex(earliest);
}

function shift(date: string | null, months: number): string | null {
  return date ? addMonths(date, months) : null;
}

export interface SampleFallbackOptions {
  path: string;
  today: () => string;
}

export class SampleFallbackProvider {
  private entries: SampleEntry[] | null = null;

  constructor(private readonly options: SampleFallbackOptions) {}

  /**
   * Read and validate the file now; later loads reuse the result
   */
  preload(): number {
    return this.read().length;
  }

  /**
   * Sample records, date-shifted, status derived, in calendar order
   */
  load(): IpoRecord[] {
    const today = this.options.today();
    const records = this.read().map(toRecord);
    const months = sampleShiftMonths(records, today);
    if (months > 0) log.info(`Sample calendar is stale, shifting by ${months} month(s)`);

    return sortRecords(
      records.map((r) => {
        const shifted = {
          ...r,
          bookbuildingStart: shift(r.bookbuildingStart, months),
          bookbuildingEnd: shift(r.bookbuildingEnd, months),
          listingDate: shift(r.listingDate, months),
        };
        return { ...shifted, status: deriveStatus(shifted, shifted.applicationStatus, today) };
      }),
    );
  }

  private read(): SampleEntry[] {
    if (this.entries) return this.entries;

    const { path } = this.options;
    let content: string;
    try {
      content = fs.readFileSync(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        log.warn(`No sample calendar at ${path}`);
        this.entries = [];
        return this.entries;
      }
      throw new ConfigError(`Cannot load sample calendar ${path}: ${errorMessage(error)}`, path, { cause: error });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Malformed JSON in sample calendar ${path}: ${errorMessage(error)}`, path, { cause: error });
    }
    const parsed = SampleFileSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ConfigError(`Invalid sample calendar ${path}: ${describeIssue(parsed.error)}`, path);
    }
    this.entries = parsed.data.records;
    return this.entries;
  }
}
