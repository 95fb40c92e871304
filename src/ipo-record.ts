/**
 * IpoRecord helpers: construction, status derivation, calendar ordering
 */

import { normalizeCompanyKey } from './name-normalizer.js';
import type { DataOrigin, IpoRecord, IpoStatus } from './types.js';

const WITHDRAWN_STATUS = /withdrawn|lapsed|returned|rejected/i;

type DatedFields = Pick<IpoRecord, 'bookbuildingStart' | 'bookbuildingEnd' | 'listingDate'>;

/**
 * Status relative to `today` (ISO). An HKEX withdrawal status wins over dates.
 */
export function deriveStatus(record: DatedFields, rawStatus: string | null, today: string): IpoStatus {
  if (rawStatus && WITHDRAWN_STATUS.test(rawStatus)) return 'withdrawn';
  if (record.listingDate && today >= record.listingDate) return 'listed';

  const start = record.bookbuildingStart;
  const end = record.bookbuildingEnd ?? start;
  if (start && end && today >= start && today <= end) return 'bookbuilding';

  return 'upcoming';
}

/**
 * Record with every optional field null
 */
export function createIpoRecord(companyName: string, dataOrigin: DataOrigin): IpoRecord {
  return {
    companyName,
    normalizedKey: normalizeCompanyKey(companyName),
    stockCode: null,
    industry: null,
    board: null,
    bookbuildingStart: null,
    bookbuildingEnd: null,
    bookbuildingLabel: 'Bookbuilding',
    listingDate: null,
    status: 'upcoming',
    applicationStatus: null,
    termSheetUrl: null,
    companyPageUrl: null,
    ipoValueUsd: null,
    raiseAmountUsd: null,
    offerPriceHkd: null,
    valuationMultiple: null,
    businessModel: null,
    financialTrend: null,
    filings: [],
    dataOrigin,
  };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * listingDate ascending, undated last; then companyName, normalizedKey
 */
export function compareRecords(a: IpoRecord, b: IpoRecord): number {
  if (a.listingDate !== b.listingDate) {
    if (a.listingDate === null) return 1;
    if (b.listingDate === null) return -1;
    return compareText(a.listingDate, b.listingDate);
  }
  return compareText(a.companyName, b.companyName) || compareText(a.normalizedKey, b.normalizedKey);
}

export function sortRecords(records: readonly IpoRecord[]): IpoRecord[] {
  return [...records].sort(compareRecords);
}
