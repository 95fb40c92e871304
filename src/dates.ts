/**
 * Calendar date helpers. Dates travel through the pipeline as ISO strings
 * (YYYY-MM-DD) so they compare lexically and serialize unchanged.
 */

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, sept: 9, oct: 10, nov: 11, dec: 12,
};

const DAY_MS = 86_400_000;

// Excel day 0 (serial dates in the HKEX workbooks)
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);

const TEXT_DATE = /\d{1,2}\s+[A-Za-z]{3,9}\.?,?\s+\d{4}/;

export function toIsoDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (year < 1900 || year > 2200 || month < 1 || month > 12 || day < 1) return null;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (candidate.getUTCMonth() !== month - 1) return null;  // 31 Feb etc.
  return candidate.toISOString().slice(0, 10);
}

function monthFromName(name: string): number | null {
  const key = name.toLowerCase().replace(/\.$/, '');
  return MONTHS[key] ?? MONTHS[key.slice(0, 3)] ?? null;
}

export function excelSerialToIso(serial: number): string | null {
  if (!Number.isFinite(serial) || serial < 1) return null;
  const ms = EXCEL_EPOCH_MS + Math.floor(serial) * DAY_MS;
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Parse the date shapes HKEX pages and workbooks use. Day-first for slashes.
 */
export function parseDate(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  }
  if (typeof value === 'number') {
    return excelSerialToIso(value);
  }

  const text = String(value).trim();
  if (!text) return null;

  // 2025-01-12, 2025-01-12T10:00:00Z, 2025/01/12
  let m = text.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})/);
  if (m) return toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  // 12/01/2025, 12-01-2025, 12/01/2025 22:30
  m = text.match(/^(\d{1,2})[/\-.](\d{1,2})[/\-.](\d{4})/);
  if (m) return toIsoDate(Number(m[3]), Number(m[2]), Number(m[1]));

  // 20250112
  m = text.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (m) return toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  // 12 Jan 2025, 12 January, 2025
  m = text.match(/^(\d{1,2})\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})/);
  if (m) {
    const month = monthFromName(m[2]);
    return month ? toIsoDate(Number(m[3]), month, Number(m[1])) : null;
  }

  // Jan 12, 2025
  m = text.match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})/);
  if (m) {
    const month = monthFromName(m[1]);
    return month ? toIsoDate(Number(m[3]), month, Number(m[2])) : null;
  }

  return null;
}

/**
 * Bookbuilding window from free text: "12-15 Jan 2025", "12 Jan 2025 - 15 Jan 2025",
 * or a single date (start = end).
 */
export function extractDateRange(text: string | null | undefined): [string | null, string | null] {
  if (!text) return [null, null];

  const compact = text.match(/(?<!\d)(\d{1,2})\s*-\s*(\d{1,2})\s+([A-Za-z]{3,9})\s+(\d{4})/);
  if (compact) {
    const start = parseDate(`${compact[1]} ${compact[3]} ${compact[4]}`);
    const end = parseDate(`${compact[2]} ${compact[3]} ${compact[4]}`);
    if (start && end) return [start, end];
  }

  const dates = (text.match(new RegExp(TEXT_DATE.source, 'g')) || [])
    .map((d) => parseDate(d))
    .filter((d): d is string => d !== null);

  if (dates.length >= 2) return [dates[0], dates[1]];
  if (dates.length === 1) return [dates[0], dates[0]];

  const slashed = (text.match(/\d{1,2}\/\d{1,2}\/\d{4}/g) || [])
    .map((d) => parseDate(d))
    .filter((d): d is string => d !== null);
  if (slashed.length >= 2) return [slashed[0], slashed[1]];
  if (slashed.length === 1) return [slashed[0], slashed[0]];

  return [null, null];
}

export function extractFirstDate(text: string | null | undefined): string | null {
  if (!text) return null;
  const textual = text.match(TEXT_DATE);
  if (textual) return parseDate(textual[0]);
  const slashed = text.match(/\d{1,2}\/\d{1,2}\/\d{4}/);
  if (slashed) return parseDate(slashed[0]);
  return parseDate(text);
}

/**
 * Calendar date in Hong Kong for the given instant
 */
export function hongKongDate(now: Date): string {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone: 'Asia/Hong_Kong',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

function isoParts(iso: string): [number, number, number] {
  const [y, m, d] = iso.split('-').map(Number);
  return [y, m, d];
}

export function addDays(iso: string, days: number): string {
  const [y, m, d] = isoParts(iso);
  return new Date(Date.UTC(y, m - 1, d) + days * DAY_MS).toISOString().slice(0, 10);
}

export function addMonths(iso: string, months: number): string {
  const [y, m, d] = isoParts(iso);
  const total = y * 12 + (m - 1) + months;
  const year = Math.floor(total / 12);
  const month = (total % 12) + 1;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return toIsoDate(year, month, Math.min(d, lastDay)) ?? iso;
}

export function monthIndex(iso: string): number {
  const [y, m] = isoParts(iso);
  return y * 12 + m;
}

/**
 * Every date from start to end inclusive
 */
export function eachDay(start: string, end: string): string[] {
  const days: string[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    days.push(current);
  }
  return days;
}

/**
 * Enforce bookbuildingStart <= bookbuildingEnd <= listingDate where present:
 * a reversed window is swapped, a window past the listing date is clamped to it.
 */
export function orderWindow(
  start: string | null,
  end: string | null,
  listing: string | null,
): [string | null, string | null, string | null] {
  let s = start;
  let e = end;
  if (s && e && s > e) [s, e] = [e, s];
  if (listing) {
    if (e && e > listing) e = listing;
    if (s && s > listing) s = listing;
  }
  return [s, e, listing];
}
