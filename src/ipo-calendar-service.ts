/**
 * IPO Calendar Service
 *
 * Display-layer interface over the reconciliation engine. The last run is
 * cached for the configured TTL; concurrent callers share one in-flight run.
 */

import { eachDay } from './dates.js';
import { createLogger } from './logger.js';
import type { CalendarEvent, CalendarRun, IpoRecord } from './types.js';

const log = createLogger('CalendarService');

export interface CalendarRunner {
  reconcile(): Promise<CalendarRun>;
}

export interface CalendarSnapshot extends CalendarRun {
  fetchedAt: string;
}

interface CachedRun {
  snapshot: CalendarSnapshot;
  events: Map<string, CalendarEvent[]>;
  expiresAt: number;
}

export interface IpoCalendarServiceOptions {
  engine: CalendarRunner;
  ttlSeconds: number;
  now?: () => number;
}

/**
 * Date → events: one bookbuilding/application event per window day, one listing event
 */
export function buildEventIndex(records: readonly IpoRecord[]): Map<string, CalendarEvent[]> {
  const index = new Map<string, CalendarEvent[]>();
  const add = (event: CalendarEvent): void => {
    const list = index.get(event.date);
    if (list) list.push(event);
    else index.set(event.date, [event]);
  };

  for (const record of records) {
    const start = record.bookbuildingStart;
    const end = record.bookbuildingEnd ?? start;
    if (start && end) {
      const type = record.bookbuildingLabel === 'Application proof' ? 'application' : 'bookbuilding';
      for (const date of eachDay(start, end)) {
        add({ date, type, label: record.bookbuildingLabel, record });
      }
    }
    if (record.listingDate) {
      add({ date: record.listingDate, type: 'listing', label: 'Listing date', record });
    }
  }
  return index;
}

function windowContains(record: IpoRecord, date: string): boolean {
  const start = record.bookbuildingStart;
  const end = record.bookbuildingEnd ?? start;
  return start !== null && end !== null && start <= date && date <= end;
}

export class IpoCalendarService {
  private readonly engine: CalendarRunner;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private cached: CachedRun | null = null;
  private inflight: Promise<CachedRun> | null = null;

  constructor(options: IpoCalendarServiceOptions) {
    this.engine = options.engine;
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  async getSnapshot(): Promise<CalendarSnapshot> {
    return (await this.current()).snapshot;
  }

  /** Reconciled records in calendar order */
  async getCalendar(): Promise<IpoRecord[]> {
    return (await this.current()).snapshot.records;
  }

  /**
   * Records listing on `date` first, then records whose bookbuilding window holds it
   */
  async getRecordsForDate(date: string): Promise<IpoRecord[]> {
    const records = await this.getCalendar();
    const listing = records.filter((r) => r.listingDate === date);
    const windowed = records.filter((r) => r.listingDate !== date && windowContains(r, date));
    return [...listing, ...windowed];
  }

  async getRecord(date: string): Promise<IpoRecord | null> {
    const records = await this.getRecordsForDate(date);
    return records[0] ?? null;
  }

  async getRecordByKey(key: string): Promise<IpoRecord | null> {
    const records = await this.getCalendar();
    return records.find((r) => r.normalizedKey === key) ?? null;
  }

  async getEvents(date: string): Promise<CalendarEvent[]> {
    return (await this.current()).events.get(date) ?? [];
  }

  /** Drop the cache and run the pipeline now */
  async refresh(): Promise<CalendarSnapshot> {
    this.cached = null;
    return (await this.current()).snapshot;
  }

  private async current(): Promise<CachedRun> {
    if (this.cached && this.now() < this.cached.expiresAt) return this.cached;
    if (!this.inflight) {
      this.inflight = this.run().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async run(): Promise<CachedRun> {
    const started = this.now();
    const result = await this.engine.reconcile();
    const cached: CachedRun = {
      snapshot: { ...result, fetchedAt: new Date(started).toISOString() },
      events: buildEventIndex(result.records),
      expiresAt: started + this.ttlMs,
    };
    this.cached = cached;
    log.info(`Calendar refreshed: ${result.records.length} ${result.source} record(s), ${result.errors.length} error(s)`);
    return cached;
  }
}
