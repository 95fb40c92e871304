/**
 * IPO Calendar API Routes
 *
 * Read endpoints over the calendar service, mounted at /api/ipo
 */

import { Router, Request, Response } from 'express';
import { parseDate } from './dates.js';
import { createLogger } from './logger.js';
import type { CalendarSnapshot, IpoCalendarService } from './ipo-calendar-service.js';

const log = createLogger('CalendarAPI');

function calendarPayload(snapshot: CalendarSnapshot) {
  return {
    source: snapshot.source,
    fetchedAt: snapshot.fetchedAt,
    errors: snapshot.errors,
    count: snapshot.records.length,
    records: snapshot.records,
  };
}

function isoDateParam(value: string): string | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  return parseDate(value) === value ? value : null;
}

export function createCalendarRouter(service: IpoCalendarService): Router {
  const router = Router();

  /**
   * GET /api/ipo/calendar
   * Reconciled records in listing-date order
   */
  router.get('/calendar', async (_req: Request, res: Response) => {
    try {
      res.json(calendarPayload(await service.getSnapshot()));
    } catch (err) {
      log.error('Calendar error:', err);
      res.status(500).json({ error: 'Failed to build IPO calendar' });
    }
  });

  /**
   * GET /api/ipo/calendar/:date
   * Record(s) and events for one day (YYYY-MM-DD)
   */
  router.get('/calendar/:date', async (req: Request, res: Response) => {
    const date = isoDateParam(req.params.date);
    if (!date) {
      res.status(400).json({ error: 'Date must be YYYY-MM-DD' });
      return;
    }
    try {
      const records = await service.getRecordsForDate(date);
      res.json({
        date,
        record: records[0] ?? null,
        records,
        events: await service.getEvents(date),
      });
    } catch (err) {
      log.error('Calendar date error:', err);
      res.status(500).json({ error: 'Failed to build IPO calendar' });
    }
  });

  /**
   * GET /api/ipo/records/:key
   * One record by normalized key
   */
  router.get('/records/:key', async (req: Request, res: Response) => {
    try {
      const record = await service.getRecordByKey(req.params.key);
      if (!record) {
        res.status(404).json({ error: 'IPO not found' });
        return;
      }
      res.json(record);
    } catch (err) {
      log.error('Record error:', err);
      res.status(500).json({ error: 'Failed to fetch IPO record' });
    }
  });

  /**
   * POST /api/ipo/refresh
   * Rebuild the calendar now, bypassing the cache
   */
  router.post('/refresh', async (_req: Request, res: Response) => {
    try {
      res.json(calendarPayload(await service.refresh()));
    } catch (err) {
      log.error('Refresh error:', err);
      res.status(500).json({ error: 'Failed to refresh IPO calendar' });
    }
  });

  return router;
}
