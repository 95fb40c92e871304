import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { createCalendarRouter } from './calendar-api.js';
import type { IpoCalendarService } from './ipo-calendar-service.js';

export function createApp(service: IpoCalendarService): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // IPO calendar routes
  app.use('/api/ipo', createCalendarRouter(service));

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', service: 'hk-ipo-calendar' });
  });

  return app;
}
