/**
 * Wires configuration into the pipeline components
 */

import type { AxiosAdapter } from 'axios';
import type { AppConfig } from './config.js';
import { CalendarSource } from './calendar-source.js';
import { hongKongDate } from './dates.js';
import { FilingSearch } from './filing-search.js';
import { createHttpClient } from './http.js';
import { IpoCalendarService } from './ipo-calendar-service.js';
import { loadOverrides } from './override-store.js';
import { PdfTextReader, readPdfText } from './pdf-text.js';
import { ReconciliationEngine } from './reconciler.js';
import { SampleFallbackProvider } from './sample-calendar.js';
import { TermExtractor } from './term-extractor.js';

export interface PipelineDeps {
  adapter?: AxiosAdapter;
  readPdfText?: PdfTextReader;
  clock?: () => Date;
  sample?: SampleFallbackProvider;
}

function todayFrom(deps: PipelineDeps): () => string {
  const clock = deps.clock ?? (() => new Date());
  return () => hongKongDate(clock());
}

export function createSampleProvider(config: AppConfig, deps: PipelineDeps = {}): SampleFallbackProvider {
  return new SampleFallbackProvider({ path: config.samplePath, today: todayFrom(deps) });
}

export function createEngine(config: AppConfig, deps: PipelineDeps = {}): ReconciliationEngine {
  const http = createHttpClient({ timeoutMs: config.requestTimeoutMs, adapter: deps.adapter });
  const today = todayFrom(deps);

  return new ReconciliationEngine({
    calendar: new CalendarSource({ http, calendarUrl: config.calendarUrl }),
    sample: deps.sample ?? createSampleProvider(config, deps),
    filingSearch: config.fetchFilings ? new FilingSearch({ http, today }) : null,
    termExtractor: config.fetchFilings
      ? new TermExtractor({
          http,
          readPdfText: deps.readPdfText ?? readPdfText,
          hkdUsdRate: config.hkdUsdRate,
          maxPdfBytes: config.maxPdfBytes,
          maxPages: config.pdfMaxPages,
        })
      : null,
    loadOverrides: () => loadOverrides(config.overridesPath),
    hkdUsdRate: config.hkdUsdRate,
    maxFilings: config.maxFilings,
    concurrency: config.extractConcurrency,
    today,
    useLive: config.useLive,
  });
}

export function createCalendarService(config: AppConfig, deps: PipelineDeps = {}): IpoCalendarService {
  return new IpoCalendarService({
    engine: createEngine(config, deps),
    ttlSeconds: config.cacheTtlSeconds,
  });
}
