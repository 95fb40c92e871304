import 'dotenv/config';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  HKEX_IPO_CALENDAR_URL: z.string().trim().optional(),
  FX_HKD_USD: z.coerce.number().positive().default(1 / 7.8),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(25_000),
  MAX_PDF_BYTES: z.coerce.number().int().positive().default(12_000_000),
  PDF_MAX_PAGES: z.coerce.number().int().positive().default(5),
  MAX_FILINGS: z.coerce.number().int().positive().default(6),
  EXTRACT_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  OVERRIDES_PATH: z.string().default('data/overrides.json'),
  SAMPLE_CALENDAR_PATH: z.string().default('data/sample-ipo-calendar.json'),
  CALENDAR_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(1800),
  PORT: z.coerce.number().int().positive().default(8080),
  USE_LIVE: booleanFlag.default('true'),
  FETCH_FILINGS: booleanFlag.default('true'),
});

export interface AppConfig {
  calendarUrl: string | null;
  hkdUsdRate: number;
  requestTimeoutMs: number;
  maxPdfBytes: number;
  pdfMaxPages: number;
  maxFilings: number;
  extractConcurrency: number;
  overridesPath: string;
  samplePath: string;
  cacheTtlSeconds: number;
  port: number;
  useLive: boolean;
  fetchFilings: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const setting = issue ? issue.path.join('.') : 'env';
    throw new ConfigError(`Invalid environment setting ${setting}: ${issue?.message ?? 'unknown'}`, setting);
  }
  const e = parsed.data;
  return {
    calendarUrl: e.HKEX_IPO_CALENDAR_URL ? e.HKEX_IPO_CALENDAR_URL : null,
    hkdUsdRate: e.FX_HKD_USD,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    maxPdfBytes: e.MAX_PDF_BYTES,
    pdfMaxPages: e.PDF_MAX_PAGES,
    maxFilings: e.MAX_FILINGS,
    extractConcurrency: e.EXTRACT_CONCURRENCY,
    overridesPath: path.resolve(process.cwd(), e.OVERRIDES_PATH),
    samplePath: path.resolve(process.cwd(), e.SAMPLE_CALENDAR_PATH),
    cacheTtlSeconds: e.CALENDAR_CACHE_TTL_SECONDS,
    port: e.PORT,
    useLive: e.USE_LIVE,
    fetchFilings: e.FETCH_FILINGS,
  };
}
