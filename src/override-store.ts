/**
 * Override Store
 *
 * Manual corrections keyed by normalized company key (or stock code):
 *
 *   {
 *     "alphabiotechholdings": {
 *       "raise_amount_usd": 250000000,
 *       "filings": [{ "title": "Prospectus", "url": "https://...", "published_date": "2025-01-10", "source": "manual" }]
 *     }
 *   }
 *
 * A missing file is an empty store. A file that exists but does not parse,
 * or carries a field of the wrong type, is a ConfigError.
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { compactNameKey, normalizeCompanyKey, normalizeStockCode } from './name-normalizer.js';
import { describeIssue, FilingSchema, isoDate, stockCode } from './schemas.js';
import type { OverrideFields, OverrideMap } from './types.js';

const log = createLogger('Overrides');

// Unknown keys are stripped (zod default)
const OverrideSchema = z.object({
  company_name: z.string().optional(),
  stock_code: stockCode.nullable().optional(),
  industry: z.string().nullable().optional(),
  bookbuilding_start: isoDate.nullable().optional(),
  bookbuilding_end: isoDate.nullable().optional(),
  listing_date: isoDate.nullable().optional(),
  term_sheet_url: z.string().nullable().optional(),
  company_page_url: z.string().nullable().optional(),
  ipo_value_usd: z.number().nonnegative().nullable().optional(),
  raise_amount_usd: z.number().nonnegative().nullable().optional(),
  offer_price_hkd: z.number().nonnegative().nullable().optional(),
  valuation_multiple: z.string().nullable().optional(),
  business_model: z.string().nullable().optional(),
  financial_trend: z.string().nullable().optional(),
  filings: z.array(FilingSchema).optional(),
});

type RawOverride = z.infer<typeof OverrideSchema>;

const OverrideFileSchema = z.record(z.string(), OverrideSchema);

function toOverrideFields(raw: RawOverride): OverrideFields {
  const fields: OverrideFields = {};
  if (raw.company_name !== undefined) fields.companyName = raw.company_name;
  if (raw.stock_code !== undefined) fields.stockCode = raw.stock_code;
  if (raw.industry !== undefined) fields.industry = raw.industry;
  if (raw.bookbuilding_start !== undefined) fields.bookbuildingStart = raw.bookbuilding_start;
  if (raw.bookbuilding_end !== undefined) fields.bookbuildingEnd = raw.bookbuilding_end;
  if (raw.listing_date !== undefined) fields.listingDate = raw.listing_date;
  if (raw.term_sheet_url !== undefined) fields.termSheetUrl = raw.term_sheet_url;
  if (raw.company_page_url !== undefined) fields.companyPageUrl = raw.company_page_url;
  if (raw.ipo_value_usd !== undefined) fields.ipoValueUsd = raw.ipo_value_usd;
  if (raw.raise_amount_usd !== undefined) fields.raiseAmountUsd = raw.raise_amount_usd;
  if (raw.offer_price_hkd !== undefined) fields.offerPriceHkd = raw.offer_price_hkd;
  if (raw.valuation_multiple !== undefined) fields.valuationMultiple = raw.valuation_multiple;
  if (raw.business_model !== undefined) fields.businessModel = raw.business_model;
  if (raw.financial_trend !== undefined) fields.financialTrend = raw.financial_trend;
  if (raw.filings !== undefined) fields.filings = raw.filings;
  return fields;
}

/**
 * Validate an already-parsed override document
 */
export function parseOverrides(payload: unknown, source: string): OverrideMap {
  const parsed = OverrideFileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ConfigError(`Invalid override file ${source}: ${describeIssue(parsed.error)}`, source);
  }

  const overrides = new Map<string, OverrideFields>();
  for (const [rawKey, raw] of Object.entries(parsed.data)) {
    const key = normalizeCompanyKey(rawKey);
    if (!key) {
      log.warn(`Skipping override with empty key "${rawKey}"`);
      continue;
    }
    overrides.set(key, { ...overrides.get(key), ...toOverrideFields(raw) });
  }
  return overrides;
}

export function loadOverrides(filePath: string): OverrideMap {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.info(`No override file at ${filePath}`);
      return new Map();
    }
    throw new ConfigError(`Cannot read override file ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Malformed JSON in override file ${filePath}: ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }

  const overrides = parseOverrides(payload, filePath);
  log.info(`Loaded ${overrides.size} override(s) from ${filePath}`);
  return overrides;
}

/**
 * Override for a company: by name key first, then the compact name, then the stock code
 */
export function lookupOverride(
  overrides: OverrideMap,
  companyName: string,
  code: string | null = null,
): OverrideFields | undefined {
  const byName = overrides.get(normalizeCompanyKey(companyName)) ?? overrides.get(compactNameKey(companyName));
  if (byName) return byName;
  const codeKey = code ? normalizeCompanyKey(normalizeStockCode(code)) : '';
  return codeKey ? overrides.get(codeKey) : undefined;
}
