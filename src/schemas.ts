/**
 * zod schemas shared by the JSON data files (overrides, sample calendar).
 * Files use snake_case; parsed values come out in the record's camelCase.
 */

import { z } from 'zod';
import { parseDate } from './dates.js';
import { normalizeStockCode } from './name-normalizer.js';
import type { Filing } from './types.js';

export const isoDate = z.string().transform((value, ctx) => {
  const date = parseDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a date: ${value}` });
    return z.NEVER;
  }
  return date;
});

export const stockCode = z.union([z.string(), z.number()]).transform((v) => normalizeStockCode(v) || null);

export const FilingSchema = z
  .object({
    title: z.string(),
    url: z.string().min(1),
    published_date: isoDate.nullable().optional(),
    source: z.string().optional(),
  })
  .transform(
    (f): Filing => ({
      title: f.title,
      url: f.url,
      publishedDate: f.published_date ?? null,
      source: f.source ?? 'manual',
    }),
  );

export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unknown';
  const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return `${issue.message}${where}`;
}
