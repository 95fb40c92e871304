/**
 * Money parsing and the single HKD → USD conversion point
 */

import type { Currency } from './types.js';

export interface Money {
  amount: number;
  currency: Currency;
}

/**
 * "HK$", "HKD", "US$", "USD" → Currency. Anything else (RMB, blank) is null.
 */
export function normalizeCurrency(marker: string | null | undefined): Currency | null {
  if (!marker) return null;
  const cleaned = marker.toUpperCase().replace(/\s+/g, '');
  if (cleaned === 'US$' || cleaned === 'USD') return 'USD';
  if (cleaned === 'HK$' || cleaned === 'HKD') return 'HKD';
  return null;
}

export function unitMultiplier(unit: string | null | undefined): number {
  if (!unit) return 1;
  const lowered = unit.toLowerCase();
  if (lowered === 'b' || lowered === 'bn' || lowered === 'billion') return 1_000_000_000;
  if (lowered === 'm' || lowered === 'mn' || lowered === 'million') return 1_000_000;
  return 1;
}

export function parseMoney(
  value: string,
  currencyMarker: string | null | undefined,
  unit?: string | null,
): Money | null {
  const currency = normalizeCurrency(currencyMarker);
  if (!currency) return null;
  const number = parseFloat(value.replace(/,/g, ''));
  if (!Number.isFinite(number) || number <= 0) return null;
  return { amount: number * unitMultiplier(unit), currency };
}

/**
 * The only place a sourced amount is converted. Rounded to whole dollars.
 */
export function convertToUsd(amount: number, currency: Currency, hkdUsdRate: number): number {
  const usd = currency === 'HKD' ? amount * hkdUsdRate : amount;
  return Math.round(usd);
}

export function moneyToUsd(money: Money, hkdUsdRate: number): number {
  return convertToUsd(money.amount, money.currency, hkdUsdRate);
}

/**
 * Parse a loose numeric cell ("1,234.5", 1234.5, "-") to a number
 */
export function parseNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const text = String(value).replace(/,/g, '').replace(/^HK\$/i, '').trim();
  if (!text || text === '-') return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}
