/**
 * Deal term patterns
 *
 * One ordered chain of TermPattern strategies per field. The first pattern
 * returning a plausible value wins; adding a pattern never touches the others.
 */

import { moneyToUsd, parseMoney } from './fx.js';
import type { ExtractedTerms } from './types.js';

export interface TermContext {
  /** PDF text with line breaks kept (section headings sit on their own line) */
  text: string;
  /** Same text, whitespace collapsed */
  flat: string;
  hkdUsdRate: number;
}

export interface TermPattern<T> {
  readonly name: string;
  match(ctx: TermContext): T | undefined;
}

export function createTermContext(text: string, hkdUsdRate: number): TermContext {
  return {
    text: text.replace(/\r\n?/g, '\n'),
    flat: text.replace(/\s+/g, ' ').trim(),
    hkdUsdRate,
  };
}

export function runChain<T>(chain: ReadonlyArray<TermPattern<T>>, ctx: TermContext): T | undefined {
  for (const pattern of chain) {
    const value = pattern.match(ctx);
    if (value !== undefined) return value;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Money
// ---------------------------------------------------------------------------

const MONEY = String.raw`(?<cur>HK\$|US\$|USD|HKD)\s*(?<amt>\d[\d,]*(?:\.\d+)?)(?:\s*(?<unit>million|billion|mn|bn)\b)?`;

/**
 * First match of `source` (which embeds MONEY) whose amount converts to a positive USD figure
 */
function moneyPattern(name: string, source: string): TermPattern<number> {
  return {
    name,
    match(ctx) {
      for (const m of ctx.flat.matchAll(new RegExp(source, 'gi'))) {
        const groups = m.groups;
        if (!groups) continue;
        const money = parseMoney(groups.amt, groups.cur, groups.unit);
        if (!money) continue;
        const usd = moneyToUsd(money, ctx.hkdUsdRate);
        if (Number.isFinite(usd) && usd > 0) return usd;
      }
      return undefined;
    },
  };
}

export const RAISE_AMOUNT_CHAIN: ReadonlyArray<TermPattern<number>> = [
  moneyPattern('gross proceeds', String.raw`gross\s+proceeds[^.]{0,80}?${MONEY}`),
  moneyPattern('raise keyword', String.raw`(?:raise|raised|raising|proceeds)[^.$\d]{0,60}?${MONEY}`),
  moneyPattern('amount to be raised', String.raw`${MONEY}\s+(?:to\s+be\s+raised|in\s+(?:gross\s+|net\s+)?proceeds)`),
];

export const IPO_VALUE_CHAIN: ReadonlyArray<TermPattern<number>> = [
  moneyPattern('market capitalisation', String.raw`market\s+capitali[sz]ation[^.]{0,80}?${MONEY}`),
];

// ---------------------------------------------------------------------------
// Valuation multiple
// ---------------------------------------------------------------------------

function plausibleMultiple(raw: string): string | undefined {
  const value = parseFloat(raw);
  if (!Number.isFinite(value) || value <= 0 || value > 1000) return undefined;
  return `${raw}x`;
}

const priceEarnings: TermPattern<string> = {
  name: 'price-to-earnings',
  match(ctx) {
    const pattern = /(?:P\/E|price[-\s]to[-\s]earnings)(?:\s+ratio)?[^.\d]{0,40}?(\d+(?:\.\d+)?)\s*(?:x|times)?/gi;
    for (const m of ctx.flat.matchAll(pattern)) {
      const multiple = plausibleMultiple(m[1]);
      if (multiple) return multiple;
    }
    return undefined;
  },
};

const VALUATION_WINDOW = 80;

const multipleNearValuation: TermPattern<string> = {
  name: 'multiple near valuation',
  match(ctx) {
    for (const m of ctx.flat.matchAll(/valuation/gi)) {
      const at = m.index ?? 0;
      const window = ctx.flat.slice(Math.max(0, at - VALUATION_WINDOW), at + m[0].length + VALUATION_WINDOW);
      for (const hit of window.matchAll(/(\d+(?:\.\d+)?)\s?x\b/gi)) {
        const multiple = plausibleMultiple(hit[1]);
        if (multiple) return multiple;
      }
    }
    return undefined;
  },
};

export const VALUATION_MULTIPLE_CHAIN: ReadonlyArray<TermPattern<string>> = [priceEarnings, multipleNearValuation];

// ---------------------------------------------------------------------------
// Offer price (HK$ per share)
// ---------------------------------------------------------------------------

function offerPricePattern(name: string, pattern: RegExp): TermPattern<number> {
  return {
    name,
    match(ctx) {
      for (const m of ctx.flat.matchAll(pattern)) {
        const price = parseFloat(m[1].replace(/,/g, ''));
        if (Number.isFinite(price) && price > 0 && price < 10000) return price;
      }
      return undefined;
    },
  };
}

export const OFFER_PRICE_CHAIN: ReadonlyArray<TermPattern<number>> = [
  offerPricePattern('maximum offer price', /Maximum\s*(?:Public\s*)?Offer\s*Price[:\s]+HK\$\s*(\d[\d,]*(?:\.\d+)?)/gi),
  offerPricePattern('offer price', /(?:Final\s+)?Offer\s*Price[:\s]+(?:Not\s+more\s+than\s+)?HK\$\s*(\d[\d,]*(?:\.\d+)?)/gi),
  offerPricePattern('per offer share', /HK\$\s*(\d[\d,]*(?:\.\d+)?)\s*per\s+Offer\s*(?:Share|Unit)/gi),
];

// ---------------------------------------------------------------------------
// Narrative fields
// ---------------------------------------------------------------------------

const SUMMARY_SENTENCES = 2;
const MAX_SUMMARY_LENGTH = 600;

export function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .split(/(?<=[.!?])\s+(?=[A-Z(])/)
    .map((s) => s.trim())
    .filter((s) => s.length >= 20 && s.length <= 400);
}

function summarize(sentences: string[]): string | undefined {
  if (sentences.length === 0) return undefined;
  const summary = sentences.slice(0, SUMMARY_SENTENCES).join(' ');
  return summary.length > MAX_SUMMARY_LENGTH ? `${summary.slice(0, MAX_SUMMARY_LENGTH - 3)}...` : summary;
}

const BUSINESS_OPENING =
  /^(?:(?:Founded|Established|Incorporated)\s+in\s+\d{4},?\s*)?we\s+(?:are|have|were|provide|operate|develop|offer|manufacture|focus)\b/i;

const overviewSection: TermPattern<string> = {
  name: 'overview section',
  match(ctx) {
    for (const heading of ['OVERVIEW', 'SUMMARY', 'OUR BUSINESS']) {
      const section = ctx.text.match(new RegExp(String.raw`\n\s*${heading}\s*\n([\s\S]{0,3000})`));
      if (!section) continue;
      const content = section[1].trim();
      if (heading !== 'OUR BUSINESS' && !BUSINESS_OPENING.test(content)) continue;
      const summary = summarize(splitSentences(content));
      if (summary) return summary;
    }
    return undefined;
  },
};

function keywordSentences(name: string, keywords: RegExp): TermPattern<string> {
  return {
    name,
    match(ctx) {
      return summarize(splitSentences(ctx.flat).filter((s) => keywords.test(s)));
    },
  };
}

export const BUSINESS_MODEL_CHAIN: ReadonlyArray<TermPattern<string>> = [
  overviewSection,
  keywordSentences('business sentences', /\b(?:our business|we are|we provide)\b/i),
];

export const FINANCIAL_TREND_CHAIN: ReadonlyArray<TermPattern<string>> = [
  keywordSentences('financial sentences', /\b(?:revenue|revenues|profit|profits|loss|losses|gross)\b/i),
];

/**
 * Run every field chain over the text. Fields with no plausible match are omitted.
 */
export function extractTermsFromText(text: string, hkdUsdRate: number): ExtractedTerms {
  const ctx = createTermContext(text, hkdUsdRate);
  const terms: ExtractedTerms = {};

  const raiseAmountUsd = runChain(RAISE_AMOUNT_CHAIN, ctx);
  if (raiseAmountUsd !== undefined) terms.raiseAmountUsd = raiseAmountUsd;
  const ipoValueUsd = runChain(IPO_VALUE_CHAIN, ctx);
  if (ipoValueUsd !== undefined) terms.ipoValueUsd = ipoValueUsd;
  const offerPriceHkd = runChain(OFFER_PRICE_CHAIN, ctx);
  if (offerPriceHkd !== undefined) terms.offerPriceHkd = offerPriceHkd;
  const valuationMultiple = runChain(VALUATION_MULTIPLE_CHAIN, ctx);
  if (valuationMultiple !== undefined) terms.valuationMultiple = valuationMultiple;
  const businessModel = runChain(BUSINESS_MODEL_CHAIN, ctx);
  if (businessModel !== undefined) terms.businessModel = businessModel;
  const financialTrend = runChain(FINANCIAL_TREND_CHAIN, ctx);
  if (financialTrend !== undefined) terms.financialTrend = financialTrend;

  return terms;
}

export function hasTerms(terms: ExtractedTerms): boolean {
  return Object.values(terms).some((v) => v !== undefined && v !== '');
}
