import { describe, it, expect } from 'vitest';
import { compactNameKey, nameTokens, normalizeCompanyKey, normalizeStockCode } from '../src/name-normalizer.js';

describe('normalizeCompanyKey', () => {
  it('maps spelling variants of one company to the same key', () => {
    expect(normalizeCompanyKey('Alpha Biotech Holdings')).toBe('alphabiotechholdings');
    expect(normalizeCompanyKey('Alpha-Biotech Holdings Ltd')).toBe('alphabiotechholdings');
    expect(normalizeCompanyKey('ALPHA BIOTECH HOLDINGS LIMITED')).toBe('alphabiotechholdings');
  });

  it('drops HKEX share-class markers and stacked corporate suffixes', () => {
    expect(normalizeCompanyKey('Beta Robotics Co., Ltd. - B')).toBe('betarobotics');
    expect(normalizeCompanyKey('Gamma Cloud Inc. - SW')).toBe('gammacloud');
  });

  it('is idempotent', () => {
    for (const name of ['Alpha-Biotech Holdings Ltd', 'Beta Robotics Co., Ltd. - B', 'Limited', '  ', '02617']) {
      const key = normalizeCompanyKey(name);
      expect(normalizeCompanyKey(key)).toBe(key);
    }
  });

  it('never drops the first token', () => {
    expect(normalizeCompanyKey('Limited')).toBe('limited');
    expect(nameTokens('Company Limited')).toEqual(['company']);
  });

  it('gives an empty key for blank input', () => {
    expect(normalizeCompanyKey('')).toBe('');
    expect(normalizeCompanyKey(null)).toBe('');
    expect(normalizeCompanyKey(' - ')).toBe('');
  });
});

describe('normalizeStockCode', () => {
  it('pads numeric codes to five digits', () => {
    expect(normalizeStockCode(700)).toBe('00700');
    expect(normalizeStockCode('700')).toBe('00700');
    expect(normalizeStockCode('0700.HK')).toBe('00700');
    expect(normalizeStockCode('HK2617')).toBe('02617');
  });

  it('treats blanks and placeholders as no code', () => {
    expect(normalizeStockCode('')).toBe('');
    expect(normalizeStockCode('-')).toBe('');
    expect(normalizeStockCode('"')).toBe('');
    expect(normalizeStockCode(null)).toBe('');
  });
});

describe('compactNameKey', () => {
  it('keeps every alphanumeric character', () => {
    expect(compactNameKey('Alpha Biotech Holdings Ltd')).toBe('alphabiotechholdingsltd');
    expect(compactNameKey(null)).toBe('');
  });
});
