/**
 * Company Name Normalization
 *
 * One key per company, shared by the override store, filing search and the
 * reconciliation engine:
 * - "Alpha Biotech Holdings", "Alpha-Biotech Holdings Ltd" → alphabiotechholdings
 * - "Beta Robotics Co., Ltd. - B" → betarobotics
 */

// Corporate-form tokens dropped from the end of a name
const CORPORATE_SUFFIXES = new Set([
  'limited',
  'ltd',
  'inc',
  'incorporated',
  'corp',
  'corporation',
  'co',
  'company',
  'plc',
  'llc',
]);

// HKEX share-class markers appended to stock names (" - B" biotech, " - W" WVR, ...)
const SHARE_CLASS_MARKER = /\s+-\s*(?:sw|b|w|s|p)\s*$/i;

export function normalizeCompanyKey(name: string | null | undefined): string {
  return nameTokens(name ?? '').join('');
}

/**
 * Lowercase alphanumerics only, nothing dropped ("Alpha Biotech Holdings Ltd" → alphabiotechholdingsltd).
 * Override files keyed this way still match.
 */
export function compactNameKey(name: string | null | undefined): string {
  return (name ?? '').toLowerCase().replace(/[^a-z0-9]+/g, '');
}

/**
 * Lowercased name words without share-class marker or trailing corporate form.
 * The first token is never dropped, so a bare "Limited" still has a key.
 */
export function nameTokens(name: string): string[] {
  const tokens = name
    .toLowerCase()
    .replace(SHARE_CLASS_MARKER, '')
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
  while (tokens.length > 1 && CORPORATE_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens;
}

/**
 * HKEX stock code → five digits ("700", "0700.HK" → "00700")
 */
export function normalizeStockCode(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(Math.trunc(value)).padStart(5, '0') : '';
  }

  let text = String(value).trim();
  if (!text || text === '"' || text === '-') return '';

  text = text.replace(/\.HK$/i, '').replace(/^HK/i, '').trim();
  if (/^\d+$/.test(text)) {
    return String(parseInt(text, 10)).padStart(5, '0');
  }
  return text;
}
