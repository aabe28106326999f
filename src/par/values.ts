const PLACEHOLDERS = new Set(['', '(float)', '(integer)', 'n/a', '?', 'null', 'none']);

/**
 * True when a header value is empty or one of the placeholder strings Philips writes
 */
export function isPlaceholder(value: string): boolean {
  return PLACEHOLDERS.has(value.trim().toLowerCase());
}

export function parseFloatValue(value: string | null | undefined): number | null {
  if (value === null || value === undefined || isPlaceholder(value)) return null;
  const cleaned = value.trim().replace(/[()]/g, '');
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseIntValue(value: string | null | undefined): number | null {
  const parsed = parseFloatValue(value);
  return parsed === null ? null : Math.trunc(parsed);
}

export function parseStringValue(value: string | null | undefined): string | null {
  if (value === null || value === undefined || isPlaceholder(value)) return null;
  return value.trim();
}

/**
 * Round to a fixed number of decimals
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
