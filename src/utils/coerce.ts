/**
 * Lenient conversions for third-party payload fields
 */

/**
 * Converts value to a finite number, handling NaN, Infinity, null and numeric strings.
 */
export function toNumber(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string') {
    const num = parseFloat(value);
    return Number.isFinite(num) ? num : 0;
  }
  return 0;
}

/**
 * Converts value to string, defaulting to an empty string.
 */
export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Shortens a payload for log lines.
 */
export function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
