/** TTL values (in seconds) accepted by the API, with their english labels. */
export const TTL_LABELS: Readonly<Record<number, string>> = {
  60: '1 minute',
  300: '5 minutes',
  900: '15 minutes',
  1800: '30 minutes',
  3600: '1 hour',
  21600: '6 hours',
  43200: '12 hours',
  86400: '1 day',
  172800: '2 days',
  259200: '3 days',
  604800: '1 week',
  1209600: '2 weeks',
  2592000: '1 month',
};

const TTL_SECONDS: ReadonlySet<string> = new Set(Object.keys(TTL_LABELS));
const TTL_NAMES: ReadonlySet<string> = new Set(Object.values(TTL_LABELS));

/** Accepts `3600`, `'3600'` or `'1 hour'` (case-insensitive). */
export function isTtl(value: unknown): boolean {
  if (typeof value === 'number') return TTL_SECONDS.has(String(value));
  if (typeof value !== 'string') return false;
  const normalized = value.trim().toLowerCase();
  return TTL_SECONDS.has(normalized) || TTL_NAMES.has(normalized);
}
