const FIRST_CAP = /(.)([A-Z][a-z]+)/g;
const ALL_CAP = /([a-z0-9])([A-Z])/g;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `testTTL` → `test_ttl`, `statusDescription` → `status_description`. Snake-case input is returned unchanged. */
export function toSnakeCase(key: string): string {
  return key.replace(FIRST_CAP, '$1_$2').replace(ALL_CAP, '$1_$2').toLowerCase();
}

export function snakeCaseKeys(source: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    normalized[toSnakeCase(key)] = value;
  }
  return normalized;
}

/**
 * Normalize a decoded response body: the keys of a top-level object, or of each
 * object inside a top-level array, become snake case. Nested values are left alone.
 */
export function normalizePayload(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map((item: unknown) => (isRecord(item) ? snakeCaseKeys(item) : item));
  }
  return isRecord(body) ? snakeCaseKeys(body) : body;
}

/** Read a string field from a decoded payload. Numbers are stringified; anything else is `undefined`. */
export function readString(source: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/** Read a string or number field from a decoded payload, keeping its original type. */
export function readScalar(source: Readonly<Record<string, unknown>>, key: string): string | number | undefined {
  const value = source[key];
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}
