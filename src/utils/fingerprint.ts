import { createHash } from 'crypto';

/**
 * Serialize a value to JSON with object keys sorted at every depth.
 * Members whose value is undefined are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    const serialized = JSON.stringify(value);
    return serialized === undefined ? 'null' : serialized;
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }

  const entries = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);

  return `{${entries.join(',')}}`;
}

/**
 * SHA-256 (hex) of the canonical form of a request body
 */
export function fingerprintRequest(body: unknown): string {
  return createHash('sha256').update(canonicalJson(body)).digest('hex');
}
