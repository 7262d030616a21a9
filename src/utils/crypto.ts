import { createHash } from 'crypto';

/**
 * Computes the attribution id for one source record on one chain.
 * sha256(source || ':' || blockchain || ':' || address || ':' || record_id)
 *
 * Stable across runs so repeated consolidations upsert the same rows.
 * EVM addresses repeat across chains, so the chain is part of the id.
 */
export function computeAttributionId(
  source: string,
  blockchain: string,
  address: string,
  recordId: string
): string {
  return createHash('sha256')
    .update(`${source}:${blockchain}:${address}:${recordId}`)
    .digest('hex');
}

/**
 * Canonical JSON: object keys sorted at every depth.
 * Dates serialize through toJSON, undefined members are dropped.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, member] of entries) {
      sorted[key] = sortKeys(member);
    }
    return sorted;
  }
  return value;
}
