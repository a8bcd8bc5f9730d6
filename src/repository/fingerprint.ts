//content fingerprints for exact-duplicate detection
import { createHash } from 'crypto';
import type { FactKind } from '../models/index.js';

//order-insensitive, case-insensitive canonical form of a fact's content
export function canonicalize(value: unknown): unknown {
  if (typeof value === 'string') return value.trim().toLowerCase().replace(/\s+/g, ' ');
  if (Array.isArray(value)) {
    const items = value.map(canonicalize);
    return items.every(i => i === null || typeof i !== 'object')
      ? [...items].sort((a, b) => JSON.stringify(a).localeCompare(JSON.stringify(b)))
      : items;
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([k, v]) => [k, canonicalize(v)]),
    );
  }
  return value;
}

export function computeFingerprint(kind: FactKind, content: unknown): string {
  return createHash('sha256').update(`${kind}:${JSON.stringify(canonicalize(content))}`).digest('hex');
}
