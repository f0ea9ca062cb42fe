import { createHash } from 'crypto';

/**
 * SHA-256 digest of the payload as 64 lowercase hex characters.
 * Strings are encoded as UTF-8 before hashing.
 */
export function fingerprint(payload: string | Uint8Array): string {
  const hash = createHash('sha256');
  hash.update(typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload);
  return hash.digest('hex');
}

/**
 * Digest of raw file bytes, used as the artifact cache address
 */
export function contentHash(bytes: Uint8Array): string {
  return fingerprint(bytes);
}

const HEX_DIGEST = /^[0-9a-f]{64}$/;

export function isHexDigest(value: string): boolean {
  return HEX_DIGEST.test(value);
}

/**
 * JSON with object keys sorted at every depth.
 * Array order is kept; undefined members are dropped like JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortKeys(item));
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }

  return value;
}

/**
 * Question canonical form: trimmed, inner whitespace collapsed, lower-cased.
 * "How many customers?" and "  how   many customers? " share one key.
 */
export function canonicalQuestion(question: string): string {
  return question.trim().replace(/\s+/g, ' ').toLowerCase();
}
