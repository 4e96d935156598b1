import { createHash } from 'node:crypto';

import type { ContentHash, HashParser } from '../contracts.js';

export function sha256Hex(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Orders strings by their UTF-8 bytes, independent of locale. */
export function compareUtf8(a: string, b: string): number {
  return Buffer.from(a, 'utf8').compare(Buffer.from(b, 'utf8'));
}

const HASH128_RE = /^[0-9a-f]{32}$/;
const SHA256_RE = /^[0-9a-f]{64}$/;

/**
 * Default parser: a 128-bit content hash written as 32 hex digits.
 *
 * The all-zero hash is the engine's "no hash" value and is rejected.
 */
export const parseHash128: HashParser = (raw: string): ContentHash | undefined => {
  const hash = raw.trim().toLowerCase();
  if (!HASH128_RE.test(hash)) return undefined;
  if (/^0+$/.test(hash)) return undefined;
  return hash;
};

export const parseSha256: HashParser = (raw: string): ContentHash | undefined => {
  const hash = raw.trim().toLowerCase();
  return SHA256_RE.test(hash) ? hash : undefined;
};

/** Computes a 128-bit content hash (truncated SHA-256) for raw artifact bytes. */
export function contentHash128(bytes: Uint8Array): ContentHash {
  return sha256Hex(bytes).slice(0, 32);
}
