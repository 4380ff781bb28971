import { createHash } from 'crypto';

/** Bytes hashed from each of the head, middle and tail of large content */
export const FINGERPRINT_WINDOW_BYTES = 64 * 1024;

/**
 * Stable content fingerprint. Small content is hashed whole; larger
 * content is sampled at head, middle and tail, prefixed with its length.
 * Names and paths never contribute.
 */
export function fingerprintContent(content: Buffer): string {
  const hash = createHash('sha256');
  hash.update(`len:${content.length};`);

  if (content.length <= FINGERPRINT_WINDOW_BYTES * 3) {
    hash.update(content);
  } else {
    const middleStart = Math.floor(
      (content.length - FINGERPRINT_WINDOW_BYTES) / 2,
    );
    hash.update(content.subarray(0, FINGERPRINT_WINDOW_BYTES));
    hash.update(
      content.subarray(middleStart, middleStart + FINGERPRINT_WINDOW_BYTES),
    );
    hash.update(content.subarray(content.length - FINGERPRINT_WINDOW_BYTES));
  }

  return `seg_${hash.digest('hex')}`;
}

/**
 * Digest of every byte; detects two contents sharing a sampled fingerprint
 */
export function digestContent(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

export function normalizeQueryText(text: string): string {
  return text.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Fingerprint of already-normalized query text
 */
export function fingerprintQuery(normalizedText: string): string {
  return `qry_${createHash('sha256').update(normalizedText).digest('hex')}`;
}
