import { createHash } from 'crypto';

/**
 * Creates a SHA-256 hash hex string from input text.
 * Identical content always maps to the same digest, which is what deduplication keys on.
 */
export function sha256Hex(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}
