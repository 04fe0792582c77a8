/**
 * appcompat Runtime Host: ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifiers, used as the
 * event_id of every line in logs/overrides.jsonl so that logs merged from
 * several hosts can be deduplicated.
 *
 * Format: 26 characters of Crockford Base32.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80 random bits from node:crypto
 *
 * Lexicographic order follows creation time across milliseconds. Within one
 * millisecond the order is random; the random part is not incremented
 * monotonically, and override logs only use the order for display.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford Base32; no I, L, O or U. */
const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_LENGTH = 10;
const RANDOM_LENGTH = 16;

/** Encode exactly `length` characters, zero-padded on the left. */
function encodeBase32(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(rest % 32n)) + out;
    rest /= 32n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * @param now - Millisecond timestamp for the time part; defaults to Date.now()
 * @returns A 26-character uppercase ULID
 *
 * @example
 * ulid(0).slice(0, 10); // '0000000000'
 */
export function ulid(now: number = Date.now()): string {
  const random = randomBytes(10).reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
  return encodeBase32(BigInt(now), TIME_LENGTH) + encodeBase32(random, RANDOM_LENGTH);
}
