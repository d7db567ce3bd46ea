import { randomBytes } from 'crypto';

export const CONTENT_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

const KEY_SUFFIX_BYTES = 16;

/**
 * Builds a key of the form `<UTC second folder>/<32 hex chars>`,
 * e.g. `20250812T232000/9f86d081884c7d659a2feaa0c55ad015`.
 */
export function generateObjectKey(now: Date = new Date()): string {
  const folder = now.toISOString()
    .slice(0, 19) // YYYY-MM-DDTHH:mm:ss
    .replace(/[-:]/g, '');
  const suffix = randomBytes(KEY_SUFFIX_BYTES).toString('hex');
  return `${folder}/${suffix}`;
}

export function generateRandomString(length: number): string {
  const bytes = randomBytes(length);
  let out = '';
  for (const byte of bytes) {
    out += CONTENT_ALPHABET[byte % CONTENT_ALPHABET.length];
  }
  return out;
}
