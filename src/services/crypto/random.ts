import { randomBytes, randomInt } from 'crypto';

const ALPHANUMERIC = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Uniformly random string over [a-zA-Z0-9]. Used for v2 object keys,
 * link keys, upload keys, removal tokens and "002" nonces.
 */
export function generateRandomString(length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)];
  }
  return out;
}

export function generateRandomBytes(length: number): Buffer {
  return randomBytes(length);
}
