// =============================================================================
// VAULTLINE — AES-256-GCM Primitives and Digests
//
// Low-level sealing used by every key type, plus the digests the protocol
// names: SHA-512 (chunk integrity), SHA-1 over SHA-512 (legacy name
// hashes), MD5 (legacy key derivation).
//
// Content chunk layout: nonce(12) ‖ ciphertext ‖ tag(16)
// =============================================================================

import { createCipheriv, createDecipheriv, createHash } from 'crypto';
import { generateRandomBytes } from './random';

const ALGORITHM = 'aes-256-gcm';
export const NONCE_LENGTH = 12;
export const AUTH_TAG_LENGTH = 16;

/** SHA-512 of data as lowercase hex. */
export function sha512(data: string | Buffer): string {
  return createHash('sha512')
    .update(typeof data === 'string' ? Buffer.from(data, 'utf-8') : data)
    .digest('hex');
}

/** sha1(hex(sha512(data))): the name hash of auth versions 1 and 2. */
export function v2Hash(data: string | Buffer): string {
  return createHash('sha1').update(sha512(data), 'utf-8').digest('hex');
}

export function md5(data: Buffer): Buffer {
  return createHash('md5').update(data).digest();
}

function assertKey(key: Buffer): void {
  if (key.length !== 32) {
    throw new Error('AES-256 requires a 32-byte key');
  }
}

/** Encrypt and return ciphertext ‖ tag. The caller owns the nonce. */
export function sealGcm(key: Buffer, nonce: Buffer, plaintext: Buffer): Buffer {
  assertKey(key);
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  return Buffer.concat([cipher.update(plaintext), cipher.final(), cipher.getAuthTag()]);
}

/**
 * Open ciphertext ‖ tag. Throws if the tag does not verify, which is
 * also what a wrong key looks like.
 */
export function openGcm(key: Buffer, nonce: Buffer, sealed: Buffer): Buffer {
  assertKey(key);
  if (sealed.length < AUTH_TAG_LENGTH) {
    throw new Error(`GCM payload too short: ${sealed.length} bytes`);
  }
  const ciphertext = sealed.subarray(0, sealed.length - AUTH_TAG_LENGTH);
  const authTag = sealed.subarray(sealed.length - AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);
  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err: unknown) {
    throw new Error('GCM authentication failure: wrong key or tampered ciphertext', { cause: err });
  }
}

/** Encrypt one content chunk under a fresh random nonce. */
export function encryptData(key: Buffer, plaintext: Buffer): Buffer {
  const nonce = generateRandomBytes(NONCE_LENGTH);
  return Buffer.concat([nonce, sealGcm(key, nonce, plaintext)]);
}

export function decryptData(key: Buffer, data: Buffer): Buffer {
  if (data.length < NONCE_LENGTH + AUTH_TAG_LENGTH) {
    throw new Error(`Encrypted chunk too short: ${data.length} bytes`);
  }
  return openGcm(key, data.subarray(0, NONCE_LENGTH), data.subarray(NONCE_LENGTH));
}
