// =============================================================================
// VAULTLINE — Symmetric Key Types
//
//   MasterKey      legacy account key; seals metadata in the "002" format
//                  under PBKDF2-SHA512(key, key, 1 iteration)
//   MasterKeyRing  ordered MasterKeys, oldest first; decryption searches
//                  the ring, encryption uses the newest
//   EncryptionKey  32 raw bytes; per-object content key, DEK and KEK;
//                  seals metadata in the "003" format
// =============================================================================

import { createDecipheriv, pbkdf2Sync } from 'crypto';
import { KeyMismatchError } from '../../errors';
import type { EncryptedString, FileEncryptionVersion, MetaCrypter } from '../../types/crypto';
import { decryptData, encryptData, md5, NONCE_LENGTH, openGcm, sealGcm } from './encryption';
import { generateRandomBytes, generateRandomString } from './random';

const V1_PREFIX = 'U2FsdGVk'; // base64("Salted")
const V2_PREFIX = '002';
const V3_PREFIX = '003';
const HEX_KEY = /^[0-9a-fA-F]{64}$/;

// ── Legacy salted CBC ──────────────────────────────────────────────────

/**
 * OpenSSL EVP_BytesToKey with MD5 and one round:
 * D_i = MD5(D_{i-1} ‖ password ‖ salt), concatenated until long enough.
 */
export function evpBytesToKey(
  password: Buffer,
  salt: Buffer,
  keyLength: number,
  ivLength: number,
): { key: Buffer; iv: Buffer } {
  const blocks: Buffer[] = [];
  let total = 0;
  let prev: Buffer = Buffer.alloc(0);
  while (total < keyLength + ivLength) {
    prev = md5(Buffer.concat([prev, password, salt]));
    blocks.push(prev);
    total += prev.length;
  }
  const derived = Buffer.concat(blocks);
  return {
    key: derived.subarray(0, keyLength),
    iv: derived.subarray(keyLength, keyLength + ivLength),
  };
}

function decryptMetaV1(raw: Buffer, encrypted: EncryptedString): string {
  const decoded = Buffer.from(encrypted, 'base64');
  if (decoded.length < 32) {
    throw new Error('Legacy metadata too short');
  }
  const salt = decoded.subarray(8, 16);
  const ciphertext = decoded.subarray(16);
  const { key, iv } = evpBytesToKey(raw, salt, 32, 16);
  const decipher = createDecipheriv('aes-256-cbc', key, iv);
  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf-8');
  } catch (err: unknown) {
    throw new Error('Legacy metadata padding check failed', { cause: err });
  }
}

const SALTED_MAGIC = Buffer.from('Salted__', 'latin1');

/**
 * Version 1 content chunk. Three shapes exist on the server:
 * binary "Salted__" + salt + CBC body, the same base64-encoded, or a bare
 * CBC body keyed by the raw key with its first 16 bytes as IV.
 */
export function decryptLegacyChunk(raw: Buffer, data: Buffer): Buffer {
  let salted: Buffer | null = null;
  if (data.subarray(0, 7).toString('latin1') === 'Salted_') {
    salted = data;
  } else if (data.subarray(0, V1_PREFIX.length).toString('latin1') === V1_PREFIX) {
    salted = Buffer.from(data.toString('latin1'), 'base64');
  }

  let key: Buffer = raw;
  let iv: Buffer = raw.subarray(0, 16);
  let body: Buffer = data;
  if (salted) {
    if (salted.length < SALTED_MAGIC.length + 8 + 16) {
      throw new Error('Legacy chunk too short');
    }
    ({ key, iv } = evpBytesToKey(raw, salted.subarray(8, 16), 32, 16));
    body = salted.subarray(16);
  }

  const decipher = createDecipheriv('aes-256-cbc', key, iv);
  try {
    return Buffer.concat([decipher.update(body), decipher.final()]);
  } catch (err: unknown) {
    throw new Error('Legacy chunk padding check failed', { cause: err });
  }
}

// ── MasterKey ──────────────────────────────────────────────────────────

export class MasterKey implements MetaCrypter {
  readonly raw: Buffer;
  readonly derived: Buffer;

  constructor(raw: Buffer) {
    this.raw = Buffer.from(raw);
    this.derived = pbkdf2Sync(this.raw, this.raw, 1, 32, 'sha512');
  }

  static fromString(key: string): MasterKey {
    return new MasterKey(Buffer.from(key, 'utf-8'));
  }

  encryptMeta(plaintext: string): EncryptedString {
    const nonce = generateRandomString(NONCE_LENGTH);
    const sealed = sealGcm(this.derived, Buffer.from(nonce, 'utf-8'), Buffer.from(plaintext, 'utf-8'));
    return V2_PREFIX + nonce + sealed.toString('base64');
  }

  decryptMeta(encrypted: EncryptedString): string {
    if (encrypted.startsWith(V1_PREFIX)) {
      return decryptMetaV1(this.raw, encrypted);
    }
    if (!encrypted.startsWith(V2_PREFIX)) {
      throw new Error(`Unknown metadata format "${encrypted.slice(0, 3)}" for a master key`);
    }
    const nonce = Buffer.from(encrypted.slice(3, 3 + NONCE_LENGTH), 'utf-8');
    const sealed = Buffer.from(encrypted.slice(3 + NONCE_LENGTH), 'base64');
    return openGcm(this.derived, nonce, sealed).toString('utf-8');
  }

  equals(other: MasterKey): boolean {
    return this.derived.equals(other.derived);
  }
}

// ── MasterKeyRing ──────────────────────────────────────────────────────

export class MasterKeyRing implements MetaCrypter {
  private readonly keys: readonly MasterKey[];

  /** @param keys oldest first; the last entry encrypts */
  constructor(keys: MasterKey[]) {
    if (keys.length === 0) {
      throw new Error('A master key ring needs at least one key');
    }
    this.keys = [...keys];
  }

  /**
   * Build the ring from the server's "|"-separated key list. The key the
   * session was opened with becomes the newest entry; duplicates of it
   * in the list are dropped.
   */
  static fromServerList(current: MasterKey, serialized: string): MasterKeyRing {
    const older = serialized
      .split('|')
      .filter(part => part.length > 0)
      .map(part => MasterKey.fromString(part))
      .filter(key => !key.equals(current));
    return new MasterKeyRing([...older, current]);
  }

  get newest(): MasterKey {
    return this.keys[this.keys.length - 1];
  }

  get size(): number {
    return this.keys.length;
  }

  /** Keys serialized the way the server stores them. */
  serialize(): string {
    return this.keys.map(key => key.raw.toString('utf-8')).join('|');
  }

  encryptMeta(plaintext: string): EncryptedString {
    return this.newest.encryptMeta(plaintext);
  }

  /** Try each key in ring order; the first one that opens the blob wins. */
  decryptMeta(encrypted: EncryptedString): string {
    const attempts: unknown[] = [];
    for (const key of this.keys) {
      try {
        return key.decryptMeta(encrypted);
      } catch (err: unknown) {
        attempts.push(err);
      }
    }
    throw new KeyMismatchError(attempts);
  }
}

// ── EncryptionKey ──────────────────────────────────────────────────────

export class EncryptionKey implements MetaCrypter {
  readonly bytes: Buffer;

  constructor(bytes: Buffer) {
    if (bytes.length !== 32) {
      throw new Error(`Encryption keys are 32 bytes, got ${bytes.length}`);
    }
    this.bytes = Buffer.from(bytes);
  }

  /**
   * A fresh per-object key. Version 2 keys are 32 alphanumeric characters
   * so they survive being stored as a plain string.
   */
  static generate(version: FileEncryptionVersion): EncryptionKey {
    switch (version) {
      case 2:
        return new EncryptionKey(Buffer.from(generateRandomString(32), 'utf-8'));
      case 3:
        return new EncryptionKey(generateRandomBytes(32));
    }
  }

  static fromHex(hex: string): EncryptionKey {
    if (!HEX_KEY.test(hex)) {
      throw new Error('Expected a 64-character hex key');
    }
    return new EncryptionKey(Buffer.from(hex, 'hex'));
  }

  /** Accepts both serializations: 32 raw characters (v2) or 64 hex (v3). */
  static fromString(key: string): EncryptionKey {
    if (key.length === 64) return EncryptionKey.fromHex(key);
    const bytes = Buffer.from(key, 'utf-8');
    if (key.length === 32 && bytes.length === 32) return new EncryptionKey(bytes);
    throw new Error(`Key string has wrong length ${key.length}`);
  }

  toString(version: FileEncryptionVersion = 3): string {
    return version === 3 ? this.bytes.toString('hex') : this.bytes.toString('utf-8');
  }

  /** The same bytes viewed as a legacy MasterKey, for "002" name/size/mime fields. */
  toMasterKey(): MasterKey {
    return new MasterKey(this.bytes);
  }

  encryptMeta(plaintext: string): EncryptedString {
    const nonce = generateRandomBytes(NONCE_LENGTH);
    const sealed = sealGcm(this.bytes, nonce, Buffer.from(plaintext, 'utf-8'));
    return V3_PREFIX + nonce.toString('hex') + sealed.toString('base64');
  }

  decryptMeta(encrypted: EncryptedString): string {
    if (!encrypted.startsWith(V3_PREFIX)) {
      throw new Error(`Unsupported metadata format "${encrypted.slice(0, 3)}" (allowed: 003)`);
    }
    const nonceHex = encrypted.slice(3, 3 + NONCE_LENGTH * 2);
    if (!/^[0-9a-fA-F]{24}$/.test(nonceHex)) {
      throw new Error('Malformed metadata nonce');
    }
    const sealed = Buffer.from(encrypted.slice(3 + NONCE_LENGTH * 2), 'base64');
    return openGcm(this.bytes, Buffer.from(nonceHex, 'hex'), sealed).toString('utf-8');
  }

  encryptData(plaintext: Buffer): Buffer {
    return encryptData(this.bytes, plaintext);
  }

  decryptData(data: Buffer): Buffer {
    return decryptData(this.bytes, data);
  }

  /** Version 1 content; see decryptLegacyChunk. */
  decryptLegacyData(data: Buffer): Buffer {
    return decryptLegacyChunk(this.bytes, data);
  }

  equals(other: EncryptionKey): boolean {
    return this.bytes.equals(other.bytes);
  }
}

/**
 * Crypter for a link key string: a 64-hex key under a version 3 account
 * seals in "003", anything else is treated as a legacy master key.
 */
export function metaCrypterFromKeyString(key: string, metadataVersion: 2 | 3): MetaCrypter {
  if (metadataVersion === 3 && HEX_KEY.test(key)) {
    return EncryptionKey.fromHex(key);
  }
  return MasterKey.fromString(key);
}
