// =============================================================================
// VAULTLINE — Crypto Core Types
//
// Types shared by the key hierarchy, metadata crypters and the RSA/HMAC
// helpers.
// =============================================================================

// ── Versions ───────────────────────────────────────────────────────────

/**
 * Account authentication scheme, reported by the server per account.
 * 1 and 2 use a master-key ring, 3 uses a password-derived KEK that
 * unwraps a single DEK.
 */
export type AuthVersion = 1 | 2 | 3;

/** How per-object keys are generated and serialized inside metadata. */
export type FileEncryptionVersion = 2 | 3;

/**
 * Chunk format of stored content. New uploads are 2 or 3; version 1
 * content is AES-256-CBC and can still be read.
 */
export type StoredFileVersion = 1 | FileEncryptionVersion;

/** Which envelope `encryptMeta` produces for the account's own view. */
export type MetadataEncryptionVersion = 2 | 3;

// ── Encrypted values ───────────────────────────────────────────────────

/**
 * A metadata ciphertext as stored on the server. The first three
 * characters select the format:
 *
 *   "002" + 12-char ASCII nonce + base64(ciphertext‖tag)   MasterKey
 *   "003" + 24 hex chars nonce  + base64(ciphertext‖tag)   EncryptionKey
 *   "U2FsdGVk..."                                          legacy CBC
 *
 * RSA-encrypted share metadata is plain base64 with no prefix.
 */
export type EncryptedString = string;

/** Anything that can seal and open small metadata strings. */
export interface MetaCrypter {
  encryptMeta(plaintext: string): EncryptedString;
  decryptMeta(encrypted: EncryptedString): string;
}

// ── Password derivation ────────────────────────────────────────────────

/** Result of stretching the account password for auth versions 1–2. */
export interface LegacyCredentials {
  /** 64-char string used as the raw bytes of the newest master key */
  masterKey: string;
  /** Sent to the server in place of the password */
  derivedPassword: string;
}

/** Result of stretching the account password for auth version 3. */
export interface CurrentCredentials {
  /** 64 hex chars, unwraps the DEK */
  kek: string;
  derivedPassword: string;
}
