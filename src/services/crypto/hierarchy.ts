// =============================================================================
// VAULTLINE — Account Key Hierarchy
//
// The account's view of its own tree is sealed by exactly one of:
//
//   LegacyKeyHierarchy   auth versions 1–2, a MasterKeyRing searched in
//                        order on decryption
//   CurrentKeyHierarchy  auth version 3, a single DEK; one attempt
//
// Both carry the RSA keypair and the HMAC key derived from it. Sharing
// never goes through the hierarchy: recipients get RSA ciphertext, links
// get the link key. The hierarchy only wraps the link key itself.
//
// All operations are pure transforms over the keys held; nothing is
// written anywhere.
// =============================================================================

import { KeyMismatchError, UnsupportedAuthVersionError } from '../../errors';
import type {
  AuthVersion,
  EncryptedString,
  FileEncryptionVersion,
  MetaCrypter,
  MetadataEncryptionVersion,
} from '../../types/crypto';
import { v2Hash } from './encryption';
import { EncryptionKey, MasterKeyRing, metaCrypterFromKeyString } from './keys';
import { HmacKey, RsaKeyPair } from './rsa';

// ── Interface ──────────────────────────────────────────────────────────

export interface KeyHierarchy extends MetaCrypter {
  readonly authVersion: AuthVersion;
  readonly fileEncryptionVersion: FileEncryptionVersion;
  readonly metadataEncryptionVersion: MetadataEncryptionVersion;
  readonly keyPair: RsaKeyPair;
  readonly hmacKey: HmacKey;

  /** Seal a per-object key for storage in the owner's metadata. */
  wrapKey(key: EncryptionKey): EncryptedString;

  /**
   * Open a wrapped per-object key.
   * @throws KeyMismatchError when no hierarchy key opens it
   */
  unwrapKey(wrapped: EncryptedString): EncryptionKey;

  /** Deterministic server-side lookup hash of an item name. */
  hashFileName(name: string): string;

  /** Crypter for a link key string that has already been unwrapped. */
  metaCrypterForLinkKey(linkKey: string): MetaCrypter;
}

// ── Shared behavior ────────────────────────────────────────────────────

abstract class BaseKeyHierarchy implements KeyHierarchy {
  abstract readonly authVersion: AuthVersion;
  abstract readonly fileEncryptionVersion: FileEncryptionVersion;
  abstract readonly metadataEncryptionVersion: MetadataEncryptionVersion;
  readonly keyPair: RsaKeyPair;
  readonly hmacKey: HmacKey;

  protected constructor(keyPair: RsaKeyPair) {
    this.keyPair = keyPair;
    this.hmacKey = HmacKey.fromPrivateKey(keyPair.privateKey);
  }

  abstract encryptMeta(plaintext: string): EncryptedString;
  abstract decryptMeta(encrypted: EncryptedString): string;

  wrapKey(key: EncryptionKey): EncryptedString {
    return this.encryptMeta(key.toString(this.fileEncryptionVersion));
  }

  unwrapKey(wrapped: EncryptedString): EncryptionKey {
    const serialized = this.decryptMeta(wrapped);
    try {
      return EncryptionKey.fromString(serialized);
    } catch (err: unknown) {
      // Opened under some key but is not a key: the blob belongs to something else
      throw new KeyMismatchError([err]);
    }
  }

  hashFileName(name: string): string {
    const lowered = name.toLowerCase();
    switch (this.authVersion) {
      case 1:
      case 2:
        return v2Hash(lowered);
      case 3:
        return this.hmacKey.hash(lowered);
    }
  }

  metaCrypterForLinkKey(linkKey: string): MetaCrypter {
    return metaCrypterFromKeyString(linkKey, this.metadataEncryptionVersion);
  }
}

// ── Legacy: master-key ring ────────────────────────────────────────────

export class LegacyKeyHierarchy extends BaseKeyHierarchy {
  readonly authVersion: 1 | 2;
  readonly fileEncryptionVersion = 2 as const;
  readonly metadataEncryptionVersion = 2 as const;
  readonly ring: MasterKeyRing;

  constructor(authVersion: 1 | 2, ring: MasterKeyRing, keyPair: RsaKeyPair) {
    super(keyPair);
    this.authVersion = authVersion;
    this.ring = ring;
  }

  encryptMeta(plaintext: string): EncryptedString {
    return this.ring.encryptMeta(plaintext);
  }

  decryptMeta(encrypted: EncryptedString): string {
    return this.ring.decryptMeta(encrypted);
  }
}

// ── Current: single DEK ────────────────────────────────────────────────

export class CurrentKeyHierarchy extends BaseKeyHierarchy {
  readonly authVersion = 3 as const;
  readonly fileEncryptionVersion = 3 as const;
  readonly metadataEncryptionVersion = 3 as const;
  readonly dek: EncryptionKey;

  constructor(dek: EncryptionKey, keyPair: RsaKeyPair) {
    super(keyPair);
    this.dek = dek;
  }

  encryptMeta(plaintext: string): EncryptedString {
    return this.dek.encryptMeta(plaintext);
  }

  decryptMeta(encrypted: EncryptedString): string {
    try {
      return this.dek.decryptMeta(encrypted);
    } catch (err: unknown) {
      throw new KeyMismatchError([err]);
    }
  }
}

// ── Factory ────────────────────────────────────────────────────────────

export type HierarchyKeys =
  | { authVersion: 1 | 2; ring: MasterKeyRing; keyPair: RsaKeyPair }
  | { authVersion: 3; dek: EncryptionKey; keyPair: RsaKeyPair };

/** Build the hierarchy matching the account's auth version. */
export function createKeyHierarchy(keys: HierarchyKeys): KeyHierarchy {
  switch (keys.authVersion) {
    case 1:
    case 2:
      return new LegacyKeyHierarchy(keys.authVersion, keys.ring, keys.keyPair);
    case 3:
      return new CurrentKeyHierarchy(keys.dek, keys.keyPair);
  }
}

export function assertAuthVersion(value: number): AuthVersion {
  switch (value) {
    case 1:
    case 2:
    case 3:
      return value;
    default:
      throw new UnsupportedAuthVersionError(value, 'this client');
  }
}
