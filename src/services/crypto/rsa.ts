// =============================================================================
// VAULTLINE — RSA Keypair and HMAC Key
//
// Shares are encrypted for a recipient with RSA-OAEP(SHA-512) under the
// recipient's public key (base64 SPKI DER). The account's own private key
// is stored server-side as base64 PKCS#8 DER, wrapped by the hierarchy.
//
// The HMAC key that hashes names and search tokens is derived from the
// private exponent so every client of the account derives the same one.
// =============================================================================

import {
  constants,
  createHmac,
  createPrivateKey,
  createPublicKey,
  hkdfSync,
  KeyObject,
  privateDecrypt as rsaPrivateDecrypt,
  publicEncrypt as rsaPublicEncrypt,
} from 'crypto';
import type { EncryptedString } from '../../types/crypto';

export interface RsaKeyPair {
  publicKey: KeyObject;
  privateKey: KeyObject;
}

const OAEP_HASH = 'sha512';
const HMAC_INFO = 'hmac-sha256-key';

export function publicKeyFromString(encoded: string): KeyObject {
  const key = createPublicKey({ key: Buffer.from(encoded, 'base64'), format: 'der', type: 'spki' });
  if (key.asymmetricKeyType !== 'rsa') {
    throw new Error(`Expected an RSA public key, got ${key.asymmetricKeyType}`);
  }
  return key;
}

export function publicKeyToString(key: KeyObject): string {
  return key.export({ format: 'der', type: 'spki' }).toString('base64');
}

export function privateKeyToString(key: KeyObject): string {
  return key.export({ format: 'der', type: 'pkcs8' }).toString('base64');
}

/** Parse the stored keypair and check the halves belong together. */
export function keyPairFromStrings(privateKey: string, publicKey: string): RsaKeyPair {
  const pub = publicKeyFromString(publicKey);
  const priv = createPrivateKey({ key: Buffer.from(privateKey, 'base64'), format: 'der', type: 'pkcs8' });
  if (priv.asymmetricKeyType !== 'rsa') {
    throw new Error(`Expected an RSA private key, got ${priv.asymmetricKeyType}`);
  }

  const derivedPublic = createPublicKey(priv).export({ format: 'der', type: 'spki' });
  if (!derivedPublic.equals(pub.export({ format: 'der', type: 'spki' }))) {
    throw new Error('Public and private key mismatch');
  }
  return { publicKey: pub, privateKey: priv };
}

export function publicEncrypt(publicKey: KeyObject, plaintext: string): EncryptedString {
  return rsaPublicEncrypt(
    { key: publicKey, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: OAEP_HASH },
    Buffer.from(plaintext, 'utf-8'),
  ).toString('base64');
}

export function privateDecrypt(privateKey: KeyObject, encrypted: EncryptedString): string {
  return rsaPrivateDecrypt(
    { key: privateKey, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: OAEP_HASH },
    Buffer.from(encrypted, 'base64'),
  ).toString('utf-8');
}

// ── HMAC key ───────────────────────────────────────────────────────────

export class HmacKey {
  readonly bytes: Buffer;

  constructor(bytes: Buffer) {
    if (bytes.length !== 32) {
      throw new Error(`HMAC keys are 32 bytes, got ${bytes.length}`);
    }
    this.bytes = Buffer.from(bytes);
  }

  /** HKDF-SHA256 over the big-endian private exponent, no salt. */
  static fromPrivateKey(privateKey: KeyObject): HmacKey {
    const jwk = privateKey.export({ format: 'jwk' });
    if (typeof jwk.d !== 'string') {
      throw new Error('Private key has no private exponent');
    }
    const exponent = Buffer.from(jwk.d, 'base64url');
    const derived = hkdfSync('sha256', exponent, Buffer.alloc(0), HMAC_INFO, 32);
    return new HmacKey(Buffer.from(derived));
  }

  /** Lowercase hex HMAC-SHA256. */
  hash(data: string | Buffer): string {
    return createHmac('sha256', this.bytes)
      .update(typeof data === 'string' ? Buffer.from(data, 'utf-8') : data)
      .digest('hex');
  }
}
