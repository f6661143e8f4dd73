// =============================================================================
// VAULTLINE — Password Stretching
//
// Turns the account password into the key that opens the rest of the
// hierarchy, plus the derived password the server authenticates.
//
//   auth 2: PBKDF2-SHA512(password, salt, 200 000, 64 bytes) → 128 hex
//           chars; first 64 are the master key, sha512 of the last 64 is
//           the derived password
//   auth 3: Argon2id(password, hex salt, t=3, m=64 MiB, p=4, 64 bytes) →
//           first half is the KEK, second half the derived password
// =============================================================================

import { pbkdf2Sync } from 'crypto';
import { argon2id } from '@noble/hashes/argon2';
import { UnsupportedAuthVersionError } from '../../errors';
import type { CurrentCredentials, LegacyCredentials } from '../../types/crypto';
import { sha512 } from './encryption';

const PBKDF2_ITERATIONS = 200_000;
const ARGON2_PARAMS = { t: 3, m: 65536, p: 4, dkLen: 64 } as const;

export function deriveLegacyCredentials(password: string, salt: string): LegacyCredentials {
  const derived = pbkdf2Sync(password, salt, PBKDF2_ITERATIONS, 64, 'sha512').toString('hex');
  return {
    masterKey: derived.slice(0, 64),
    derivedPassword: sha512(derived.slice(64)),
  };
}

export function deriveCurrentCredentials(password: string, saltHex: string): CurrentCredentials {
  if (!/^([0-9a-fA-F]{2})+$/.test(saltHex)) {
    throw new Error('Auth version 3 salt must be hex');
  }
  const derived = Buffer.from(
    argon2id(Buffer.from(password, 'utf-8'), Buffer.from(saltHex, 'hex'), ARGON2_PARAMS),
  ).toString('hex');
  return {
    kek: derived.slice(0, derived.length / 2),
    derivedPassword: derived.slice(derived.length / 2),
  };
}

/** Version 1 accounts used a different legacy digest chain that this client does not implement. */
export function deriveV1Credentials(): never {
  throw new UnsupportedAuthVersionError(1, 'password login');
}
