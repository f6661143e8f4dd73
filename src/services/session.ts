// =============================================================================
// VAULTLINE — Session Bootstrap
//
// Password → credentials → API key → account keys → KeyHierarchy.
//
//   auth 2: master key from PBKDF2; the server returns the full ring
//           sealed under it
//   auth 3: KEK from Argon2id; the server returns the DEK sealed under it
//
// The RSA private key comes back sealed under the hierarchy and the HMAC
// key is derived from it. Nothing here is persisted.
// =============================================================================

import type { ApiClient } from '../api/client';
import type { RootDirectory } from '../types/filesystem';
import type { AuthVersion, MetaCrypter } from '../types/crypto';
import { createKeyHierarchy } from './crypto/hierarchy';
import type { HierarchyKeys, KeyHierarchy } from './crypto/hierarchy';
import { EncryptionKey, MasterKey, MasterKeyRing } from './crypto/keys';
import { deriveCurrentCredentials, deriveLegacyCredentials, deriveV1Credentials } from './crypto/password';
import { keyPairFromStrings } from './crypto/rsa';
import type { RsaKeyPair } from './crypto/rsa';
import { createLogger } from './log';

const log = createLogger('Session');

export interface SessionOptions {
  email: string;
  password: string;
  /** Skip the login call and authorize with this key instead */
  apiKey?: string;
  twoFactorCode?: string;
  /** Unauthorized transport; re-keyed once the API key is known */
  api: ApiClient;
}

export interface Session {
  email: string;
  apiKey: string;
  /** Authorized transport */
  api: ApiClient;
  hierarchy: KeyHierarchy;
  root: RootDirectory;
}

const NO_TWO_FACTOR = 'XXXXXX';

interface UnlockedAccount {
  apiKey: string;
  api: ApiClient;
  /** Opens the sealed private key */
  sealer: MetaCrypter;
  keys: (keyPair: RsaKeyPair) => HierarchyKeys;
}

async function unlockAccount(
  options: SessionOptions,
  authVersion: AuthVersion,
  salt: string,
  signal?: AbortSignal,
): Promise<UnlockedAccount> {
  const login = async (derivedPassword: string, version: 2 | 3): Promise<string> => {
    if (options.apiKey) return options.apiKey;
    const response = await options.api.login(
      {
        email: options.email,
        password: derivedPassword,
        twoFactorCode: options.twoFactorCode ?? NO_TWO_FACTOR,
        authVersion: version,
      },
      signal,
    );
    return response.apiKey;
  };

  switch (authVersion) {
    case 1:
      return deriveV1Credentials();
    case 2: {
      const credentials = deriveLegacyCredentials(options.password, salt);
      const apiKey = await login(credentials.derivedPassword, 2);
      const api = options.api.withApiKey(apiKey);

      const masterKey = MasterKey.fromString(credentials.masterKey);
      const sealedRing = await api.userMasterKeys(masterKey.encryptMeta(credentials.masterKey), signal);
      const ring = MasterKeyRing.fromServerList(masterKey, masterKey.decryptMeta(sealedRing));
      log.debug(`Loaded ${ring.size} master keys`);

      return { apiKey, api, sealer: ring, keys: keyPair => ({ authVersion: 2, ring, keyPair }) };
    }
    case 3: {
      const credentials = deriveCurrentCredentials(options.password, salt);
      const apiKey = await login(credentials.derivedPassword, 3);
      const api = options.api.withApiKey(apiKey);

      const kek = EncryptionKey.fromHex(credentials.kek);
      const dek = EncryptionKey.fromHex(kek.decryptMeta(await api.userDek(signal)));

      return { apiKey, api, sealer: dek, keys: keyPair => ({ authVersion: 3, dek, keyPair }) };
    }
  }
}

export async function openSession(options: SessionOptions, signal?: AbortSignal): Promise<Session> {
  const info = await options.api.authInfo(options.email, signal);
  log.debug(`Account uses auth version ${info.authVersion}`);

  const { apiKey, api, sealer, keys } = await unlockAccount(options, info.authVersion, info.salt, signal);

  const keyPairInfo = await api.userKeyPairInfo(signal);
  const keyPair = keyPairFromStrings(sealer.decryptMeta(keyPairInfo.privateKey), keyPairInfo.publicKey);
  const hierarchy = createKeyHierarchy(keys(keyPair));
  const root: RootDirectory = { type: 'root', uuid: await api.userBaseFolder(signal) };

  log.info(`Opened session (auth version ${info.authVersion})`);
  return { email: options.email, apiKey, api, hierarchy, root };
}
