// =============================================================================
// VAULTLINE — Crypto Core Services
// =============================================================================

export { sha512, v2Hash, encryptData, decryptData, sealGcm, openGcm } from './encryption';
export { generateRandomString, generateRandomBytes } from './random';
export {
  MasterKey,
  MasterKeyRing,
  EncryptionKey,
  evpBytesToKey,
  decryptLegacyChunk,
  metaCrypterFromKeyString,
} from './keys';
export {
  HmacKey,
  publicKeyFromString,
  publicKeyToString,
  privateKeyToString,
  keyPairFromStrings,
  publicEncrypt,
  privateDecrypt,
} from './rsa';
export type { RsaKeyPair } from './rsa';
export {
  createKeyHierarchy,
  assertAuthVersion,
  LegacyKeyHierarchy,
  CurrentKeyHierarchy,
} from './hierarchy';
export type { KeyHierarchy, HierarchyKeys } from './hierarchy';
export { deriveLegacyCredentials, deriveCurrentCredentials, deriveV1Credentials } from './password';
