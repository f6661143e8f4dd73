// =============================================================================
// VAULTLINE — API Request / Response Shapes
//
// Only the fields the client engine produces or consumes. Field names are
// the server's.
// =============================================================================

import type { AuthVersion, EncryptedString, FileEncryptionVersion, StoredFileVersion } from './crypto';
import type { ItemTypeTag, SearchTypeTag } from './filesystem';

/** Every response body is wrapped in this envelope. */
export interface ApiEnvelope {
  status: boolean;
  message: string;
  code: string;
  data: unknown;
}

// ── Account ────────────────────────────────────────────────────────────

export interface AuthInfoResponse {
  authVersion: AuthVersion;
  salt: string;
}

export interface LoginRequest {
  email: string;
  password: string;
  twoFactorCode: string;
  authVersion: AuthVersion;
}

export interface LoginResponse {
  apiKey: string;
}

export interface KeyPairInfoResponse {
  publicKey: string;
  privateKey: EncryptedString;
}

// ── Upload ─────────────────────────────────────────────────────────────

export interface ChunkUploadParams {
  uuid: string;
  index: number;
  parentUuid: string;
  uploadKey: string;
}

/** Where a stored chunk lives: `GET {egest}/{region}/{bucket}/{uuid}/{index}` */
export interface ChunkDownloadParams {
  uuid: string;
  region: string;
  bucket: string;
  index: number;
}

export interface ChunkUploadResponse {
  bucket: string;
  region: string;
}

export interface UploadEmptyRequest {
  uuid: string;
  name: EncryptedString;
  nameHashed: string;
  size: EncryptedString;
  parent: string;
  mime: EncryptedString;
  metadata: EncryptedString;
  version: FileEncryptionVersion;
}

export interface UploadDoneRequest extends UploadEmptyRequest {
  chunks: number;
  rm: string;
  uploadKey: string;
}

// ── Sharing ────────────────────────────────────────────────────────────

export interface SharedUser {
  id: number;
  email: string;
  publicKey: string;
}

export interface ItemSharedResponse {
  sharing: boolean;
  users: SharedUser[];
}

export interface LinkedEntry {
  linkUuid: string;
  /** Link key wrapped by the owner's key hierarchy */
  linkKey: EncryptedString;
}

export interface ItemLinkedResponse {
  link: boolean;
  links: LinkedEntry[];
}

export interface SharedRenameRequest {
  uuid: string;
  receiverId: number;
  metadata: EncryptedString;
}

export interface LinkedRenameRequest {
  uuid: string;
  linkUuid: string;
  metadata: EncryptedString;
}

export interface ItemShareRequest {
  uuid: string;
  /** "none" for the root of a new share */
  parent: string;
  email: string;
  type: ItemTypeTag;
  metadata: EncryptedString;
}

export interface DirLinkAddRequest {
  uuid: string;
  /** "base" for the root of a new directory link */
  parent: string;
  linkUuid: string;
  type: ItemTypeTag;
  metadata: EncryptedString;
  key: EncryptedString;
  expiration: string;
}

export interface FileLinkEditRequest {
  uuid: string;
  fileUuid: string;
  expiration: string;
  password: string;
  passwordHashed: string;
  downloadBtn: boolean;
  type: 'enable' | 'disable';
  salt: string;
}

// ── Search ─────────────────────────────────────────────────────────────

export interface SearchAddItem {
  uuid: string;
  hash: string;
  type: SearchTypeTag;
}

// ── Listing & metadata ─────────────────────────────────────────────────

export interface RemoteFileEntry {
  uuid: string;
  parent: string;
  metadata: EncryptedString;
  bucket: string;
  region: string;
  chunks: number;
  version: StoredFileVersion;
  favorited: boolean;
}

export interface RemoteFolderEntry {
  uuid: string;
  parent: string;
  /** Encrypted DirectoryMetadata; the server calls this field `name` */
  metadata: EncryptedString;
  color: string | null;
  timestamp: number;
  favorited: boolean;
}

export interface DirListingResponse {
  files: RemoteFileEntry[];
  folders: RemoteFolderEntry[];
}

export interface FileMetadataRequest {
  uuid: string;
  name: EncryptedString;
  nameHashed: string;
  metadata: EncryptedString;
}

export interface DirMetadataRequest {
  uuid: string;
  nameHashed: string;
  metadata: EncryptedString;
}
