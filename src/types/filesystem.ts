// =============================================================================
// VAULTLINE — File System Object Model
//
// A closed tagged union over file, directory and root. Every dispatch site
// switches on `type` so the compiler checks the cases are exhaustive.
// =============================================================================

import type { EncryptionKey } from '../services/crypto/keys';
import type { StoredFileVersion } from './crypto';

/**
 * A file that exists locally but whose content has not finished
 * uploading. No size, hash or storage location yet.
 */
export interface IncompleteFile {
  uuid: string;
  name: string;
  parentUuid: string;
  mimeType: string;
  encryptionKey: EncryptionKey;
  created: Date;
  lastModified: Date;
}

export interface File extends IncompleteFile {
  type: 'file';
  size: number;
  /** Number of CHUNK_SIZE pieces the content is stored in */
  chunks: number;
  bucket: string;
  region: string;
  /** Hex BLAKE3 of the plaintext content */
  hash: string;
  version: StoredFileVersion;
  favorited: boolean;
}

export interface Directory {
  type: 'directory';
  uuid: string;
  name: string;
  parentUuid: string;
  created: Date;
  color: string | null;
  favorited: boolean;
}

/** The account's base folder. It has no name, parent or metadata. */
export interface RootDirectory {
  type: 'root';
  uuid: string;
}

export type FileSystemObject = File | Directory | RootDirectory;
export type NonRootObject = File | Directory;
export type DirectoryLike = Directory | RootDirectory;

/** Wire tag for an item. Directories are called folders on the wire. */
export type ItemTypeTag = 'file' | 'folder';

/** The search index keeps the unabbreviated tag. */
export type SearchTypeTag = 'file' | 'directory';

// ── Metadata blobs ─────────────────────────────────────────────────────

/** Plaintext of a file's `metadata` field. Key order is the wire order. */
export interface FileMetadata {
  name: string;
  size: number;
  mime: string;
  key: string;
  lastModified: number;
  creation: number;
  blake3: string;
}

/** Plaintext of a directory's `name` field. `creation` is in seconds. */
export interface DirectoryMetadata {
  name: string;
  creation: number;
}

// ── Propagation targets ────────────────────────────────────────────────

/** One item to hand to every recipient or link of a fan-out. */
export interface ShareTarget {
  uuid: string;
  parentUuid: string;
  type: ItemTypeTag;
  /** Plaintext metadata JSON, encrypted per target just before sending */
  metadata: string;
}

export interface ListingResult {
  files: File[];
  directories: Directory[];
}
