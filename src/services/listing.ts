// =============================================================================
// VAULTLINE — Directory Listing
//
// Turns the server's encrypted listing into File / Directory objects by
// opening each entry's metadata with the account hierarchy. Used by the
// propagator to enumerate a subtree before sharing or linking it.
// =============================================================================

import type { ApiClient } from '../api/client';
import type { RemoteFileEntry, RemoteFolderEntry } from '../types/api';
import type { Directory, DirectoryLike, File, ListingResult } from '../types/filesystem';
import { EncryptionKey } from './crypto/keys';
import type { KeyHierarchy } from './crypto/hierarchy';
import { parseDirectoryMetadata, parseFileMetadata } from './metadata';

/** The recursive listing reports the listed directory itself under this parent. */
const LISTED_ROOT_PARENT = 'base';

export function decodeRemoteFile(entry: RemoteFileEntry, hierarchy: KeyHierarchy): File {
  const metadata = parseFileMetadata(hierarchy.decryptMeta(entry.metadata));
  return {
    type: 'file',
    uuid: entry.uuid,
    parentUuid: entry.parent,
    name: metadata.name,
    mimeType: metadata.mime,
    encryptionKey: EncryptionKey.fromString(metadata.key),
    created: new Date(metadata.creation),
    lastModified: new Date(metadata.lastModified),
    size: metadata.size,
    chunks: entry.chunks,
    bucket: entry.bucket,
    region: entry.region,
    hash: metadata.blake3,
    version: entry.version,
    favorited: entry.favorited,
  };
}

export function decodeRemoteFolder(entry: RemoteFolderEntry, hierarchy: KeyHierarchy): Directory {
  const metadata = parseDirectoryMetadata(hierarchy.decryptMeta(entry.metadata));
  const creationSeconds = metadata.creation !== 0 ? metadata.creation : entry.timestamp;
  return {
    type: 'directory',
    uuid: entry.uuid,
    parentUuid: entry.parent,
    name: metadata.name,
    created: new Date(creationSeconds * 1000),
    color: entry.color,
    favorited: entry.favorited,
  };
}

export class DirectoryLister {
  constructor(
    private readonly api: ApiClient,
    private readonly hierarchy: KeyHierarchy,
  ) {}

  /** Direct children of a directory. */
  async readDirectory(dir: DirectoryLike, signal?: AbortSignal): Promise<ListingResult> {
    const listing = await this.api.dirContent(dir.uuid, signal);
    return {
      files: listing.files.map(entry => decodeRemoteFile(entry, this.hierarchy)),
      directories: listing.folders.map(entry => decodeRemoteFolder(entry, this.hierarchy)),
    };
  }

  /** Every descendant of a directory, excluding the directory itself. */
  async listRecursive(dir: DirectoryLike, signal?: AbortSignal): Promise<ListingResult> {
    const listing = await this.api.dirDownload(dir.uuid, signal);
    return {
      files: listing.files.map(entry => decodeRemoteFile(entry, this.hierarchy)),
      directories: listing.folders
        .filter(entry => entry.parent !== LISTED_ROOT_PARENT && entry.uuid !== dir.uuid)
        .map(entry => decodeRemoteFolder(entry, this.hierarchy)),
    };
  }
}
