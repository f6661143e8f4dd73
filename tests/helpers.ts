// =============================================================================
// VAULTLINE — Test Helpers
//
// In-memory ApiClient that records every request, plus key fixtures.
// Nothing here touches the network.
// =============================================================================

import { generateKeyPairSync } from 'crypto';
import type { ApiClient } from '../src/api/client';
import type {
  AuthInfoResponse,
  ChunkDownloadParams,
  ChunkUploadParams,
  ChunkUploadResponse,
  DirLinkAddRequest,
  DirListingResponse,
  DirMetadataRequest,
  FileLinkEditRequest,
  FileMetadataRequest,
  ItemLinkedResponse,
  ItemShareRequest,
  ItemSharedResponse,
  KeyPairInfoResponse,
  LinkedRenameRequest,
  LoginRequest,
  LoginResponse,
  RemoteFileEntry,
  RemoteFolderEntry,
  SearchAddItem,
  SharedRenameRequest,
  UploadDoneRequest,
  UploadEmptyRequest,
} from '../src/types/api';
import { createKeyHierarchy, KeyHierarchy } from '../src/services/crypto/hierarchy';
import { EncryptionKey, MasterKey, MasterKeyRing } from '../src/services/crypto/keys';
import type { RsaKeyPair } from '../src/services/crypto/rsa';
import type { Directory, File } from '../src/types/filesystem';

// ── Keys ───────────────────────────────────────────────────────────────

const keyPairs: RsaKeyPair[] = [];

/** RSA-2048 keypairs are slow to generate; each index is built once per run. */
export function testKeyPair(index = 0): RsaKeyPair {
  while (keyPairs.length <= index) {
    keyPairs.push(generateKeyPairSync('rsa', { modulusLength: 2048 }));
  }
  return keyPairs[index];
}

export const TEST_MASTER_KEY = 'test-master-key-0000000000000000';
export const TEST_OLD_MASTER_KEY = 'test-old-master-key-000000000000';
export const TEST_DEK_HEX = '11'.repeat(32);

export function legacyHierarchy(keys: string[] = [TEST_OLD_MASTER_KEY, TEST_MASTER_KEY]): KeyHierarchy {
  const ring = new MasterKeyRing(keys.map(key => MasterKey.fromString(key)));
  return createKeyHierarchy({ authVersion: 2, ring, keyPair: testKeyPair() });
}

export function currentHierarchy(dekHex: string = TEST_DEK_HEX): KeyHierarchy {
  return createKeyHierarchy({ authVersion: 3, dek: EncryptionKey.fromHex(dekHex), keyPair: testKeyPair() });
}

// ── Filesystem fixtures ────────────────────────────────────────────────

export function testDirectory(uuid: string, parentUuid: string, name: string): Directory {
  return {
    type: 'directory',
    uuid,
    parentUuid,
    name,
    created: new Date(1_700_000_000_000),
    color: null,
    favorited: false,
  };
}

export function testFile(uuid: string, parentUuid: string, name: string, key?: EncryptionKey): File {
  return {
    type: 'file',
    uuid,
    parentUuid,
    name,
    mimeType: 'text/plain',
    encryptionKey: key ?? EncryptionKey.fromHex('22'.repeat(32)),
    created: new Date(1_700_000_000_000),
    lastModified: new Date(1_700_000_500_000),
    size: 5,
    chunks: 1,
    bucket: 'bucket-a',
    region: 'region-a',
    hash: 'ab'.repeat(32),
    version: 3,
    favorited: false,
  };
}

export function remoteFolder(hierarchy: KeyHierarchy, dir: Directory): RemoteFolderEntry {
  return {
    uuid: dir.uuid,
    parent: dir.parentUuid,
    metadata: hierarchy.encryptMeta(
      JSON.stringify({ name: dir.name, creation: Math.floor(dir.created.getTime() / 1000) }),
    ),
    color: dir.color,
    timestamp: Math.floor(dir.created.getTime() / 1000),
    favorited: dir.favorited,
  };
}

export function remoteFile(hierarchy: KeyHierarchy, file: File): RemoteFileEntry {
  return {
    uuid: file.uuid,
    parent: file.parentUuid,
    metadata: hierarchy.encryptMeta(
      JSON.stringify({
        name: file.name,
        size: file.size,
        mime: file.mimeType,
        key: file.encryptionKey.toString(hierarchy.fileEncryptionVersion),
        lastModified: file.lastModified.getTime(),
        creation: file.created.getTime(),
        blake3: file.hash,
      }),
    ),
    bucket: file.bucket,
    region: file.region,
    chunks: file.chunks,
    version: file.version,
    favorited: file.favorited,
  };
}

// ── Fake transport ─────────────────────────────────────────────────────

const NOT_SHARED: ItemSharedResponse = { sharing: false, users: [] };
const NOT_LINKED: ItemLinkedResponse = { link: false, links: [] };
const EMPTY_LISTING: DirListingResponse = { files: [], folders: [] };

/**
 * Runs before every recorded request. Throw (or reject) to make that
 * request fail; await to hold it in flight.
 */
export type CallHook = (method: string, arg: unknown) => void | Promise<void>;

export class FakeApiClient implements ApiClient {
  /** Method names in the order they were called */
  readonly calls: string[] = [];
  onCall: CallHook | null = null;
  apiKey: string | null = null;

  // Account
  authInfoResponse: AuthInfoResponse = { authVersion: 3, salt: '' };
  sealedMasterKeys = '';
  sealedDek = '';
  keyPairInfo: KeyPairInfoResponse = { publicKey: '', privateKey: '' };
  baseFolder = 'root-uuid';
  readonly publicKeys = new Map<string, string>();

  // Server-side share state, by item uuid
  readonly shared = new Map<string, ItemSharedResponse>();
  readonly linked = new Map<string, ItemLinkedResponse>();
  readonly dirLinks = new Map<string, ItemLinkedResponse>();
  readonly downloads = new Map<string, DirListingResponse>();
  readonly contents = new Map<string, DirListingResponse>();

  /** Stored chunk bytes by `${uuid}/${index}`; uploaded chunks are found too */
  readonly storedChunks = new Map<string, Buffer>();

  chunkResponse: (index: number) => ChunkUploadResponse = index => ({
    bucket: `bucket-${index}`,
    region: `region-${index}`,
  });

  // Recorded requests
  readonly logins: LoginRequest[] = [];
  readonly masterKeyRequests: string[] = [];
  readonly chunks: Array<{ params: ChunkUploadParams; data: Buffer }> = [];
  readonly uploadsDone: UploadDoneRequest[] = [];
  readonly uploadsEmpty: UploadEmptyRequest[] = [];
  readonly chunkDownloads: ChunkDownloadParams[] = [];
  readonly sharedRenames: SharedRenameRequest[] = [];
  readonly linkedRenames: LinkedRenameRequest[] = [];
  readonly itemShares: ItemShareRequest[] = [];
  readonly dirLinkAdds: DirLinkAddRequest[] = [];
  readonly fileLinkEdits: FileLinkEditRequest[] = [];
  readonly searchAdds: SearchAddItem[][] = [];
  readonly fileMetadataUpdates: FileMetadataRequest[] = [];
  readonly dirMetadataUpdates: DirMetadataRequest[] = [];
  readonly moves: Array<{ kind: 'file' | 'dir'; uuid: string; to: string }> = [];

  count(method: string): number {
    return this.calls.filter(call => call === method).length;
  }

  private async step(method: string, arg: unknown, signal?: AbortSignal): Promise<void> {
    this.calls.push(method);
    if (signal?.aborted) throw signal.reason;
    if (this.onCall) await this.onCall(method, arg);
  }

  withApiKey(apiKey: string): ApiClient {
    this.apiKey = apiKey;
    return this;
  }

  async authInfo(email: string, signal?: AbortSignal): Promise<AuthInfoResponse> {
    await this.step('authInfo', email, signal);
    return this.authInfoResponse;
  }

  async login(request: LoginRequest, signal?: AbortSignal): Promise<LoginResponse> {
    await this.step('login', request, signal);
    this.logins.push(request);
    return { apiKey: 'test-api-key' };
  }

  async userMasterKeys(encryptedMasterKey: string, signal?: AbortSignal): Promise<string> {
    await this.step('userMasterKeys', encryptedMasterKey, signal);
    this.masterKeyRequests.push(encryptedMasterKey);
    return this.sealedMasterKeys;
  }

  async userDek(signal?: AbortSignal): Promise<string> {
    await this.step('userDek', null, signal);
    return this.sealedDek;
  }

  async userKeyPairInfo(signal?: AbortSignal): Promise<KeyPairInfoResponse> {
    await this.step('userKeyPairInfo', null, signal);
    return this.keyPairInfo;
  }

  async userBaseFolder(signal?: AbortSignal): Promise<string> {
    await this.step('userBaseFolder', null, signal);
    return this.baseFolder;
  }

  async userPublicKey(email: string, signal?: AbortSignal): Promise<string> {
    await this.step('userPublicKey', email, signal);
    const key = this.publicKeys.get(email);
    if (!key) throw new Error(`No such user ${email}`);
    return key;
  }

  async uploadChunk(params: ChunkUploadParams, data: Buffer, signal?: AbortSignal): Promise<ChunkUploadResponse> {
    await this.step('uploadChunk', params, signal);
    this.chunks.push({ params, data });
    return this.chunkResponse(params.index);
  }

  async uploadDone(request: UploadDoneRequest, signal?: AbortSignal): Promise<void> {
    await this.step('uploadDone', request, signal);
    this.uploadsDone.push(request);
  }

  async uploadEmpty(request: UploadEmptyRequest, signal?: AbortSignal): Promise<void> {
    await this.step('uploadEmpty', request, signal);
    this.uploadsEmpty.push(request);
  }

  async downloadChunk(params: ChunkDownloadParams, signal?: AbortSignal): Promise<Buffer> {
    await this.step('downloadChunk', params, signal);
    this.chunkDownloads.push(params);
    const stored =
      this.storedChunks.get(`${params.uuid}/${params.index}`) ??
      this.chunks.find(chunk => chunk.params.uuid === params.uuid && chunk.params.index === params.index)?.data;
    if (!stored) throw new Error(`No chunk ${params.index} of ${params.uuid}`);
    return stored;
  }

  async itemShared(uuid: string, signal?: AbortSignal): Promise<ItemSharedResponse> {
    await this.step('itemShared', uuid, signal);
    return this.shared.get(uuid) ?? NOT_SHARED;
  }

  async itemLinked(uuid: string, signal?: AbortSignal): Promise<ItemLinkedResponse> {
    await this.step('itemLinked', uuid, signal);
    return this.linked.get(uuid) ?? NOT_LINKED;
  }

  async dirLinked(uuid: string, signal?: AbortSignal): Promise<ItemLinkedResponse> {
    await this.step('dirLinked', uuid, signal);
    return this.dirLinks.get(uuid) ?? NOT_LINKED;
  }

  async itemSharedRename(request: SharedRenameRequest, signal?: AbortSignal): Promise<void> {
    await this.step('itemSharedRename', request, signal);
    this.sharedRenames.push(request);
  }

  async itemLinkedRename(request: LinkedRenameRequest, signal?: AbortSignal): Promise<void> {
    await this.step('itemLinkedRename', request, signal);
    this.linkedRenames.push(request);
  }

  async itemShare(request: ItemShareRequest, signal?: AbortSignal): Promise<void> {
    await this.step('itemShare', request, signal);
    this.itemShares.push(request);
  }

  async dirLinkAdd(request: DirLinkAddRequest, signal?: AbortSignal): Promise<void> {
    await this.step('dirLinkAdd', request, signal);
    this.dirLinkAdds.push(request);
  }

  async fileLinkEdit(request: FileLinkEditRequest, signal?: AbortSignal): Promise<void> {
    await this.step('fileLinkEdit', request, signal);
    this.fileLinkEdits.push(request);
  }

  async searchAdd(items: SearchAddItem[], signal?: AbortSignal): Promise<void> {
    await this.step('searchAdd', items, signal);
    this.searchAdds.push(items);
  }

  async dirDownload(uuid: string, signal?: AbortSignal): Promise<DirListingResponse> {
    await this.step('dirDownload', uuid, signal);
    return this.downloads.get(uuid) ?? EMPTY_LISTING;
  }

  async dirContent(uuid: string, signal?: AbortSignal): Promise<DirListingResponse> {
    await this.step('dirContent', uuid, signal);
    return this.contents.get(uuid) ?? EMPTY_LISTING;
  }

  async fileMetadata(request: FileMetadataRequest, signal?: AbortSignal): Promise<void> {
    await this.step('fileMetadata', request, signal);
    this.fileMetadataUpdates.push(request);
  }

  async dirMetadata(request: DirMetadataRequest, signal?: AbortSignal): Promise<void> {
    await this.step('dirMetadata', request, signal);
    this.dirMetadataUpdates.push(request);
  }

  async fileMove(uuid: string, to: string, signal?: AbortSignal): Promise<void> {
    await this.step('fileMove', { uuid, to }, signal);
    this.moves.push({ kind: 'file', uuid, to });
  }

  async dirMove(uuid: string, to: string, signal?: AbortSignal): Promise<void> {
    await this.step('dirMove', { uuid, to }, signal);
    this.moves.push({ kind: 'dir', uuid, to });
  }
}

/** Resolves after every queued microtask and one macrotask turn. */
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
