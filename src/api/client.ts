import fetch, { Response } from 'node-fetch';
// =============================================================================
// VAULTLINE — API Transport
//
// The engine talks to the server only through the ApiClient interface.
// HttpApiClient implements it over node-fetch: Bearer API key, JSON
// envelope {status, message, code, data}, a per-request timeout merged
// with the caller's AbortSignal, and random selection from the gateway,
// ingest and egest URL pools. Chunk downloads are the one call whose body
// is raw bytes rather than an envelope.
//
// No retry or backoff here; callers re-invoke.
// =============================================================================

import { config } from '../config';
import { ApiError } from '../errors';
import { assertAuthVersion } from '../services/crypto/hierarchy';
import { sha512 } from '../services/crypto/encryption';
import { createLogger } from '../services/log';
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
} from '../types/api';
import type { EncryptedString, StoredFileVersion } from '../types/crypto';
import { asArray, asObject, bool, JsonObject, num, optStr, str } from './decode';

const log = createLogger('Api');

// ── Interface ──────────────────────────────────────────────────────────

export interface ApiClient {
  /** The same transport authorized with `apiKey`. */
  withApiKey(apiKey: string): ApiClient;

  authInfo(email: string, signal?: AbortSignal): Promise<AuthInfoResponse>;
  login(request: LoginRequest, signal?: AbortSignal): Promise<LoginResponse>;
  userMasterKeys(encryptedMasterKey: EncryptedString, signal?: AbortSignal): Promise<EncryptedString>;
  userDek(signal?: AbortSignal): Promise<EncryptedString>;
  userKeyPairInfo(signal?: AbortSignal): Promise<KeyPairInfoResponse>;
  userBaseFolder(signal?: AbortSignal): Promise<string>;
  userPublicKey(email: string, signal?: AbortSignal): Promise<string>;

  uploadChunk(params: ChunkUploadParams, data: Buffer, signal?: AbortSignal): Promise<ChunkUploadResponse>;
  uploadDone(request: UploadDoneRequest, signal?: AbortSignal): Promise<void>;
  uploadEmpty(request: UploadEmptyRequest, signal?: AbortSignal): Promise<void>;

  /** The stored (still encrypted) bytes of one chunk. */
  downloadChunk(params: ChunkDownloadParams, signal?: AbortSignal): Promise<Buffer>;

  itemShared(uuid: string, signal?: AbortSignal): Promise<ItemSharedResponse>;
  itemLinked(uuid: string, signal?: AbortSignal): Promise<ItemLinkedResponse>;
  dirLinked(uuid: string, signal?: AbortSignal): Promise<ItemLinkedResponse>;
  itemSharedRename(request: SharedRenameRequest, signal?: AbortSignal): Promise<void>;
  itemLinkedRename(request: LinkedRenameRequest, signal?: AbortSignal): Promise<void>;
  itemShare(request: ItemShareRequest, signal?: AbortSignal): Promise<void>;
  dirLinkAdd(request: DirLinkAddRequest, signal?: AbortSignal): Promise<void>;
  fileLinkEdit(request: FileLinkEditRequest, signal?: AbortSignal): Promise<void>;

  searchAdd(items: SearchAddItem[], signal?: AbortSignal): Promise<void>;

  /** Every descendant of a directory in one call; includes the directory itself with parent "base". */
  dirDownload(uuid: string, signal?: AbortSignal): Promise<DirListingResponse>;
  /** Direct children only. */
  dirContent(uuid: string, signal?: AbortSignal): Promise<DirListingResponse>;
  fileMetadata(request: FileMetadataRequest, signal?: AbortSignal): Promise<void>;
  dirMetadata(request: DirMetadataRequest, signal?: AbortSignal): Promise<void>;
  fileMove(uuid: string, to: string, signal?: AbortSignal): Promise<void>;
  dirMove(uuid: string, to: string, signal?: AbortSignal): Promise<void>;
}

// ── Response decoding ──────────────────────────────────────────────────

function fileVersion(value: number): StoredFileVersion {
  if (value === 1 || value === 3) return value;
  return 2;
}

function decodeShared(data: unknown): ItemSharedResponse {
  const obj = asObject(data, 'shared');
  return {
    sharing: bool(obj, 'sharing'),
    users: asArray(obj.users, 'shared.users').map(entry => {
      const user = asObject(entry, 'shared user');
      return {
        id: num(user, 'id', 'shared user'),
        email: str(user, 'email', 'shared user'),
        publicKey: str(user, 'publicKey', 'shared user'),
      };
    }),
  };
}

function decodeLinked(data: unknown): ItemLinkedResponse {
  const obj = asObject(data, 'linked');
  return {
    link: bool(obj, 'link'),
    links: asArray(obj.links, 'linked.links').map(entry => {
      const link = asObject(entry, 'link');
      return {
        linkUuid: str(link, 'linkUUID', 'link'),
        linkKey: str(link, 'linkKey', 'link'),
      };
    }),
  };
}

function decodeFileEntry(entry: unknown): RemoteFileEntry {
  const file = asObject(entry, 'file entry');
  return {
    uuid: str(file, 'uuid', 'file entry'),
    parent: str(file, 'parent', 'file entry'),
    metadata: str(file, 'metadata', 'file entry'),
    bucket: optStr(file, 'bucket') ?? '',
    region: optStr(file, 'region') ?? '',
    chunks: num(file, 'chunks', 'file entry'),
    version: fileVersion(num(file, 'version', 'file entry')),
    favorited: bool(file, 'favorited'),
  };
}

function decodeFolderEntry(entry: unknown): RemoteFolderEntry {
  const folder = asObject(entry, 'folder entry');
  return {
    uuid: str(folder, 'uuid', 'folder entry'),
    parent: str(folder, 'parent', 'folder entry'),
    metadata: str(folder, 'name', 'folder entry'),
    color: optStr(folder, 'color'),
    timestamp: typeof folder.timestamp === 'number' ? folder.timestamp : 0,
    favorited: bool(folder, 'favorited'),
  };
}

function decodeListing(data: unknown, filesKey: 'files' | 'uploads'): DirListingResponse {
  const obj = asObject(data, 'listing');
  return {
    files: asArray(obj[filesKey], `listing.${filesKey}`).map(decodeFileEntry),
    folders: asArray(obj.folders, 'listing.folders').map(decodeFolderEntry),
  };
}

// ── HTTP implementation ────────────────────────────────────────────────

type Pool = 'gateway' | 'ingest' | 'egest';

type Body = { kind: 'json'; value: unknown } | { kind: 'raw'; value: Buffer } | { kind: 'none' };

export interface HttpApiClientOptions {
  apiKey?: string;
  gatewayUrls?: readonly string[];
  ingestUrls?: readonly string[];
  egestUrls?: readonly string[];
  timeoutMs?: number;
}

interface RawResponse {
  status: number;
  ok: boolean;
  body: Buffer;
}

export class HttpApiClient implements ApiClient {
  private readonly apiKey: string | null;
  private readonly gatewayUrls: readonly string[];
  private readonly ingestUrls: readonly string[];
  private readonly egestUrls: readonly string[];
  private readonly timeoutMs: number;

  constructor(options: HttpApiClientOptions = {}) {
    this.apiKey = options.apiKey ?? null;
    this.gatewayUrls = options.gatewayUrls ?? config.api.gatewayUrls;
    this.ingestUrls = options.ingestUrls ?? config.api.ingestUrls;
    this.egestUrls = options.egestUrls ?? config.api.egestUrls;
    this.timeoutMs = options.timeoutMs ?? config.api.requestTimeoutMs;
    if (this.gatewayUrls.length === 0 || this.ingestUrls.length === 0 || this.egestUrls.length === 0) {
      throw new Error('HttpApiClient needs at least one URL in every pool');
    }
  }

  /** Same pools and timeout, authorized with `apiKey`. */
  withApiKey(apiKey: string): HttpApiClient {
    return new HttpApiClient({
      apiKey,
      gatewayUrls: this.gatewayUrls,
      ingestUrls: this.ingestUrls,
      egestUrls: this.egestUrls,
      timeoutMs: this.timeoutMs,
    });
  }

  private pickUrl(pool: Pool): string {
    const urls = { gateway: this.gatewayUrls, ingest: this.ingestUrls, egest: this.egestUrls }[pool];
    return urls[Math.floor(Math.random() * urls.length)];
  }

  /** Send one request and read the whole body. Network failures and timeouts become ApiError. */
  private async send(
    method: 'GET' | 'POST',
    pool: Pool,
    path: string,
    body: Body,
    signal?: AbortSignal,
  ): Promise<RawResponse> {
    const url = this.pickUrl(pool) + path;
    const routePath = path.split('?')[0];

    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(new Error(`Request timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs,
    );
    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const headers: Record<string, string> = {};
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    let payload: string | Buffer | undefined;
    switch (body.kind) {
      case 'json':
        headers['Content-Type'] = 'application/json';
        payload = JSON.stringify(body.value);
        break;
      case 'raw':
        headers['Content-Type'] = 'application/octet-stream';
        payload = body.value;
        break;
      case 'none':
        payload = undefined;
        break;
    }

    try {
      const response: Response = await fetch(url, { method, headers, body: payload, signal: controller.signal });
      return {
        status: response.status,
        ok: response.ok,
        body: Buffer.from(await response.arrayBuffer()),
      };
    } catch (err: unknown) {
      throw new ApiError(method, routePath, 'Cannot send request', { cause: err });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /** Send one request and return the envelope's `data`. */
  private async request(
    method: 'GET' | 'POST',
    pool: Pool,
    path: string,
    body: Body,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const routePath = path.split('?')[0];
    const response = await this.send(method, pool, path, body, signal);

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body.toString('utf-8'));
    } catch {
      throw new ApiError(method, routePath, `Response is not JSON (HTTP ${response.status})`, {
        httpStatus: response.status,
      });
    }

    const envelope = asObject(parsed, 'envelope');
    if (envelope.status !== true) {
      const message = optStr(envelope, 'message') ?? `HTTP ${response.status}`;
      const apiCode = optStr(envelope, 'code') ?? undefined;
      log.debug(`${method} ${routePath} rejected (${apiCode ?? response.status})`);
      throw new ApiError(method, routePath, message, { httpStatus: response.status, apiCode });
    }
    if (!response.ok) {
      throw new ApiError(method, routePath, `HTTP ${response.status}`, { httpStatus: response.status });
    }
    return envelope.data;
  }

  private post(path: string, value: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.request('POST', 'gateway', path, { kind: 'json', value }, signal);
  }

  private get(path: string, signal?: AbortSignal): Promise<unknown> {
    return this.request('GET', 'gateway', path, { kind: 'none' }, signal);
  }

  private async dataObject(promise: Promise<unknown>, what: string): Promise<JsonObject> {
    return asObject(await promise, what);
  }

  // ── Account ──────────────────────────────────────────────────────────

  async authInfo(email: string, signal?: AbortSignal): Promise<AuthInfoResponse> {
    const data = await this.dataObject(this.post('/v3/auth/info', { email }, signal), 'auth info');
    return {
      authVersion: assertAuthVersion(num(data, 'authVersion', 'auth info')),
      salt: optStr(data, 'salt') ?? '',
    };
  }

  async login(request: LoginRequest, signal?: AbortSignal): Promise<LoginResponse> {
    const data = await this.dataObject(this.post('/v3/login', request, signal), 'login');
    return { apiKey: str(data, 'apiKey', 'login') };
  }

  async userMasterKeys(encryptedMasterKey: EncryptedString, signal?: AbortSignal): Promise<EncryptedString> {
    const data = await this.dataObject(
      this.post('/v3/user/masterKeys', { masterKeys: encryptedMasterKey }, signal),
      'master keys',
    );
    return str(data, 'keys', 'master keys');
  }

  async userDek(signal?: AbortSignal): Promise<EncryptedString> {
    const data = await this.dataObject(this.get('/v3/user/dek', signal), 'dek');
    return str(data, 'dek', 'dek');
  }

  async userKeyPairInfo(signal?: AbortSignal): Promise<KeyPairInfoResponse> {
    const data = await this.dataObject(this.get('/v3/user/keyPair/info', signal), 'key pair');
    return {
      publicKey: str(data, 'publicKey', 'key pair'),
      privateKey: str(data, 'privateKey', 'key pair'),
    };
  }

  async userBaseFolder(signal?: AbortSignal): Promise<string> {
    const data = await this.dataObject(this.get('/v3/user/baseFolder', signal), 'base folder');
    return str(data, 'uuid', 'base folder');
  }

  async userPublicKey(email: string, signal?: AbortSignal): Promise<string> {
    const data = await this.dataObject(this.post('/v3/user/publicKey', { email }, signal), 'public key');
    return str(data, 'publicKey', 'public key');
  }

  // ── Upload ───────────────────────────────────────────────────────────

  async uploadChunk(params: ChunkUploadParams, data: Buffer, signal?: AbortSignal): Promise<ChunkUploadResponse> {
    const query = new URLSearchParams({
      uuid: params.uuid,
      index: String(params.index),
      parent: params.parentUuid,
      uploadKey: params.uploadKey,
      hash: sha512(data),
    });
    const response = asObject(
      await this.request('POST', 'ingest', `/v3/upload?${query.toString()}`, { kind: 'raw', value: data }, signal),
      'chunk upload',
    );
    return {
      bucket: str(response, 'bucket', 'chunk upload'),
      region: str(response, 'region', 'chunk upload'),
    };
  }

  async uploadDone(request: UploadDoneRequest, signal?: AbortSignal): Promise<void> {
    await this.post('/v3/upload/done', request, signal);
  }

  async uploadEmpty(request: UploadEmptyRequest, signal?: AbortSignal): Promise<void> {
    await this.post('/v3/upload/empty', request, signal);
  }

  // ── Download ─────────────────────────────────────────────────────────

  async downloadChunk(params: ChunkDownloadParams, signal?: AbortSignal): Promise<Buffer> {
    const path = [params.region, params.bucket, params.uuid, String(params.index)]
      .map(segment => `/${encodeURIComponent(segment)}`)
      .join('');
    const response = await this.send('GET', 'egest', path, { kind: 'none' }, signal);
    if (!response.ok) {
      log.debug(`GET chunk ${params.index} of ${params.uuid} answered HTTP ${response.status}`);
      throw new ApiError('GET', path, `HTTP ${response.status}`, { httpStatus: response.status });
    }
    return response.body;
  }

  // ── Sharing ──────────────────────────────────────────────────────────

  async itemShared(uuid: string, signal?: AbortSignal): Promise<ItemSharedResponse> {
    return decodeShared(await this.post('/v3/item/shared', { uuid }, signal));
  }

  async itemLinked(uuid: string, signal?: AbortSignal): Promise<ItemLinkedResponse> {
    return decodeLinked(await this.post('/v3/item/linked', { uuid }, signal));
  }

  async dirLinked(uuid: string, signal?: AbortSignal): Promise<ItemLinkedResponse> {
    return decodeLinked(await this.post('/v3/dir/linked', { uuid }, signal));
  }

  async itemSharedRename(request: SharedRenameRequest, signal?: AbortSignal): Promise<void> {
    await this.post('/v3/item/shared/rename', request, signal);
  }

  async itemLinkedRename(request: LinkedRenameRequest, signal?: AbortSignal): Promise<void> {
    await this.post(
      '/v3/item/linked/rename',
      { uuid: request.uuid, linkUUID: request.linkUuid, metadata: request.metadata },
      signal,
    );
  }

  async itemShare(request: ItemShareRequest, signal?: AbortSignal): Promise<void> {
    await this.post('/v3/item/share', request, signal);
  }

  async dirLinkAdd(request: DirLinkAddRequest, signal?: AbortSignal): Promise<void> {
    await this.post(
      '/v3/dir/link/add',
      {
        uuid: request.uuid,
        parent: request.parent,
        linkUUID: request.linkUuid,
        type: request.type,
        metadata: request.metadata,
        key: request.key,
        expiration: request.expiration,
      },
      signal,
    );
  }

  async fileLinkEdit(request: FileLinkEditRequest, signal?: AbortSignal): Promise<void> {
    await this.post(
      '/v3/file/link/edit',
      {
        uuid: request.uuid,
        fileUUID: request.fileUuid,
        expiration: request.expiration,
        password: request.password,
        passwordHashed: request.passwordHashed,
        downloadBtn: request.downloadBtn,
        type: request.type,
        salt: request.salt,
      },
      signal,
    );
  }

  // ── Search ───────────────────────────────────────────────────────────

  async searchAdd(items: SearchAddItem[], signal?: AbortSignal): Promise<void> {
    await this.post('/v3/search/add', { items }, signal);
  }

  // ── Listing & metadata ───────────────────────────────────────────────

  async dirDownload(uuid: string, signal?: AbortSignal): Promise<DirListingResponse> {
    return decodeListing(await this.post('/v3/dir/download', { uuid, skipCache: 'true' }, signal), 'files');
  }

  async dirContent(uuid: string, signal?: AbortSignal): Promise<DirListingResponse> {
    return decodeListing(await this.post('/v3/dir/content', { uuid }, signal), 'uploads');
  }

  async fileMetadata(request: FileMetadataRequest, signal?: AbortSignal): Promise<void> {
    await this.post('/v3/file/metadata', request, signal);
  }

  async dirMetadata(request: DirMetadataRequest, signal?: AbortSignal): Promise<void> {
    await this.post(
      '/v3/dir/metadata',
      { uuid: request.uuid, nameHashed: request.nameHashed, name: request.metadata },
      signal,
    );
  }

  async fileMove(uuid: string, to: string, signal?: AbortSignal): Promise<void> {
    await this.post('/v3/file/move', { uuid, to }, signal);
  }

  async dirMove(uuid: string, to: string, signal?: AbortSignal): Promise<void> {
    await this.post('/v3/dir/move', { uuid, to }, signal);
  }
}
