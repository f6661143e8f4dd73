// =============================================================================
// VAULTLINE — Upload Pipeline
//
// Plaintext source → CHUNK_SIZE pieces → BLAKE3 (read order) → per-object
// AES-GCM → ingest pool. Once the content is in, the completion handshake
// hands the server the encrypted name, size, MIME type and metadata and
// the object becomes a File.
//
// Zero-byte files skip the ingest pool and complete through the empty
// endpoint.
// =============================================================================

import type { ApiClient } from '../../api/client';
import { CHUNK_SIZE } from '../../config';
import {
  ChunkUploadFailedError,
  UploadAbortedError,
  UploadFinalizeFailedError,
} from '../../errors';
import type { ChunkUploadResponse, UploadEmptyRequest } from '../../types/api';
import type { File, IncompleteFile } from '../../types/filesystem';
import type { KeyHierarchy } from '../crypto/hierarchy';
import { generateRandomString } from '../crypto/random';
import { createLogger } from '../log';
import { fileMetadata } from '../metadata';
import { FileUpload } from './session';

const log = createLogger('Upload');

const RM_LENGTH = 32;

/** Anything that yields the file's bytes in order: a Node Readable, a generator, an array. */
export type UploadSource = AsyncIterable<Uint8Array | string> | Iterable<Uint8Array | string>;

/**
 * Regroup arbitrary pieces into exactly `chunkSize` bytes each; only the
 * last chunk may be shorter. Yields nothing for an empty source.
 */
export async function* readChunks(source: UploadSource, chunkSize: number = CHUNK_SIZE): AsyncGenerator<Buffer> {
  let parts: Buffer[] = [];
  let buffered = 0;

  for await (const piece of source) {
    let rest = typeof piece === 'string' ? Buffer.from(piece, 'utf-8') : Buffer.from(piece);
    while (rest.length > 0) {
      const take = Math.min(chunkSize - buffered, rest.length);
      parts.push(rest.subarray(0, take));
      buffered += take;
      rest = rest.subarray(take);
      if (buffered === chunkSize) {
        yield Buffer.concat(parts, buffered);
        parts = [];
        buffered = 0;
      }
    }
  }

  if (buffered > 0) {
    yield Buffer.concat(parts, buffered);
  }
}

export function chunkCount(size: number): number {
  return Math.ceil(size / CHUNK_SIZE);
}

export class UploadPipeline {
  constructor(
    private readonly api: ApiClient,
    private readonly hierarchy: KeyHierarchy,
  ) {}

  newUpload(file: IncompleteFile): FileUpload {
    return new FileUpload(file);
  }

  /**
   * Encrypt one chunk and send it to the ingest pool. Does not touch the
   * content hash; feed the plaintext to `session.absorb` in source order.
   * A failed chunk leaves the session usable so the caller may resend it.
   */
  async uploadChunk(
    session: FileUpload,
    index: number,
    plaintext: Buffer,
    signal?: AbortSignal,
  ): Promise<ChunkUploadResponse> {
    session.expect(['created', 'streaming'], 'send a chunk of');
    session.transition('streaming');

    const { file } = session;
    const encrypted = file.encryptionKey.encryptData(plaintext);

    session.chunkStarted();
    let response: ChunkUploadResponse | null = null;
    try {
      response = await this.api.uploadChunk(
        { uuid: file.uuid, index, parentUuid: file.parentUuid, uploadKey: session.uploadKey },
        encrypted,
        signal,
      );
      return response;
    } catch (err: unknown) {
      throw new ChunkUploadFailedError(index, err);
    } finally {
      session.chunkSettled(response);
    }
  }

  /**
   * Complete the upload. A non-empty upload waits for a storage
   * assignment first. On any failure the session is left `failed`.
   */
  async finalize(session: FileUpload, totalSize: number, signal?: AbortSignal): Promise<File> {
    session.expect(['created', 'streaming'], 'finalize');
    session.transition('awaiting-completion');

    const { file } = session;
    try {
      const storage = totalSize === 0 ? null : await session.waitForStorage(signal);
      const hash = session.digest();
      const request = this.completionRequest(file, totalSize, hash);

      try {
        if (storage) {
          await this.api.uploadDone(
            {
              ...request,
              chunks: chunkCount(totalSize),
              rm: generateRandomString(RM_LENGTH),
              uploadKey: session.uploadKey,
            },
            signal,
          );
        } else {
          await this.api.uploadEmpty(request, signal);
        }
      } catch (err: unknown) {
        throw new UploadFinalizeFailedError(file.uuid, err);
      }

      session.transition('completed');
      log.info(`Completed ${file.uuid} (${chunkCount(totalSize)} chunks)`);

      return {
        ...file,
        type: 'file',
        size: totalSize,
        chunks: chunkCount(totalSize),
        bucket: storage?.bucket ?? '',
        region: storage?.region ?? '',
        hash,
        version: this.hierarchy.fileEncryptionVersion,
        favorited: false,
      };
    } catch (err: unknown) {
      session.transition('failed');
      throw err;
    }
  }

  /** Stream a whole source through one session, chunks sent one at a time. */
  async uploadFile(file: IncompleteFile, source: UploadSource, signal?: AbortSignal): Promise<File> {
    const session = this.newUpload(file);
    let size = 0;
    let index = 0;

    try {
      for await (const chunk of readChunks(source)) {
        if (signal?.aborted) throw new UploadAbortedError(signal.reason);
        session.absorb(chunk);
        size += chunk.length;
        await this.uploadChunk(session, index, chunk, signal);
        index++;
      }
    } catch (err: unknown) {
      session.transition('failed');
      log.warn(`Upload ${file.uuid} stopped after ${index} chunks`);
      throw err;
    }

    return this.finalize(session, size, signal);
  }

  private completionRequest(file: IncompleteFile, size: number, hash: string): UploadEmptyRequest {
    const objectKey = file.encryptionKey.toMasterKey();
    const version = this.hierarchy.fileEncryptionVersion;
    return {
      uuid: file.uuid,
      name: objectKey.encryptMeta(file.name),
      nameHashed: this.hierarchy.hashFileName(file.name),
      size: objectKey.encryptMeta(String(size)),
      parent: file.parentUuid,
      mime: objectKey.encryptMeta(file.mimeType),
      metadata: this.hierarchy.encryptMeta(JSON.stringify(fileMetadata(file, version, size, hash))),
      version,
    };
  }
}
