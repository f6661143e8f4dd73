// =============================================================================
// VAULTLINE — Download Pipeline
//
// egest pool → per-chunk decryption → plaintext in file order. Chunks are
// fetched one at a time starting at the chunk that holds `offset`. A read
// that starts at 0 and reaches the end of the file is checked against the
// stored BLAKE3 once the last byte is out.
// =============================================================================

import { blake3 } from '@noble/hashes/blake3';
import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { ApiClient } from '../../api/client';
import { CHUNK_SIZE } from '../../config';
import {
  ChunkDownloadFailedError,
  ContentHashMismatchError,
  InvalidRangeError,
  MalformedResponseError,
} from '../../errors';
import type { File } from '../../types/filesystem';
import { generateRandomString } from '../crypto/random';
import { createLogger } from '../log';

const log = createLogger('Download');

export interface ReadOptions {
  /** First plaintext byte to return */
  offset?: number;
  /** Bytes to return from `offset`; clamped to the end of the file. Omit to read to the end. */
  limit?: number;
  signal?: AbortSignal;
}

interface ByteRange {
  start: number;
  end: number;
}

export function resolveRange(size: number, offset = 0, limit?: number): ByteRange {
  const valid =
    Number.isSafeInteger(offset) &&
    offset >= 0 &&
    offset <= size &&
    (limit === undefined || (Number.isSafeInteger(limit) && limit >= 0));
  if (!valid) {
    throw new InvalidRangeError(offset, limit ?? null, size);
  }
  return { start: offset, end: limit === undefined ? size : Math.min(size, offset + limit) };
}

export class DownloadPipeline {
  constructor(private readonly api: ApiClient) {}

  /** Fetch and decrypt one stored chunk. Any failure is reported against its index. */
  async readChunk(file: File, index: number, signal?: AbortSignal): Promise<Buffer> {
    try {
      const data = await this.api.downloadChunk(
        { uuid: file.uuid, region: file.region, bucket: file.bucket, index },
        signal,
      );
      return file.version === 1
        ? file.encryptionKey.decryptLegacyData(data)
        : file.encryptionKey.decryptData(data);
    } catch (err: unknown) {
      throw new ChunkDownloadFailedError(index, err);
    }
  }

  async *stream(file: File, options: ReadOptions = {}): AsyncGenerator<Buffer> {
    const { start, end } = resolveRange(file.size, options.offset, options.limit);
    const { signal } = options;
    const hasher = start === 0 ? blake3.create({}) : null;

    let index = Math.floor(start / CHUNK_SIZE);
    let position = index * CHUNK_SIZE;

    while (position < end) {
      signal?.throwIfAborted();
      const chunk = await this.readChunk(file, index, signal);
      if (chunk.length === 0) {
        throw new ChunkDownloadFailedError(index, new MalformedResponseError('empty chunk'));
      }

      const piece = chunk.subarray(Math.max(start - position, 0), Math.min(chunk.length, end - position));
      hasher?.update(piece);
      position += chunk.length;
      index++;
      yield piece;
    }

    if (hasher && end === file.size && file.hash !== '') {
      const actual = Buffer.from(hasher.digest()).toString('hex');
      if (actual !== file.hash) {
        log.warn(`Hash check failed for ${file.uuid}`);
        throw new ContentHashMismatchError(file.uuid, file.hash, actual);
      }
    }
    log.debug(`Read ${end - start} bytes of ${file.uuid} from ${start}`);
  }

  async readAll(file: File, options: ReadOptions = {}): Promise<Buffer> {
    const pieces: Buffer[] = [];
    for await (const piece of this.stream(file, options)) {
      pieces.push(piece);
    }
    return Buffer.concat(pieces);
  }

  toReadable(file: File, options: ReadOptions = {}): Readable {
    return Readable.from(this.stream(file, options));
  }

  /**
   * Write the whole file next to `destination` under a temporary name and
   * rename it into place once the hash has checked out. The temporary file
   * is removed on any failure.
   */
  async downloadToPath(file: File, destination: string, signal?: AbortSignal): Promise<void> {
    const temporary = path.join(
      path.dirname(destination),
      `.${path.basename(destination)}.${generateRandomString(8)}.part`,
    );

    try {
      await pipeline(this.toReadable(file, { signal }), fs.createWriteStream(temporary));
      await fs.promises.rename(temporary, destination);
    } catch (err: unknown) {
      await fs.promises.rm(temporary, { force: true });
      throw err;
    }

    log.info(`Downloaded ${file.uuid} (${file.size} bytes)`);
  }
}
