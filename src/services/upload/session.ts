// =============================================================================
// VAULTLINE — Upload Session
//
// One FileUpload per upload call. Holds the random UploadKey that
// authorizes chunk writes, the running BLAKE3 over plaintext in read order,
// and the first storage assignment a chunk response reported. Never
// persisted and never registered anywhere; it lives as long as the call.
//
//   created → streaming → awaiting-completion → completed
//                  └──────────────┴──────────→ failed
// =============================================================================

import { blake3 } from '@noble/hashes/blake3';
import { InvalidUploadStateError, NoChunksUploadedError, UploadAbortedError } from '../../errors';
import type { ChunkUploadResponse } from '../../types/api';
import type { IncompleteFile } from '../../types/filesystem';
import { generateRandomString } from '../crypto/random';

export type UploadState = 'created' | 'streaming' | 'awaiting-completion' | 'completed' | 'failed';

const UPLOAD_KEY_LENGTH = 32;

export class FileUpload {
  readonly file: IncompleteFile;
  readonly uploadKey: string;
  private currentState: UploadState = 'created';
  private readonly hasher = blake3.create({});
  private hashedBytes = 0;
  private assignment: ChunkUploadResponse | null = null;
  private chunksInFlight = 0;
  private acceptedChunks = 0;
  private readonly settleWaiters: Array<() => void> = [];

  constructor(file: IncompleteFile) {
    this.file = file;
    this.uploadKey = generateRandomString(UPLOAD_KEY_LENGTH);
  }

  get state(): UploadState {
    return this.currentState;
  }

  /** First bucket/region any chunk response reported, if one has. */
  get storage(): ChunkUploadResponse | null {
    return this.assignment;
  }

  get bytesHashed(): number {
    return this.hashedBytes;
  }

  get chunksAccepted(): number {
    return this.acceptedChunks;
  }

  /** Feed plaintext into the content hash. Must be called in source order. */
  absorb(plaintext: Uint8Array): void {
    this.expect(['created', 'streaming'], 'hash content for');
    this.hasher.update(plaintext);
    this.hashedBytes += plaintext.length;
  }

  /** Hex BLAKE3 of everything absorbed. Finishes the hash; call once. */
  digest(): string {
    return Buffer.from(this.hasher.digest()).toString('hex');
  }

  expect(allowed: UploadState[], operation: string): void {
    if (!allowed.includes(this.currentState)) {
      throw new InvalidUploadStateError(this.file.uuid, this.currentState, operation);
    }
  }

  transition(next: UploadState): void {
    this.currentState = next;
  }

  chunkStarted(): void {
    this.chunksInFlight++;
  }

  chunkSettled(response: ChunkUploadResponse | null): void {
    this.chunksInFlight--;
    if (response) {
      this.acceptedChunks++;
      // Later assignments for the same object are informational only
      if (!this.assignment) this.assignment = response;
    }
    for (const notify of this.settleWaiters.splice(0)) notify();
  }

  /**
   * Resolve with the storage assignment, waiting on chunks still in
   * flight.
   * @throws UploadAbortedError when the signal fires first
   * @throws NoChunksUploadedError when nothing is in flight and nothing succeeded
   */
  async waitForStorage(signal?: AbortSignal): Promise<ChunkUploadResponse> {
    for (;;) {
      if (this.assignment) return this.assignment;
      if (signal?.aborted) throw new UploadAbortedError(signal.reason);
      if (this.chunksInFlight === 0) throw new NoChunksUploadedError(this.file.uuid);

      await new Promise<void>((resolve, reject) => {
        const onAbort = (): void => reject(new UploadAbortedError(signal?.reason));
        signal?.addEventListener('abort', onAbort, { once: true });
        this.settleWaiters.push(() => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        });
      });
    }
  }
}
