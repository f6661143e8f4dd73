// =============================================================================
// VAULTLINE — Test Suite 04: Upload Pipeline
//
// Chunking, content hash, completion handshake, the empty path and every
// way an upload can fail.
// =============================================================================

import { blake3 } from '@noble/hashes/blake3';
import { CHUNK_SIZE } from '../src/config';
import {
  ChunkUploadFailedError,
  InvalidUploadStateError,
  NoChunksUploadedError,
  UploadAbortedError,
  UploadFinalizeFailedError,
} from '../src/errors';
import { newIncompleteFile } from '../src/services/metadata';
import { readChunks, UploadPipeline } from '../src/services/upload';
import type { IncompleteFile } from '../src/types/filesystem';
import { currentHierarchy, FakeApiClient, flush, legacyHierarchy } from './helpers';

function blake3Hex(data: Buffer): string {
  return Buffer.from(blake3(data)).toString('hex');
}

function reportFile(version: 2 | 3 = 3): IncompleteFile {
  return newIncompleteFile({
    name: 'report.txt',
    parentUuid: 'parent-1',
    version,
    mimeType: 'text/plain; charset=utf-8',
    created: new Date(1_700_000_000_000),
    lastModified: new Date(1_700_000_100_000),
  });
}

async function collect(source: AsyncIterable<Buffer>): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of source) out.push(chunk.toString());
  return out;
}

describe('readChunks', () => {
  test('regroups uneven pieces into fixed-size chunks', async () => {
    expect(await collect(readChunks(['ab', Buffer.from('cde'), 'f', 'g'], 2))).toEqual(['ab', 'cd', 'ef', 'g']);
  });

  test('yields nothing for an empty source', async () => {
    expect(await collect(readChunks([], 2))).toEqual([]);
  });
});

describe('uploadFile', () => {
  test('2 × CHUNK_SIZE + 1 bytes go out as three chunks', async () => {
    const api = new FakeApiClient();
    const hierarchy = currentHierarchy();
    const pipeline = new UploadPipeline(api, hierarchy);
    const file = reportFile();

    const content = Buffer.alloc(2 * CHUNK_SIZE + 1);
    for (let i = 0; i < content.length; i++) content[i] = i % 251;
    const pieces = [content.subarray(0, 1000), content.subarray(1000, CHUNK_SIZE + 7), content.subarray(CHUNK_SIZE + 7)];

    const uploaded = await pipeline.uploadFile(file, pieces);

    expect(api.chunks.map(c => c.params.index)).toEqual([0, 1, 2]);
    const plaintexts = api.chunks.map(c => file.encryptionKey.decryptData(c.data));
    expect(plaintexts.map(p => p.length)).toEqual([CHUNK_SIZE, CHUNK_SIZE, 1]);
    expect(Buffer.concat(plaintexts).equals(content)).toBe(true);

    expect(api.uploadsDone).toHaveLength(1);
    const done = api.uploadsDone[0];
    expect(done.chunks).toBe(3);
    expect(uploaded.chunks).toBe(3);
    expect(uploaded.hash).toBe(blake3Hex(content));
    expect(uploaded.size).toBe(2 * CHUNK_SIZE + 1);
  });

  test('the completion request carries encrypted name, size, MIME and metadata', async () => {
    const api = new FakeApiClient();
    const hierarchy = currentHierarchy();
    const pipeline = new UploadPipeline(api, hierarchy);
    const file = reportFile();

    const uploaded = await pipeline.uploadFile(file, [Buffer.from('hello')]);
    const done = api.uploadsDone[0];
    const objectKey = file.encryptionKey.toMasterKey();

    expect(done.uuid).toBe(file.uuid);
    expect(done.parent).toBe('parent-1');
    expect(done.version).toBe(3);
    expect(done.chunks).toBe(1);
    expect(done.name.startsWith('002')).toBe(true);
    expect(objectKey.decryptMeta(done.name)).toBe('report.txt');
    expect(objectKey.decryptMeta(done.size)).toBe('5');
    expect(objectKey.decryptMeta(done.mime)).toBe('text/plain');
    expect(done.nameHashed).toBe(hierarchy.hashFileName('report.txt'));
    expect(done.rm).toMatch(/^[a-zA-Z0-9]{32}$/);
    expect(done.uploadKey).toMatch(/^[a-zA-Z0-9]{32}$/);
    expect(api.chunks[0].params.uploadKey).toBe(done.uploadKey);

    expect(JSON.parse(hierarchy.decryptMeta(done.metadata))).toEqual({
      name: 'report.txt',
      size: 5,
      mime: 'text/plain',
      key: file.encryptionKey.toString(3),
      lastModified: 1_700_000_100_000,
      creation: 1_700_000_000_000,
      blake3: blake3Hex(Buffer.from('hello')),
    });

    expect(uploaded).toMatchObject({
      type: 'file',
      uuid: file.uuid,
      bucket: 'bucket-0',
      region: 'region-0',
      version: 3,
      favorited: false,
    });
  });

  test('legacy accounts seal metadata in 002 and report version 2', async () => {
    const api = new FakeApiClient();
    const hierarchy = legacyHierarchy();
    const file = reportFile(2);

    const uploaded = await new UploadPipeline(api, hierarchy).uploadFile(file, ['legacy']);

    expect(uploaded.version).toBe(2);
    expect(api.uploadsDone[0].version).toBe(2);
    expect(api.uploadsDone[0].metadata.startsWith('002')).toBe(true);
    expect(JSON.parse(hierarchy.decryptMeta(api.uploadsDone[0].metadata)).key).toBe(file.encryptionKey.toString(2));
  });

  test('an empty source completes through the empty endpoint', async () => {
    const api = new FakeApiClient();
    const pipeline = new UploadPipeline(api, currentHierarchy());
    const file = reportFile();

    const uploaded = await pipeline.uploadFile(file, []);

    expect(api.calls).toEqual(['uploadEmpty']);
    expect(file.encryptionKey.toMasterKey().decryptMeta(api.uploadsEmpty[0].size)).toBe('0');
    expect(uploaded.size).toBe(0);
    expect(uploaded.chunks).toBe(0);
    expect(uploaded.hash).toBe(blake3Hex(Buffer.alloc(0)));
  });

  test('a failed chunk stops the upload and names its index', async () => {
    const api = new FakeApiClient();
    api.onCall = method => {
      if (method === 'uploadChunk' && api.count('uploadChunk') === 2) throw new Error('ingest unavailable');
    };
    const pipeline = new UploadPipeline(api, currentHierarchy());

    const upload = pipeline.uploadFile(reportFile(), [Buffer.alloc(CHUNK_SIZE + 5)]);

    await expect(upload).rejects.toBeInstanceOf(ChunkUploadFailedError);
    await expect(upload).rejects.toMatchObject({ code: 'CHUNK_UPLOAD_FAILED', index: 1 });
    expect(api.uploadsDone).toHaveLength(0);
  });

  test('an aborted signal stops the upload before the next chunk', async () => {
    const api = new FakeApiClient();
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));

    const upload = new UploadPipeline(api, currentHierarchy()).uploadFile(reportFile(), ['data'], controller.signal);

    await expect(upload).rejects.toBeInstanceOf(UploadAbortedError);
    expect(api.calls).toEqual([]);
  });
});

describe('Upload sessions', () => {
  test('start in created with a fresh upload key', () => {
    const pipeline = new UploadPipeline(new FakeApiClient(), currentHierarchy());
    const a = pipeline.newUpload(reportFile());
    const b = pipeline.newUpload(reportFile());

    expect(a.state).toBe('created');
    expect(a.uploadKey).toMatch(/^[a-zA-Z0-9]{32}$/);
    expect(a.uploadKey).not.toBe(b.uploadKey);
  });

  test('only the first storage assignment is kept', async () => {
    const api = new FakeApiClient();
    const pipeline = new UploadPipeline(api, currentHierarchy());
    const session = pipeline.newUpload(reportFile());

    await pipeline.uploadChunk(session, 0, Buffer.from('a'));
    await pipeline.uploadChunk(session, 1, Buffer.from('b'));

    expect(session.state).toBe('streaming');
    expect(session.chunksAccepted).toBe(2);
    expect(session.storage).toEqual({ bucket: 'bucket-0', region: 'region-0' });
  });

  test('a non-empty finalize with no accepted chunk fails', async () => {
    const api = new FakeApiClient();
    const pipeline = new UploadPipeline(api, currentHierarchy());
    const session = pipeline.newUpload(reportFile());

    await expect(pipeline.finalize(session, 10)).rejects.toBeInstanceOf(NoChunksUploadedError);
    expect(session.state).toBe('failed');
    expect(api.calls).toEqual([]);
  });

  test('finalize waits for a chunk still in flight', async () => {
    const api = new FakeApiClient();
    let release: () => void = () => undefined;
    api.onCall = method =>
      method === 'uploadChunk' ? new Promise<void>(resolve => { release = () => resolve(); }) : undefined;
    const pipeline = new UploadPipeline(api, currentHierarchy());
    const session = pipeline.newUpload(reportFile());

    session.absorb(Buffer.from('hello'));
    const chunk = pipeline.uploadChunk(session, 0, Buffer.from('hello'));
    const finalizing = pipeline.finalize(session, 5);
    await flush();
    expect(api.uploadsDone).toHaveLength(0);

    release();
    await chunk;
    const uploaded = await finalizing;

    expect(api.uploadsDone).toHaveLength(1);
    expect(uploaded.bucket).toBe('bucket-0');
    expect(session.state).toBe('completed');
  });

  test('aborting while finalize waits gives UploadAborted', async () => {
    const api = new FakeApiClient();
    let release: () => void = () => undefined;
    api.onCall = method =>
      method === 'uploadChunk' ? new Promise<void>(resolve => { release = () => resolve(); }) : undefined;
    const pipeline = new UploadPipeline(api, currentHierarchy());
    const session = pipeline.newUpload(reportFile());

    const chunk = pipeline.uploadChunk(session, 0, Buffer.from('hello'));
    const controller = new AbortController();
    const finalizing = pipeline.finalize(session, 5, controller.signal);
    controller.abort(new Error('cancelled'));

    await expect(finalizing).rejects.toBeInstanceOf(UploadAbortedError);
    expect(session.state).toBe('failed');

    release();
    await chunk;
    expect(api.uploadsDone).toHaveLength(0);
  });

  test('a rejected completion fails the session for good', async () => {
    const api = new FakeApiClient();
    api.onCall = method => {
      if (method === 'uploadDone') throw new Error('quota exceeded');
    };
    const pipeline = new UploadPipeline(api, currentHierarchy());
    const session = pipeline.newUpload(reportFile());
    session.absorb(Buffer.from('hello'));
    await pipeline.uploadChunk(session, 0, Buffer.from('hello'));

    await expect(pipeline.finalize(session, 5)).rejects.toBeInstanceOf(UploadFinalizeFailedError);
    expect(session.state).toBe('failed');
    await expect(pipeline.finalize(session, 5)).rejects.toBeInstanceOf(InvalidUploadStateError);
    await expect(pipeline.uploadChunk(session, 1, Buffer.from('x'))).rejects.toBeInstanceOf(InvalidUploadStateError);
  });
});
