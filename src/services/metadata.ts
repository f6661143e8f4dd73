// =============================================================================
// VAULTLINE — Item Metadata
//
// Builds, serializes and parses the plaintext metadata blobs that the
// hierarchy, recipients and links each receive an encrypted copy of.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { InvalidNameError, MalformedResponseError, UnsupportedObjectVariantError } from '../errors';
import type { FileEncryptionVersion } from '../types/crypto';
import type {
  DirectoryMetadata,
  FileMetadata,
  FileSystemObject,
  IncompleteFile,
  ItemTypeTag,
  NonRootObject,
} from '../types/filesystem';
import { EncryptionKey } from './crypto/keys';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/** Empty → octet-stream; parameters after ";" are dropped. */
export function normalizeMimeType(mimeType: string | undefined): string {
  if (!mimeType) return DEFAULT_MIME_TYPE;
  const [essence] = mimeType.split(';');
  const trimmed = essence.trim();
  return trimmed.length > 0 ? trimmed : DEFAULT_MIME_TYPE;
}

export function assertValidName(name: string): void {
  if (name.length === 0 || name.includes('/')) {
    throw new InvalidNameError();
  }
}

export interface NewFileOptions {
  name: string;
  parentUuid: string;
  version: FileEncryptionVersion;
  mimeType?: string;
  created?: Date;
  lastModified?: Date;
}

/** A local file stub with a fresh identity and a fresh per-object key. */
export function newIncompleteFile(options: NewFileOptions): IncompleteFile {
  assertValidName(options.name);
  const now = new Date();
  return {
    uuid: uuidv4(),
    name: options.name,
    parentUuid: options.parentUuid,
    mimeType: normalizeMimeType(options.mimeType),
    encryptionKey: EncryptionKey.generate(options.version),
    created: options.created ?? now,
    lastModified: options.lastModified ?? options.created ?? now,
  };
}

// ── Serialization ──────────────────────────────────────────────────────

export function fileMetadata(
  file: IncompleteFile,
  version: FileEncryptionVersion,
  size: number,
  hash: string,
): FileMetadata {
  return {
    name: file.name,
    size,
    mime: file.mimeType,
    key: file.encryptionKey.toString(version),
    lastModified: file.lastModified.getTime(),
    creation: file.created.getTime(),
    blake3: hash,
  };
}

export function directoryMetadata(name: string, created: Date): DirectoryMetadata {
  return { name, creation: Math.floor(created.getTime() / 1000) };
}

/** Plaintext metadata JSON for a file or directory. */
export function serializeItemMetadata(item: FileSystemObject, version: FileEncryptionVersion): string {
  switch (item.type) {
    case 'file':
      return JSON.stringify(fileMetadata(item, version, item.size, item.hash));
    case 'directory':
      return JSON.stringify(directoryMetadata(item.name, item.created));
    case 'root':
      throw new UnsupportedObjectVariantError(item.type, 'serialize metadata of');
  }
}

export function itemTypeTag(item: FileSystemObject): ItemTypeTag {
  switch (item.type) {
    case 'file':
      return 'file';
    case 'directory':
      return 'folder';
    case 'root':
      throw new UnsupportedObjectVariantError(item.type, 'tag');
  }
}

export function asNonRoot(item: FileSystemObject, operation: string): NonRootObject {
  switch (item.type) {
    case 'file':
    case 'directory':
      return item;
    case 'root':
      throw new UnsupportedObjectVariantError(item.type, operation);
  }
}

// ── Parsing ────────────────────────────────────────────────────────────

function parseObject(json: string, what: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    throw new MalformedResponseError(`${what} is not JSON`);
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new MalformedResponseError(`${what} is not an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

/** Integers may arrive as strings from older clients. */
function intField(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return parseInt(value, 10);
  return 0;
}

function stringField(obj: Record<string, unknown>, key: string, what: string, required: boolean): string {
  const value = obj[key];
  if (typeof value === 'string') return value;
  if (required) throw new MalformedResponseError(`${what} has no "${key}"`);
  return '';
}

export function parseFileMetadata(json: string): FileMetadata {
  const obj = parseObject(json, 'file metadata');
  return {
    name: stringField(obj, 'name', 'file metadata', true),
    size: intField(obj, 'size'),
    mime: normalizeMimeType(stringField(obj, 'mime', 'file metadata', false)),
    key: stringField(obj, 'key', 'file metadata', true),
    lastModified: intField(obj, 'lastModified'),
    creation: intField(obj, 'creation'),
    blake3: stringField(obj, 'blake3', 'file metadata', false),
  };
}

export function parseDirectoryMetadata(json: string): DirectoryMetadata {
  const obj = parseObject(json, 'directory metadata');
  return {
    name: stringField(obj, 'name', 'directory metadata', true),
    creation: intField(obj, 'creation'),
  };
}
