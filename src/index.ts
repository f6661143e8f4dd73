// =============================================================================
// VAULTLINE — Client Engine
// =============================================================================

export { config, CHUNK_SIZE, MAX_SMALL_CALLERS } from './config';
export * from './errors';
export type * from './types/api';
export type * from './types/crypto';
export type * from './types/filesystem';

export { HttpApiClient } from './api/client';
export type { ApiClient, HttpApiClientOptions } from './api/client';

export * from './services/crypto';
export { TaskGroup } from './services/concurrency';
export type { Task } from './services/concurrency';
export { createLogger } from './services/log';
export type { Logger } from './services/log';
export {
  DEFAULT_MIME_TYPE,
  normalizeMimeType,
  newIncompleteFile,
  parseFileMetadata,
  parseDirectoryMetadata,
} from './services/metadata';
export type { NewFileOptions } from './services/metadata';
export { DirectoryLister } from './services/listing';
export * from './services/upload';
export * from './services/download';
export * from './services/sharing';
export * from './services/search';
export { openSession } from './services/session';
export type { Session, SessionOptions } from './services/session';
export { Drive } from './services/drive';
