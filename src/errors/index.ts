// =============================================================================
// VAULTLINE — Error Taxonomy
//
// Every failure the engine raises on purpose carries a stable `code` so
// callers can branch without matching on message text. Underlying errors
// ride along as `cause`.
// =============================================================================

export type VaultlineErrorCode =
  | 'KEY_MISMATCH'
  | 'CHUNK_UPLOAD_FAILED'
  | 'UPLOAD_ABORTED'
  | 'UPLOAD_FINALIZE_FAILED'
  | 'NO_CHUNKS_UPLOADED'
  | 'CHUNK_DOWNLOAD_FAILED'
  | 'CONTENT_HASH_MISMATCH'
  | 'INVALID_RANGE'
  | 'PROPAGATION_PARTIAL_FAILURE'
  | 'UNSUPPORTED_OBJECT_VARIANT'
  | 'UNSUPPORTED_AUTH_VERSION'
  | 'INVALID_NAME'
  | 'INVALID_UPLOAD_STATE'
  | 'MALFORMED_RESPONSE'
  | 'API_ERROR';

export class VaultlineError extends Error {
  readonly code: VaultlineErrorCode;

  constructor(code: VaultlineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No key of the account hierarchy could open a metadata blob. */
export class KeyMismatchError extends VaultlineError {
  /** One entry per key tried, in the order they were tried */
  readonly attempts: unknown[];

  constructor(attempts: unknown[]) {
    super(
      'KEY_MISMATCH',
      `No key could decrypt the metadata (${attempts.length} tried): ` +
        attempts.map(describe).join('; '),
    );
    this.attempts = attempts;
  }
}

export class ChunkUploadFailedError extends VaultlineError {
  readonly index: number;

  constructor(index: number, cause: unknown) {
    super('CHUNK_UPLOAD_FAILED', `Upload of chunk ${index} failed: ${describe(cause)}`, { cause });
    this.index = index;
  }
}

export class UploadAbortedError extends VaultlineError {
  constructor(cause?: unknown) {
    super('UPLOAD_ABORTED', 'Upload aborted while waiting for a storage assignment', { cause });
  }
}

export class UploadFinalizeFailedError extends VaultlineError {
  constructor(uuid: string, cause: unknown) {
    super('UPLOAD_FINALIZE_FAILED', `Server rejected completion of upload ${uuid}: ${describe(cause)}`, { cause });
  }
}

export class NoChunksUploadedError extends VaultlineError {
  constructor(uuid: string) {
    super('NO_CHUNKS_UPLOADED', `No chunk of upload ${uuid} was accepted; cannot finalize a non-empty file`);
  }
}

export class ChunkDownloadFailedError extends VaultlineError {
  readonly index: number;

  constructor(index: number, cause: unknown) {
    super('CHUNK_DOWNLOAD_FAILED', `Download of chunk ${index} failed: ${describe(cause)}`, { cause });
    this.index = index;
  }
}

/** The decrypted content of a complete read does not hash to the stored BLAKE3. */
export class ContentHashMismatchError extends VaultlineError {
  readonly expected: string;
  readonly actual: string;

  constructor(uuid: string, expected: string, actual: string) {
    super('CONTENT_HASH_MISMATCH', `Content of ${uuid} does not match its hash: expected ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidRangeError extends VaultlineError {
  constructor(offset: number, limit: number | null, size: number) {
    super('INVALID_RANGE', `Cannot read from ${offset} to ${limit ?? 'end'} of a ${size}-byte file`);
  }
}

/**
 * A fan-out stopped at its first failing target. Targets that were
 * already updated stay updated; re-running the propagation is safe.
 */
export class PropagationPartialFailureError extends VaultlineError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('PROPAGATION_PARTIAL_FAILURE', `${operation} failed: ${describe(cause)}`, { cause });
    this.operation = operation;
  }
}

export class UnsupportedObjectVariantError extends VaultlineError {
  constructor(variant: string, operation: string) {
    super('UNSUPPORTED_OBJECT_VARIANT', `Cannot ${operation} an object of type "${variant}"`);
  }
}

export class UnsupportedAuthVersionError extends VaultlineError {
  constructor(version: number, operation: string) {
    super('UNSUPPORTED_AUTH_VERSION', `Auth version ${version} does not support ${operation}`);
  }
}

/** The message carries no part of the rejected name. */
export class InvalidNameError extends VaultlineError {
  constructor() {
    super('INVALID_NAME', 'Invalid item name: names must be non-empty and contain no "/"');
  }
}

export class InvalidUploadStateError extends VaultlineError {
  constructor(uuid: string, state: string, operation: string) {
    super('INVALID_UPLOAD_STATE', `Cannot ${operation} upload ${uuid} in state "${state}"`);
  }
}

export class MalformedResponseError extends VaultlineError {
  constructor(what: string) {
    super('MALFORMED_RESPONSE', `Malformed response: ${what}`);
  }
}

/** The server answered with a non-2xx status or a `status: false` envelope. */
export class ApiError extends VaultlineError {
  readonly method: string;
  readonly path: string;
  readonly httpStatus: number | null;
  readonly apiCode: string | null;

  constructor(
    method: string,
    path: string,
    message: string,
    details: { httpStatus?: number; apiCode?: string; cause?: unknown } = {},
  ) {
    super('API_ERROR', `${method} ${path}: ${message}`, { cause: details.cause });
    this.method = method;
    this.path = path;
    this.httpStatus = details.httpStatus ?? null;
    this.apiCode = details.apiCode ?? null;
  }
}

export function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
