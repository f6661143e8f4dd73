// =============================================================================
// VAULTLINE — Client Configuration
// Loads from environment variables with defaults for the public endpoints.
// =============================================================================

function urlPool(value: string | undefined, defaults: string[]): string[] {
  if (!value) return defaults;
  const urls = value.split(',').map(u => u.trim()).filter(u => u.length > 0);
  return urls.length > 0 ? urls : defaults;
}

export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',

  api: {
    gatewayUrls: urlPool(process.env.VAULTLINE_GATEWAY_URLS, [
      'https://gateway.vaultline.io',
      'https://gateway.vaultline.net',
      'https://gateway-1.vaultline.net',
      'https://gateway-2.vaultline.net',
    ]),
    ingestUrls: urlPool(process.env.VAULTLINE_INGEST_URLS, [
      'https://ingest.vaultline.io',
      'https://ingest.vaultline.net',
      'https://ingest-1.vaultline.net',
      'https://ingest-2.vaultline.net',
    ]),
    egestUrls: urlPool(process.env.VAULTLINE_EGEST_URLS, [
      'https://egest.vaultline.io',
      'https://egest.vaultline.net',
      'https://egest-1.vaultline.net',
      'https://egest-2.vaultline.net',
    ]),
    requestTimeoutMs: parseInt(process.env.VAULTLINE_REQUEST_TIMEOUT_MS || '30000', 10),
  },

  upload: {
    // Plaintext bytes per chunk. Changing this breaks chunk counts of existing files.
    chunkSize: 1024 * 1024,
  },

  // Ceiling on in-flight requests for one propagation or link fan-out
  propagation: {
    maxSmallCallers: 64,
  },

  search: {
    minTokenLength: 2,
    maxTokenLength: 16,
    maxTokens: 4096,
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
} as const;

export const CHUNK_SIZE = config.upload.chunkSize;
export const MAX_SMALL_CALLERS = config.propagation.maxSmallCallers;
