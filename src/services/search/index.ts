// =============================================================================
// VAULTLINE — Search Indexer
//
// The server indexes names without seeing them: the client splits a name
// into substrings and submits only their keyed hashes. A query later hashes
// its own terms with the same HMAC key and matches on equality.
//
// Tokenize and hash are deterministic in (name, key).
// =============================================================================

import type { ApiClient } from '../../api/client';
import { config } from '../../config';
import type { SearchAddItem } from '../../types/api';
import type { NonRootObject, SearchTypeTag } from '../../types/filesystem';
import type { HmacKey } from '../crypto/rsa';
import { createLogger } from '../log';

const log = createLogger('Search');

const { minTokenLength, maxTokenLength, maxTokens } = config.search;

function compareTokens(a: string, b: string): number {
  const byLength = Array.from(a).length - Array.from(b).length;
  return byLength !== 0 ? byLength : a.localeCompare(b, 'en');
}

/**
 * Every contiguous substring of 2–16 code points of the trimmed,
 * lowercased name, plus the whole normalized name. Sorted by length,
 * then English collation; at most 4096 tokens.
 */
export function tokenize(name: string): string[] {
  const normalized = name.trim().toLowerCase();
  if (normalized.length === 0) return [];

  const codePoints = Array.from(normalized);
  const longest = Math.min(maxTokenLength, codePoints.length);
  const tokens = new Set<string>([normalized]);

  for (let start = 0; start < codePoints.length; start++) {
    for (let length = minTokenLength; length <= longest && start + length <= codePoints.length; length++) {
      tokens.add(codePoints.slice(start, start + length).join(''));
    }
  }

  return [...tokens].sort(compareTokens).slice(0, maxTokens);
}

/** Lowercase hex HMAC-SHA256 of every token, in token order. */
export function generateIndexHashes(name: string, key: HmacKey): string[] {
  return tokenize(name).map(token => key.hash(token));
}

export function buildSearchItems(item: NonRootObject, key: HmacKey): SearchAddItem[] {
  const type: SearchTypeTag = item.type === 'file' ? 'file' : 'directory';
  return generateIndexHashes(item.name, key).map(hash => ({ uuid: item.uuid, hash, type }));
}

export class SearchIndexer {
  constructor(
    private readonly api: ApiClient,
    private readonly hmacKey: HmacKey,
  ) {}

  /** Submit the current name's hashes. Called after every create, rename and move. */
  async updateSearchHashes(item: NonRootObject, signal?: AbortSignal): Promise<void> {
    const items = buildSearchItems(item, this.hmacKey);
    if (items.length === 0) return;
    await this.api.searchAdd(items, signal);
    log.debug(`Indexed ${item.uuid} with ${items.length} tokens`);
  }
}
