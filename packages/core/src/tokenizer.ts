// ============================================================================
// @fimsmith/core — Token Accounting
// ============================================================================
//
// Counts model tokens of emitted lines so a run can report how large its
// FIM share is in tokens, not just in lines. One js-tiktoken encoder per
// encoding, each fronted by a per-string LRU cache.
//
// FIM tag literals are special tokens in cl100k_base and o200k_base; they are
// encoded as such (one token each) instead of being rejected.
// ============================================================================

import { type TiktokenEncoding, getEncoding } from 'js-tiktoken';

export type TokenizerEncoding = TiktokenEncoding;

const DEFAULT_MAX_CACHE_SIZE = 10_000;

const KNOWN_ENCODINGS: readonly TokenizerEncoding[] = [
  'gpt2',
  'r50k_base',
  'p50k_base',
  'p50k_edit',
  'cl100k_base',
  'o200k_base',
];

export function isTokenizerEncoding(value: string): value is TokenizerEncoding {
  return KNOWN_ENCODINGS.some((encoding) => encoding === value);
}

/**
 * Bounded LRU cache. Evicts the least-recently-used entry when full.
 */
class LRUCache<K, V> {
  private map = new Map<K, V>();
  private readonly maxSize: number;

  constructor(maxSize: number) {
    this.maxSize = maxSize;
  }

  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  set(key: K, value: V): void {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (this.map.size >= this.maxSize) {
      const oldest = this.map.keys().next().value;
      if (oldest !== undefined) {
        this.map.delete(oldest);
      }
    }
    this.map.set(key, value);
  }

  clear(): void {
    this.map.clear();
  }
}

class TokenizerInstance {
  private encoder: ReturnType<typeof getEncoding>;
  private cache: LRUCache<string, number>;
  readonly encoding: TokenizerEncoding;

  constructor(encoding: TokenizerEncoding, maxCacheSize: number) {
    this.encoding = encoding;
    this.encoder = getEncoding(encoding);
    this.cache = new LRUCache(maxCacheSize);
  }

  /** Count tokens in text (cached). */
  countTokens(text: string): number {
    const cached = this.cache.get(text);
    if (cached !== undefined) return cached;
    const count = this.encoder.encode(text, 'all').length;
    this.cache.set(text, count);
    return count;
  }

  clearCache(): void {
    this.cache.clear();
  }
}

/**
 * Multi-encoding token counter. Instances are created lazily per encoding.
 *
 * @example
 * ```ts
 * const tm = new TokenizerManager('cl100k_base');
 * const n = tm.countTokens('<|fim_prefix|>a<|fim_suffix|>c<|fim_middle|>b');
 * tm.dispose();
 * ```
 */
export class TokenizerManager {
  private instances = new Map<TokenizerEncoding, TokenizerInstance>();
  private defaultEncoding: TokenizerEncoding;
  private maxCacheSize: number;

  constructor(
    defaultEncoding: TokenizerEncoding = 'cl100k_base',
    options?: { maxCacheSize?: number },
  ) {
    this.defaultEncoding = defaultEncoding;
    this.maxCacheSize = options?.maxCacheSize ?? DEFAULT_MAX_CACHE_SIZE;
  }

  private getInstance(encoding?: TokenizerEncoding): TokenizerInstance {
    const enc = encoding ?? this.defaultEncoding;
    let instance = this.instances.get(enc);
    if (!instance) {
      instance = new TokenizerInstance(enc, this.maxCacheSize);
      this.instances.set(enc, instance);
    }
    return instance;
  }

  countTokens(text: string, encoding?: TokenizerEncoding): number {
    return this.getInstance(encoding).countTokens(text);
  }

  dispose(): void {
    for (const instance of this.instances.values()) {
      instance.clearCache();
    }
    this.instances.clear();
  }
}
