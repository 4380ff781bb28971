import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { getNumber } from '../config/config.helpers';
import { normalizeQueryText } from '../embedding/fingerprint';
import { canonicalizePredicates } from '../vector-index/filters';
import { FilterPredicate } from '../vector-index/interfaces/vector-index.interface';
import { SearchResultItem } from './interfaces/search.interface';

export interface SearchCacheParameters {
  topK: number;
  scoreThreshold: number;
}

interface CachedResults {
  results: readonly SearchResultItem[];
  expiresAt: number;
}

/**
 * Short-lived cache of finished searches. Entries expire by TTL only;
 * newly indexed segments show up once the entry ages out.
 */
@Injectable()
export class SearchResultCacheService {
  private readonly logger = new Logger(SearchResultCacheService.name);
  private readonly entries = new Map<string, CachedResults>();
  private readonly defaultTtlMs: number;
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;

  constructor(private readonly configService: ConfigService) {
    this.defaultTtlMs = getNumber(
      this.configService,
      'SEARCH_CACHE_TTL_MS',
      60 * 60 * 1000,
    );
    this.maxEntries = getNumber(
      this.configService,
      'SEARCH_CACHE_MAX_ENTRIES',
      1000,
    );
  }

  /**
   * Key over the normalized text, the predicate set in canonical order and
   * the ranking parameters
   */
  keyFor(
    queryText: string,
    filters: readonly FilterPredicate[],
    parameters: SearchCacheParameters,
  ): string {
    const canonical = JSON.stringify({
      q: normalizeQueryText(queryText),
      f: canonicalizePredicates(filters),
      k: parameters.topK,
      t: parameters.scoreThreshold,
    });
    return createHash('sha256').update(canonical).digest('hex');
  }

  lookup(
    queryText: string,
    filters: readonly FilterPredicate[],
    parameters: SearchCacheParameters,
  ): SearchResultItem[] | undefined {
    const key = this.keyFor(queryText, filters, parameters);
    const entry = this.entries.get(key);

    if (!entry || entry.expiresAt <= Date.now()) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry.results.map((item) => ({
      ...item,
      contentFlags: { ...item.contentFlags },
    }));
  }

  store(
    queryText: string,
    filters: readonly FilterPredicate[],
    parameters: SearchCacheParameters,
    results: readonly SearchResultItem[],
    ttlMs: number = this.defaultTtlMs,
  ): void {
    const key = this.keyFor(queryText, filters, parameters);
    this.entries.delete(key);
    this.entries.set(key, {
      results: Object.freeze(
        results.map((item) =>
          Object.freeze({ ...item, contentFlags: { ...item.contentFlags } }),
        ),
      ),
      expiresAt: Date.now() + ttlMs,
    });
    this.evict();
  }

  stats() {
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private evict(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }

    // oldest insertion first
    while (this.entries.size > Math.max(1, this.maxEntries)) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.logger.debug(`Search cache holds ${this.entries.size} entries`);
  }
}
