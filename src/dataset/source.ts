import { LRUCache } from 'lru-cache';
import type { ComparisonTable } from '../types/index.js';

/**
 * Anything that can turn a comparison ID into a table.
 * Implementations throw DATASET_UNAVAILABLE when they cannot.
 */
export interface DatasetSource {
    fetch(comparisonId: string): Promise<ComparisonTable>;
}

export interface CacheOptions {
    /** Maximum number of tables kept */
    max: number;
    ttlMs: number;
}

/**
 * TTL cache in front of another source. Tables are frozen, so the same
 * instance can be handed to concurrent queries.
 */
export class CachingDatasetSource implements DatasetSource {
    private cache: LRUCache<string, ComparisonTable>;
    private inflight = new Map<string, Promise<ComparisonTable>>();
    private hits = 0;
    private misses = 0;

    constructor(private readonly inner: DatasetSource, options: CacheOptions) {
        this.cache = new LRUCache<string, ComparisonTable>({
            max: options.max,
            ttl: options.ttlMs,
        });
    }

    async fetch(comparisonId: string): Promise<ComparisonTable> {
        const cached = this.cache.get(comparisonId);
        if (cached) {
            this.hits++;
            return cached;
        }

        // Concurrent misses for the same ID share one upstream request
        const pending = this.inflight.get(comparisonId);
        if (pending) {
            return pending;
        }

        this.misses++;
        const request = this.inner.fetch(comparisonId)
            .then(table => {
                this.cache.set(comparisonId, table);
                return table;
            })
            .finally(() => {
                this.inflight.delete(comparisonId);
            });
        this.inflight.set(comparisonId, request);
        return request;
    }

    stats(): { hits: number; misses: number; size: number } {
        return { hits: this.hits, misses: this.misses, size: this.cache.size };
    }

    clear(): void {
        this.cache.clear();
    }
}
