/**
 * Fingerprint Cache
 *
 * In-memory LRU with max-age, keyed by schema fingerprint. Cached batches are
 * templates: every hit is rewritten for the dataset that asked, with fresh
 * suggestion ids and timestamps, so two datasets never share a suggestion.
 *
 * Thread-safe for concurrent access in Node.js async environment.
 */

import { randomUUID } from 'crypto';
import { AsyncLock } from '../../utils/asyncLock.js';
import type { Suggestion, SuggestionBatch } from '../../types/enrichment.js';

interface CacheEntry {
    batch: SuggestionBatch;
    storedAt: number;
}

export interface FingerprintCacheOptions {
    /** @default 500 */
    maxEntries?: number;
    /** @default 24 hours */
    maxAgeMs?: number;
    now?: () => number;
}

export interface FingerprintCacheStats {
    size: number;
    maxSize: number;
    hits: number;
    misses: number;
    hitRate?: number;
    evictions: number;
    expirations: number;
}

/**
 * Copy of `template` attributed to `datasetId`
 */
export function rewriteBatchForDataset(template: SuggestionBatch, datasetId: string, now: Date): SuggestionBatch {
    const createdAt = now.toISOString();
    const suggestions = template.suggestions.map(
        (suggestion): Suggestion =>
            Object.freeze({
                ...suggestion,
                id: randomUUID(),
                datasetId,
                createdAt,
            })
    );
    return Object.freeze({
        ...template,
        datasetId,
        suggestions: Object.freeze(suggestions),
        cacheHit: true,
        generatedAt: createdAt,
    });
}

export class FingerprintCache {
    // Map iteration order doubles as recency order: least recently used first
    private entries: Map<string, CacheEntry> = new Map();
    private readonly maxEntries: number;
    private readonly maxAgeMs: number;
    private readonly now: () => number;
    private readonly lock = new AsyncLock();

    private hits = 0;
    private misses = 0;
    private evictions = 0;
    private expirations = 0;

    constructor(options: FingerprintCacheOptions = {}) {
        this.maxEntries = options.maxEntries ?? 500;
        this.maxAgeMs = options.maxAgeMs ?? 24 * 60 * 60 * 1000;
        this.now = options.now ?? Date.now;
        if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
            throw new RangeError('FingerprintCache maxEntries must be a positive integer');
        }
    }

    /**
     * Look up a fingerprint on behalf of `datasetId`. Expired entries are evicted and reported as a miss.
     */
    async get(fingerprint: string, datasetId: string): Promise<SuggestionBatch | undefined> {
        return this.lock.runExclusive(() => {
            const entry = this.entries.get(fingerprint);
            if (!entry) {
                this.misses++;
                return undefined;
            }

            const now = this.now();
            if (now - entry.storedAt > this.maxAgeMs) {
                this.entries.delete(fingerprint);
                this.expirations++;
                this.misses++;
                return undefined;
            }

            // Refresh recency
            this.entries.delete(fingerprint);
            this.entries.set(fingerprint, entry);
            this.hits++;

            return rewriteBatchForDataset(entry.batch, datasetId, new Date(now));
        });
    }

    async put(fingerprint: string, batch: SuggestionBatch): Promise<void> {
        await this.lock.runExclusive(() => {
            this.entries.delete(fingerprint);
            while (this.entries.size >= this.maxEntries) {
                const lruKey = this.entries.keys().next();
                if (lruKey.done) {
                    break;
                }
                this.entries.delete(lruKey.value);
                this.evictions++;
            }
            this.entries.set(fingerprint, { batch, storedAt: this.now() });
        });
    }

    async clear(): Promise<void> {
        await this.lock.runExclusive(() => {
            this.entries.clear();
        });
    }

    /**
     * Get cache statistics
     */
    stats(): FingerprintCacheStats {
        const total = this.hits + this.misses;
        return {
            size: this.entries.size,
            maxSize: this.maxEntries,
            hits: this.hits,
            misses: this.misses,
            hitRate: total > 0 ? Number((this.hits / total).toFixed(4)) : undefined,
            evictions: this.evictions,
            expirations: this.expirations,
        };
    }
}
