import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import type { CacheConfig } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

interface CacheEntry<T> {
    timestamp: number;
    key: string;
    data: T;
}

/**
 * File-system cache for metadata responses.
 * Stores JSON files in a configurable cache directory.
 *
 * Cache key = SHA-256 of the request key (the metadata URL).
 * Disabled by default: an indexing run normally wants fresh metadata.
 */
export class ResponseCache {
    private readonly cacheDir: string;
    private readonly ttlMs: number;
    private readonly enabled: boolean;
    private readonly logger = getLogger('cache');

    constructor(options: Partial<CacheConfig> = {}) {
        this.cacheDir = options.dir ?? '.paperindex-cache';
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? false;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            this.logger.debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private pathFor(key: string): string {
        return join(this.cacheDir, `${createHash('sha256').update(key).digest('hex')}.json`);
    }

    /**
     * Get a cached response, or null if not found/expired/unreadable.
     */
    get<T>(key: string): T | null {
        if (!this.enabled) return null;

        const filePath = this.pathFor(key);
        if (!existsSync(filePath)) return null;

        let entry: CacheEntry<T>;
        try {
            // Entries are only ever written by set<T>() for the same key
            entry = JSON.parse(readFileSync(filePath, 'utf-8')) as CacheEntry<T>;
        } catch (error) {
            this.logger.warn({ key, error }, 'Unreadable cache entry ignored');
            return null;
        }

        if (Date.now() - entry.timestamp > this.ttlMs) {
            this.logger.debug({ key }, 'Cache expired');
            return null;
        }

        this.logger.debug({ key }, 'Cache hit');
        return entry.data;
    }

    /**
     * Store a response in the cache.
     */
    set<T>(key: string, data: T): void {
        if (!this.enabled) return;

        const entry: CacheEntry<T> = { timestamp: Date.now(), key: key.slice(0, 200), data };
        try {
            writeFileSync(this.pathFor(key), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            this.logger.warn({ key, error }, 'Failed to write cache entry');
        }
    }

    /**
     * Remove every cached entry.
     */
    clear(): void {
        rmSync(this.cacheDir, { recursive: true, force: true });
        if (this.enabled) mkdirSync(this.cacheDir, { recursive: true });
    }

    /**
     * Entry count and total size on disk.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        let entries = 0;
        let bytes = 0;
        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                entries += 1;
                bytes += statSync(join(this.cacheDir, file)).size;
            }
        }
        return { enabled: this.enabled, directory: this.cacheDir, entries, bytes };
    }
}
