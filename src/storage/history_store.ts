import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { env } from '../config/env.js';
import { createLogger, errorMessage } from '../infra/logger.js';
import type { ChangeKind, PricePoint } from '../data/price/types.js';

const log = createLogger('history');

export const DEFAULT_MAX_ENTRIES = 1000;

/**
 * One persisted observation. Readers get copies; the store's own
 * entries never leave it.
 */
export interface HistoryEntry {
    readonly timestamp: number;     // Epoch seconds (fractional)
    readonly timestampIso: string;
    readonly price: number;
    readonly cycle: number;
    readonly eventType: ChangeKind;
}

function copyEntry(entry: HistoryEntry): HistoryEntry {
    return { ...entry };
}

/**
 * On-disk layout
 */
export interface HistoryFile {
    lastUpdated: number;        // Epoch seconds
    totalEntries: number;
    history: HistoryEntry[];
}

/**
 * Stats over the most recent entries
 */
export interface HistorySummary {
    windowSize: number;
    totalEntries: number;
    minPrice: number;
    maxPrice: number;
    avgPrice: number;
    priceRange: number;
    minCycle: number;
    maxCycle: number;
    recent: HistoryEntry[];
}

export interface HistoryStoreOptions {
    filePath?: string;
    maxEntries?: number;
}

const entrySchema = z.object({
    timestamp: z.number().finite(),
    timestampIso: z.string(),
    price: z.number().finite(),
    cycle: z.number().int(),
    eventType: z.enum(['initial', 'update']),
});

const fileSchema = z.object({
    lastUpdated: z.number().optional(),
    totalEntries: z.number().optional(),
    history: z.array(z.unknown()),
});

/**
 * Bounded append-only price log, rewritten in full on every append
 */
export class HistoryStore {
    readonly filePath: string;
    readonly maxEntries: number;

    private entries: HistoryEntry[] = [];

    constructor(options: HistoryStoreOptions = {}) {
        this.filePath = options.filePath ?? env.HISTORY_FILE;
        this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
        this.entries = this.load();
    }

    /**
     * Record an accepted price and persist the whole log synchronously
     */
    append(point: PricePoint, kind: ChangeKind): HistoryEntry {
        const now = Date.now();
        const entry: HistoryEntry = {
            timestamp: now / 1000,
            timestampIso: new Date(now).toISOString(),
            price: point.price,
            cycle: point.cycle,
            eventType: kind,
        };

        this.entries.push(entry);

        if (this.entries.length > this.maxEntries) {
            this.entries = this.entries.slice(-this.maxEntries);
            log.debug('trimmed', { maxEntries: this.maxEntries });
        }

        this.save();
        return copyEntry(entry);
    }

    /**
     * Entries oldest first
     */
    all(): HistoryEntry[] {
        return this.entries.map(copyEntry);
    }

    size(): number {
        return this.entries.length;
    }

    /**
     * Entry with the greatest timestamp; a later entry wins a tie
     */
    latest(): HistoryEntry | null {
        let latest: HistoryEntry | null = null;

        for (const entry of this.entries) {
            if (latest === null || entry.timestamp >= latest.timestamp) {
                latest = entry;
            }
        }

        return latest === null ? null : copyEntry(latest);
    }

    /**
     * Min/max/avg over the last `window` entries, or null when empty
     */
    summary(window: number = 10): HistorySummary | null {
        if (this.entries.length === 0) {
            return null;
        }

        const recent = this.entries.slice(-Math.max(1, window));
        const prices = recent.map(e => e.price);
        const cycles = recent.map(e => e.cycle);
        const minPrice = Math.min(...prices);
        const maxPrice = Math.max(...prices);

        return {
            windowSize: recent.length,
            totalEntries: this.entries.length,
            minPrice,
            maxPrice,
            avgPrice: prices.reduce((sum, price) => sum + price, 0) / prices.length,
            priceRange: maxPrice - minPrice,
            minCycle: Math.min(...cycles),
            maxCycle: Math.max(...cycles),
            recent: recent.map(copyEntry),
        };
    }

    /**
     * Drop every entry and remove the backing file
     */
    clear(): void {
        this.entries = [];

        try {
            if (existsSync(this.filePath)) {
                unlinkSync(this.filePath);
                log.info('file.removed', { filePath: this.filePath });
            }
        } catch (error) {
            log.error('file.remove_error', {
                filePath: this.filePath,
                error: errorMessage(error),
            });
        }
    }

    private load(): HistoryEntry[] {
        if (!existsSync(this.filePath)) {
            log.info('fresh_start', { filePath: this.filePath });
            return [];
        }

        try {
            const raw: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
            const file = fileSchema.parse(raw);
            const entries: HistoryEntry[] = [];

            file.history.forEach((item, index) => {
                const parsed = entrySchema.safeParse(item);
                if (parsed.success) {
                    entries.push(parsed.data);
                } else {
                    log.warn('entry.invalid', { index, issue: parsed.error.issues[0]?.message });
                }
            });

            const kept = entries.slice(-this.maxEntries);
            log.info('loaded', { filePath: this.filePath, entries: kept.length });
            return kept;
        } catch (error) {
            log.error('load_error', {
                filePath: this.filePath,
                error: errorMessage(error),
            });
            return [];
        }
    }

    /**
     * Failure keeps the in-memory log for the next attempt
     */
    private save(): void {
        const data: HistoryFile = {
            lastUpdated: Date.now() / 1000,
            totalEntries: this.entries.length,
            history: this.entries,
        };

        try {
            mkdirSync(dirname(this.filePath), { recursive: true });
            writeFileSync(this.filePath, JSON.stringify(data, null, 2), 'utf-8');
            log.debug('saved', { entries: this.entries.length });
        } catch (error) {
            log.error('save_error', {
                filePath: this.filePath,
                error: errorMessage(error),
            });
        }
    }
}
