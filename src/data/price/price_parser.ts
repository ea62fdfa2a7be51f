import { z } from 'zod';
import type { PayloadStatistics, PricePoint } from './types.js';

/**
 * Raised when a payload cannot yield a price
 */
export class ParseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ParseError';
    }
}

// Numbers or numeric strings; "abc", "", null, booleans are rejected
const numeric = z.union([z.number(), z.string().trim().min(1)]);
const priceSchema = numeric.pipe(z.coerce.number().finite());
const cycleSchema = numeric.pipe(z.coerce.number().finite().int());

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decode(payload: string): unknown[] {
    let decoded: unknown;
    try {
        decoded = JSON.parse(payload);
    } catch (error) {
        throw new ParseError('Payload is not valid JSON', { cause: error });
    }

    if (!Array.isArray(decoded)) {
        throw new ParseError(`Expected a JSON array of price records, got ${typeof decoded}`);
    }

    if (decoded.length === 0) {
        throw new ParseError('Payload contains no price records');
    }

    return decoded;
}

function coerceField(schema: typeof priceSchema, value: unknown, field: string, index: number): number {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ParseError(
            `Invalid ${field} at record ${index}: ${JSON.stringify(value)} (${result.error.issues[0]?.message ?? 'not a number'})`
        );
    }
    return result.data;
}

/**
 * Decode every complete record, in payload order.
 * Records missing `price` or `cycle` are skipped; a present field that
 * cannot be coerced fails the whole payload.
 */
export function parseAll(payload: string): PricePoint[] {
    const records = decode(payload);
    const points: PricePoint[] = [];

    records.forEach((record, index) => {
        if (!isRecord(record) || record.price === undefined || record.cycle === undefined) {
            return;
        }

        points.push({
            price: coerceField(priceSchema, record.price, 'price', index),
            cycle: coerceField(cycleSchema, record.cycle, 'cycle', index),
        });
    });

    if (points.length === 0) {
        throw new ParseError('No record carries both price and cycle');
    }

    return points;
}

/**
 * Highest-cycle record; the first one seen wins a tie
 */
export function parseLatest(payload: string): PricePoint {
    return latestOf(parseAll(payload));
}

function latestOf(points: PricePoint[]): PricePoint {
    let latest = points[0];
    for (const point of points) {
        if (point.cycle > latest.cycle) {
            latest = point;
        }
    }

    return latest;
}

/**
 * The `limit` most recent records by cycle, oldest first
 */
export function historyFromPayload(payload: string, limit: number = 10): PricePoint[] {
    if (limit <= 0) {
        return [];
    }

    const sorted = [...parseAll(payload)].sort((a, b) => a.cycle - b.cycle);
    return sorted.slice(-limit);
}

/**
 * Min/max/avg over every record of a payload
 */
export function statisticsFromPayload(payload: string): PayloadStatistics {
    const points = parseAll(payload);
    const latest = latestOf(points);
    const prices = points.map(p => p.price);
    const cycles = points.map(p => p.cycle);

    return {
        latestPrice: latest.price,
        latestCycle: latest.cycle,
        minPrice: Math.min(...prices),
        maxPrice: Math.max(...prices),
        avgPrice: prices.reduce((sum, price) => sum + price, 0) / prices.length,
        minCycle: Math.min(...cycles),
        maxCycle: Math.max(...cycles),
        totalEntries: points.length,
    };
}

/**
 * Sanity check for a decoded point
 */
export function isValidPricePoint(point: PricePoint): boolean {
    return Number.isFinite(point.price)
        && point.price > 0
        && Number.isInteger(point.cycle)
        && point.cycle >= 0;
}
