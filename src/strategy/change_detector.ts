import { env } from '../config/env.js';
import { createLogger } from '../infra/logger.js';
import type { ChangeEvent, PricePoint } from '../data/price/types.js';
import type { DiscardReason } from './types.js';

const log = createLogger('detector');

/**
 * Decides whether an incoming price is a reportable transition.
 * Holds no price state: the caller passes the previously accepted point.
 */
export class ChangeDetector {
    readonly threshold: number;

    constructor(threshold: number = env.CHANGE_THRESHOLD) {
        this.threshold = threshold;
    }

    /**
     * Returns an `initial` event for the first observation, an `update`
     * event when the cycle advanced and |delta| >= threshold, else null.
     */
    detect(
        previous: PricePoint | null,
        incoming: PricePoint,
        threshold: number = this.threshold
    ): ChangeEvent | null {
        const now = Date.now();

        if (previous === null) {
            log.info('initial', { price: incoming.price, cycle: incoming.cycle });
            return {
                timestamp: now,
                oldPrice: null,
                newPrice: incoming.price,
                oldCycle: null,
                newCycle: incoming.cycle,
                delta: 0,
                deltaPercent: 0,
                kind: 'initial',
            };
        }

        if (incoming.cycle <= previous.cycle) {
            this.logDiscard('stale_cycle', previous, incoming);
            return null;
        }

        // Percent change has no meaning against a zero base
        if (previous.price === 0) {
            this.logDiscard('zero_base_price', previous, incoming);
            return null;
        }

        const delta = incoming.price - previous.price;

        if (Math.abs(delta) < threshold) {
            this.logDiscard('below_threshold', previous, incoming, { delta, threshold });
            return null;
        }

        const deltaPercent = (delta / previous.price) * 100;

        log.info('update', {
            oldPrice: previous.price,
            newPrice: incoming.price,
            delta: delta.toFixed(2),
            deltaPercent: deltaPercent.toFixed(2),
            newCycle: incoming.cycle,
        });

        return {
            timestamp: now,
            oldPrice: previous.price,
            newPrice: incoming.price,
            oldCycle: previous.cycle,
            newCycle: incoming.cycle,
            delta,
            deltaPercent,
            kind: 'update',
        };
    }

    private logDiscard(
        reason: DiscardReason,
        previous: PricePoint,
        incoming: PricePoint,
        data: Record<string, unknown> = {}
    ): void {
        log.debug('discard', {
            reason,
            previousCycle: previous.cycle,
            incomingCycle: incoming.cycle,
            previousPrice: previous.price,
            incomingPrice: incoming.price,
            ...data,
        });
    }
}
