import { describe, it, expect } from 'vitest';
import { ChangeDetector } from '../change_detector.js';

describe('ChangeDetector', () => {
    const detector = new ChangeDetector(0.01);

    it('emits an initial event without a previous price', () => {
        const event = detector.detect(null, { price: 75, cycle: 1000 });

        expect(event).toMatchObject({
            kind: 'initial',
            oldPrice: null,
            oldCycle: null,
            newPrice: 75,
            newCycle: 1000,
            delta: 0,
            deltaPercent: 0,
        });
    });

    it('emits an update when the delta reaches the threshold', () => {
        const event = detector.detect({ price: 75, cycle: 1000 }, { price: 76.5, cycle: 1001 });

        expect(event?.kind).toBe('update');
        expect(event?.oldPrice).toBe(75);
        expect(event?.oldCycle).toBe(1000);
        expect(event?.delta).toBeCloseTo(1.5, 10);
        expect(event?.deltaPercent).toBeCloseTo(2.0, 10);
    });

    it('reports negative moves', () => {
        const event = detector.detect({ price: 80, cycle: 1 }, { price: 76, cycle: 2 });

        expect(event?.delta).toBe(-4);
        expect(event?.deltaPercent).toBeCloseTo(-5, 10);
    });

    it('treats a delta equal to the threshold as reportable', () => {
        const event = new ChangeDetector(0.5).detect({ price: 10, cycle: 1 }, { price: 10.5, cycle: 2 });
        expect(event?.kind).toBe('update');
    });

    it('ignores moves below the threshold', () => {
        expect(new ChangeDetector(5).detect({ price: 75, cycle: 1000 }, { price: 75.5, cycle: 1001 })).toBeNull();
    });

    it('lets a per-call threshold override the default', () => {
        expect(detector.detect({ price: 75, cycle: 1000 }, { price: 75.5, cycle: 1001 }, 5)).toBeNull();
    });

    it('ignores stale and duplicate cycles', () => {
        expect(detector.detect({ price: 75, cycle: 1001 }, { price: 80, cycle: 1000 })).toBeNull();
        expect(detector.detect({ price: 75, cycle: 1001 }, { price: 80, cycle: 1001 })).toBeNull();
    });

    it('emits nothing against a zero previous price', () => {
        expect(detector.detect({ price: 0, cycle: 1 }, { price: 5, cycle: 2 })).toBeNull();
    });
});
