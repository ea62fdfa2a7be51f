import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PriceMonitor } from '../price_monitor.js';
import { AdaptivePoller } from '../../data/price/http_poller.js';
import { ChangeDetector } from '../../strategy/change_detector.js';
import { HistoryStore } from '../../storage/history_store.js';

const URL = 'https://prices.example.test/oil-prices';

function payload(...points: Array<{ price: number; cycle: number }>): string {
    return JSON.stringify(points);
}

/**
 * Serve the given bodies in order as 200 responses
 */
function serve(...bodies: string[]) {
    const queue = [...bodies];
    const fetchSpy = vi.fn().mockImplementation(() => {
        const body = queue.shift();
        return Promise.resolve(body === undefined
            ? new Response('gone', { status: 404 })
            : new Response(body, { status: 200 }));
    });
    globalThis.fetch = fetchSpy;
    return fetchSpy;
}

describe('PriceMonitor', () => {
    const originalFetch = globalThis.fetch;
    let dir: string;
    let historyFile: string;

    function createMonitor(threshold: number = 0.01): PriceMonitor {
        return new PriceMonitor({
            poller: new AdaptivePoller({
                url: URL,
                baseIntervalSeconds: 60,
                retryPolicy: {
                    maxRetries: 0,
                    initialDelayMs: 1,
                    backoffMultiplier: 1,
                    maxDelayMs: 1,
                    retryableStatusCodes: [],
                },
            }),
            detector: new ChangeDetector(threshold),
            history: new HistoryStore({ filePath: historyFile }),
        });
    }

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'price-monitor-'));
        historyFile = join(dir, 'price_history.json');
    });

    afterEach(() => {
        globalThis.fetch = originalFetch;
        rmSync(dir, { recursive: true, force: true });
    });

    it('emits an initial event for the first price', async () => {
        serve(payload({ price: 75.0, cycle: 1000 }));
        const monitor = createMonitor();

        const event = await monitor.checkForUpdates();

        expect(event).toMatchObject({ kind: 'initial', newPrice: 75.0, newCycle: 1000, oldPrice: null });
        expect(monitor.currentPrice()).toMatchObject({ price: 75.0, cycle: 1000 });
        expect(monitor.history.all().map(e => e.eventType)).toEqual(['initial']);
        expect(monitor.lastCheck()?.outcome).toBe('changed');
    });

    it('emits an update above the threshold', async () => {
        serve(payload({ price: 75.0, cycle: 1000 }), payload({ price: 76.5, cycle: 1001 }));
        const monitor = createMonitor(0.01);

        await monitor.checkForUpdates();
        const event = await monitor.checkForUpdates();

        expect(event?.kind).toBe('update');
        expect(event?.oldPrice).toBe(75.0);
        expect(event?.oldCycle).toBe(1000);
        expect(event?.delta).toBeCloseTo(1.5, 10);
        expect(event?.deltaPercent).toBeCloseTo(2.0, 10);
        expect(monitor.status().lastEvent).toBe(event);
    });

    it('advances the current price without an event below the threshold', async () => {
        serve(payload({ price: 75.0, cycle: 1000 }), payload({ price: 75.5, cycle: 1001 }));
        const monitor = createMonitor(5.0);

        await monitor.checkForUpdates();
        const event = await monitor.checkForUpdates();

        expect(event).toBeNull();
        expect(monitor.currentPrice()).toMatchObject({ price: 75.5, cycle: 1001 });
        expect(monitor.history.all().map(e => [e.cycle, e.eventType])).toEqual([
            [1000, 'initial'],
            [1001, 'update'],
        ]);
        expect(monitor.lastCheck()?.outcome).toBe('unchanged');
    });

    it('ignores a payload with an older cycle', async () => {
        serve(payload({ price: 75.0, cycle: 1001 }), payload({ price: 80.0, cycle: 1000 }));
        const monitor = createMonitor();

        await monitor.checkForUpdates();
        const event = await monitor.checkForUpdates();

        expect(event).toBeNull();
        expect(monitor.currentPrice()).toMatchObject({ price: 75.0, cycle: 1001 });
        expect(monitor.history.size()).toBe(1);
    });

    it('does not duplicate events or history for an unchanged payload', async () => {
        const body = payload({ price: 75.0, cycle: 1000 });
        serve(body, body);
        const monitor = createMonitor();

        const first = await monitor.checkForUpdates();
        const second = await monitor.checkForUpdates();

        expect(first?.kind).toBe('initial');
        expect(second).toBeNull();
        expect(monitor.history.size()).toBe(1);
    });

    it('reports malformed payloads as a failed check without touching state', async () => {
        serve(payload({ price: 75.0, cycle: 1000 }), '[]', '[{"price": 76}]');
        const monitor = createMonitor();
        await monitor.checkForUpdates();

        expect(await monitor.checkForUpdates()).toBeNull();
        expect(monitor.lastCheck()).toMatchObject({ outcome: 'failed', error: 'Payload contains no price records' });

        expect(await monitor.checkForUpdates()).toBeNull();
        expect(monitor.lastCheck()?.outcome).toBe('failed');

        expect(monitor.currentPrice()).toMatchObject({ price: 75.0, cycle: 1000 });
        expect(monitor.history.size()).toBe(1);
    });

    it('reports fetch failures through lastCheck', async () => {
        serve();
        const monitor = createMonitor();

        expect(await monitor.checkForUpdates()).toBeNull();
        expect(monitor.lastCheck()).toMatchObject({ outcome: 'failed', error: 'http_status:404' });
        expect(monitor.currentPrice()).toBeNull();
    });

    it('restores the current price from history on construction', async () => {
        const seeded = new HistoryStore({ filePath: historyFile });
        seeded.append({ price: 75.0, cycle: 1000 }, 'initial');
        seeded.append({ price: 76.0, cycle: 1001 }, 'update');

        serve(payload({ price: 76.0, cycle: 1001 }));
        const monitor = createMonitor();

        expect(monitor.currentPrice()).toMatchObject({ price: 76.0, cycle: 1001 });
        expect(await monitor.checkForUpdates()).toBeNull();
        expect(monitor.history.size()).toBe(2);
    });

    it('skips a check while another is in flight', async () => {
        let release: (response: Response) => void = () => undefined;
        const fetchSpy = vi.fn().mockImplementation(() => new Promise<Response>((resolve) => {
            release = resolve;
        }));
        globalThis.fetch = fetchSpy;
        const monitor = createMonitor();

        const first = monitor.checkForUpdates();
        const second = await monitor.checkForUpdates();
        release(new Response(payload({ price: 75.0, cycle: 1000 }), { status: 200 }));

        expect(second).toBeNull();
        expect((await first)?.kind).toBe('initial');
        expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it('toggles the active flag', () => {
        const monitor = createMonitor();

        monitor.start();
        expect(monitor.isActive()).toBe(true);
        monitor.start();
        expect(monitor.isActive()).toBe(true);

        monitor.stop();
        expect(monitor.isActive()).toBe(false);
    });

    it('summarizes recent history', async () => {
        serve(
            payload({ price: 70, cycle: 1 }),
            payload({ price: 72, cycle: 2 }),
            payload({ price: 74, cycle: 3 }),
        );
        const monitor = createMonitor();
        for (let i = 0; i < 3; i++) {
            await monitor.checkForUpdates();
        }

        expect(monitor.summary(2)).toMatchObject({ minPrice: 72, maxPrice: 74, avgPrice: 73, windowSize: 2 });
        expect(createMonitorWithEmptyHistory().summary()).toBeNull();

        function createMonitorWithEmptyHistory() {
            return new PriceMonitor({
                poller: new AdaptivePoller({ url: URL }),
                history: new HistoryStore({ filePath: join(dir, 'other.json') }),
            });
        }
    });

    it('reports a fixed-shape status', async () => {
        serve(payload({ price: 75.0, cycle: 1000 }));
        const monitor = createMonitor(0.25);
        monitor.start();
        await monitor.checkForUpdates();

        const status = monitor.status();

        expect(status.active).toBe(true);
        expect(status.currentPrice).toMatchObject({ price: 75.0, cycle: 1000 });
        expect(status.historyCount).toBe(1);
        expect(status.changeThreshold).toBe(0.25);
        expect(status.poll.url).toBe(URL);
        expect(status.poll.currentIntervalSeconds).toBe(60);
    });

    it('reset clears prices, poll state and the history file', async () => {
        serve(payload({ price: 75.0, cycle: 1000 }), payload({ price: 75.0, cycle: 1000 }));
        const monitor = createMonitor();
        monitor.start();
        await monitor.checkForUpdates();
        expect(existsSync(historyFile)).toBe(true);

        monitor.reset();

        expect(monitor.currentPrice()).toBeNull();
        expect(monitor.isActive()).toBe(false);
        expect(monitor.status().lastEvent).toBeNull();
        expect(monitor.poller.state().contentHash).toBeNull();
        expect(monitor.history.size()).toBe(0);
        expect(existsSync(historyFile)).toBe(false);

        // Same body again counts as new content after a reset
        expect((await monitor.checkForUpdates())?.kind).toBe('initial');
    });
    it('discards a check that was in flight across a reset', async () => {
        let release: (response: Response) => void = () => undefined;
        globalThis.fetch = vi.fn().mockImplementation(() => new Promise<Response>((resolve) => {
            release = resolve;
        }));
        const monitor = createMonitor();

        const pending = monitor.checkForUpdates();
        monitor.reset();
        release(new Response(payload({ price: 75.0, cycle: 1000 }), { status: 200 }));

        expect(await pending).toBeNull();
        expect(monitor.currentPrice()).toBeNull();
        expect(monitor.status().lastEvent).toBeNull();
        expect(monitor.poller.state().contentHash).toBeNull();
        expect(monitor.history.size()).toBe(0);
        expect(existsSync(historyFile)).toBe(false);
    });

    it('tracks a move away from a zero price without an update event', async () => {
        serve(payload({ price: 0, cycle: 1000 }), payload({ price: 5, cycle: 1001 }));
        const monitor = createMonitor();

        const first = await monitor.checkForUpdates();
        const second = await monitor.checkForUpdates();

        expect(first).toMatchObject({ kind: 'initial', newPrice: 0, newCycle: 1000 });
        expect(second).toBeNull();
        expect(monitor.currentPrice()).toMatchObject({ price: 5, cycle: 1001 });
        expect(monitor.history.all().map(e => e.eventType)).toEqual(['initial', 'update']);
        expect(monitor.lastCheck()?.outcome).toBe('unchanged');
    });
});
