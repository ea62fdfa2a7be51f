import { createLogger, errorMessage } from '../infra/logger.js';
import { AdaptivePoller } from '../data/price/http_poller.js';
import { ParseError, parseLatest } from '../data/price/price_parser.js';
import { ChangeDetector } from '../strategy/change_detector.js';
import { HistoryStore } from '../storage/history_store.js';
import type { HistorySummary } from '../storage/history_store.js';
import type { ChangeEvent, PollStatus, PricePoint } from '../data/price/types.js';

const log = createLogger('monitor');

/**
 * How the last check ended. `failed` covers fetch and parse failures,
 * which `checkForUpdates` otherwise reports as a plain null.
 */
export type CheckOutcome = 'changed' | 'unchanged' | 'failed';

export interface LastCheck {
    outcome: CheckOutcome;
    at: number;                 // Epoch ms
    error?: string;
}

export interface MonitorStatus {
    active: boolean;
    currentPrice: PricePoint | null;
    lastEvent: ChangeEvent | null;
    lastCheck: LastCheck | null;
    historyCount: number;
    changeThreshold: number;
    poll: PollStatus;
}

export interface PriceMonitorOptions {
    poller?: AdaptivePoller;
    detector?: ChangeDetector;
    history?: HistoryStore;
}

/**
 * Composes poller, parser, detector and history into one check.
 * Checks must run one at a time; an overlapping call is skipped.
 */
export class PriceMonitor {
    readonly poller: AdaptivePoller;
    readonly detector: ChangeDetector;
    readonly history: HistoryStore;

    private current: PricePoint | null = null;
    private lastEvent: ChangeEvent | null = null;
    private lastCheckResult: LastCheck | null = null;
    private active = false;
    private inFlight = false;
    private generation = 0;

    constructor(options: PriceMonitorOptions = {}) {
        this.poller = options.poller ?? new AdaptivePoller();
        this.detector = options.detector ?? new ChangeDetector();
        this.history = options.history ?? new HistoryStore();

        this.restoreFromHistory();
    }

    /**
     * Poll once and return the reportable event, if any. Never rejects.
     */
    async checkForUpdates(): Promise<ChangeEvent | null> {
        if (this.inFlight) {
            log.warn('check.skipped', { reason: 'previous check still in flight' });
            return null;
        }

        this.inFlight = true;

        try {
            return await this.runCheck();
        } catch (error) {
            log.error('check.error', { error: errorMessage(error) });
            this.recordCheck('failed', errorMessage(error));
            return null;
        } finally {
            this.inFlight = false;
        }
    }

    currentPrice(): PricePoint | null {
        return this.current;
    }

    lastCheck(): LastCheck | null {
        return this.lastCheckResult;
    }

    isActive(): boolean {
        return this.active;
    }

    /**
     * Advisory flag for whatever drives the poll loop
     */
    start(): void {
        if (this.active) {
            log.warn('already_active', {});
            return;
        }
        this.active = true;
        log.info('started', { url: this.poller.url });
    }

    stop(): void {
        if (!this.active) {
            log.warn('not_active', {});
            return;
        }
        this.active = false;
        log.info('stopped', { url: this.poller.url });
    }

    nextPollTime(): number {
        return this.poller.nextPollTime();
    }

    summary(window: number = 10): HistorySummary | null {
        return this.history.summary(window);
    }

    status(): MonitorStatus {
        return {
            active: this.active,
            currentPrice: this.current,
            lastEvent: this.lastEvent,
            lastCheck: this.lastCheckResult,
            historyCount: this.history.size(),
            changeThreshold: this.detector.threshold,
            poll: this.poller.status(),
        };
    }

    /**
     * Clear held prices, poll state and the history file. A check still
     * in flight is discarded when it completes.
     */
    reset(): void {
        this.generation++;
        this.current = null;
        this.lastEvent = null;
        this.lastCheckResult = null;
        this.active = false;
        this.poller.reset();
        this.history.clear();

        log.info('reset', {});
    }

    private async runCheck(): Promise<ChangeEvent | null> {
        const generation = this.generation;
        const { changed, payload, info } = await this.poller.fetch();

        if (generation !== this.generation) {
            log.info('check.discarded', { reason: 'reset during fetch' });
            // The stale response already updated the fingerprint
            this.poller.reset();
            return null;
        }

        if (info.error) {
            this.recordCheck('failed', info.error);
            return null;
        }

        if (!changed) {
            log.debug('check.no_change', { statusCode: info.statusCode });
            this.recordCheck('unchanged');
            return null;
        }

        if (payload === null) {
            log.warn('check.missing_payload', { statusCode: info.statusCode });
            this.recordCheck('failed', 'missing payload');
            return null;
        }

        let incoming: PricePoint;
        try {
            incoming = { ...parseLatest(payload), observedAt: new Date().toISOString() };
        } catch (error) {
            if (!(error instanceof ParseError)) {
                throw error;
            }
            log.error('parse.error', { error: error.message, bytes: payload.length });
            this.recordCheck('failed', error.message);
            return null;
        }

        const event = this.detector.detect(this.current, incoming);

        if (event) {
            this.current = incoming;
            this.lastEvent = event;
            this.history.append(incoming, event.kind);
            this.recordCheck('changed');
            return event;
        }

        // Cycle moved on without a reportable delta: track it silently
        if (incoming.cycle > (this.current?.cycle ?? -Infinity)) {
            this.current = incoming;
            this.history.append(incoming, 'update');
            log.debug('price.advanced', { price: incoming.price, cycle: incoming.cycle });
        }

        this.recordCheck('unchanged');
        return null;
    }

    private recordCheck(outcome: CheckOutcome, error?: string): void {
        this.lastCheckResult = error === undefined
            ? { outcome, at: Date.now() }
            : { outcome, at: Date.now(), error };
    }

    private restoreFromHistory(): void {
        const latest = this.history.latest();

        if (!latest) {
            log.info('restore.empty', {});
            return;
        }

        this.current = {
            price: latest.price,
            cycle: latest.cycle,
            observedAt: latest.timestampIso,
        };

        log.info('restore.current_price', {
            price: latest.price,
            cycle: latest.cycle,
        });
    }
}
