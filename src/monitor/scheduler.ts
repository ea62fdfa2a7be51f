import { env } from '../config/env.js';
import { createLogger, errorMessage } from '../infra/logger.js';
import type { ChangeEvent } from '../data/price/types.js';
import type { PriceMonitor } from './price_monitor.js';

const log = createLogger('scheduler');

/**
 * The parts of the monitor the loop drives
 */
export type SchedulableMonitor = Pick<
    PriceMonitor,
    'checkForUpdates' | 'nextPollTime' | 'lastCheck' | 'start' | 'stop' | 'isActive'
>;

export interface MonitorSchedulerOptions {
    onEvent?: (event: ChangeEvent) => void | Promise<void>;
    /** Delay after a failed check or a throwing handler */
    errorBackoffMs?: number;
    /** Delay when the next poll time is already past */
    fallbackDelayMs?: number;
}

/**
 * Cooperative poll loop: check, hand off the event, sleep until the
 * monitor's next poll time. Stopping cancels the pending sleep; a check
 * already in flight finishes and nothing further starts.
 */
export class MonitorScheduler {
    private timer: NodeJS.Timeout | null = null;
    private running = false;
    private runId = 0;

    private readonly onEvent?: (event: ChangeEvent) => void | Promise<void>;
    private readonly errorBackoffMs: number;
    private readonly fallbackDelayMs: number;

    constructor(
        private readonly monitor: SchedulableMonitor,
        options: MonitorSchedulerOptions = {}
    ) {
        this.onEvent = options.onEvent;
        this.errorBackoffMs = options.errorBackoffMs ?? env.ERROR_BACKOFF_MS;
        this.fallbackDelayMs = options.fallbackDelayMs ?? env.POLLING_INTERVAL_S * 1000;
    }

    start(): void {
        if (this.isRunning()) {
            log.warn('already_running', {});
            return;
        }

        // Supersede any chain left behind by a halted or stopped run
        this.clearTimer();
        this.runId++;
        this.running = true;
        if (!this.monitor.isActive()) {
            this.monitor.start();
        }

        log.info('started', { errorBackoffMs: this.errorBackoffMs });
        this.schedule(0, this.runId);
    }

    stop(): void {
        this.clearTimer();
        this.runId++;
        this.running = false;
        if (this.monitor.isActive()) {
            this.monitor.stop();
        }

        log.info('stopped', {});
    }

    /**
     * False once stopped, or once the monitor was deactivated elsewhere
     */
    isRunning(): boolean {
        return this.running && this.monitor.isActive();
    }

    private clearTimer(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private shouldContinue(runId: number): boolean {
        if (runId !== this.runId) {
            return false;
        }

        if (this.running && !this.monitor.isActive()) {
            this.running = false;
            this.clearTimer();
            log.warn('halted', { reason: 'monitor inactive' });
        }

        return this.running;
    }

    /**
     * setTimeout chain, so ticks never overlap
     */
    private schedule(delayMs: number, runId: number): void {
        if (!this.shouldContinue(runId)) {
            return;
        }

        this.timer = setTimeout(() => {
            this.timer = null;
            this.tick(runId).catch((error) => {
                log.error('tick.fatal', { error: errorMessage(error) });
            });
        }, delayMs);
    }

    private async tick(runId: number): Promise<void> {
        // Cancellation is honored before each fetch
        if (!this.shouldContinue(runId)) {
            return;
        }

        let delayMs: number;

        try {
            const event = await this.monitor.checkForUpdates();

            if (event && this.onEvent) {
                await this.onEvent(event);
            }

            delayMs = this.monitor.lastCheck()?.outcome === 'failed'
                ? this.errorBackoffMs
                : this.delayUntilNextPoll();
        } catch (error) {
            log.error('tick.error', { error: errorMessage(error), backoffMs: this.errorBackoffMs });
            delayMs = this.errorBackoffMs;
        }

        log.debug('tick.next', { delayMs });
        this.schedule(delayMs, runId);
    }

    private delayUntilNextPoll(): number {
        const waitMs = this.monitor.nextPollTime() - Date.now();
        return waitMs > 0 ? waitMs : this.fallbackDelayMs;
    }
}
