import { createHash } from 'crypto';
import { env } from '../../config/env.js';
import { createLogger, errorMessage } from '../../infra/logger.js';
import type { FetchErrorKind, FetchOutcome, PollState, PollStatus, RetryPolicy } from './types.js';
import { DEFAULT_REQUEST_HEADERS, DEFAULT_RETRY_POLICY } from './types.js';

const log = createLogger('poller');

export interface AdaptivePollerOptions {
    url?: string;
    baseIntervalSeconds?: number;
    /** Consecutive no-change samples before relaxing */
    noChangeLimit?: number;
    relaxMultiplier?: number;
    timeoutMs?: number;
    retryPolicy?: RetryPolicy;
    headers?: Record<string, string>;
}

interface RawResponse {
    status: number;
    headers: Headers;
    body: string | null;
}

class RequestTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
    }
}

/**
 * Short content fingerprint: first 16 hex chars of SHA-256
 */
export function contentFingerprint(body: string): string {
    return createHash('sha256').update(body, 'utf-8').digest('hex').slice(0, 16);
}

/**
 * Map a thrown fetch failure onto a stable error kind
 */
export function classifyFetchError(error: unknown): FetchErrorKind {
    if (error instanceof RequestTimeoutError) {
        return 'timeout';
    }
    // undici reports refused/reset/DNS failures as TypeError('fetch failed')
    if (error instanceof TypeError) {
        return 'connection';
    }
    return 'unexpected';
}

/**
 * HTTP poller with content-change detection and a two-state interval:
 * base while data moves, relaxed after `noChangeLimit` quiet samples.
 * It never schedules anything itself; callers read `nextPollTime()`.
 */
export class AdaptivePoller {
    readonly url: string;
    readonly baseIntervalSeconds: number;
    readonly relaxedIntervalSeconds: number;

    private readonly noChangeLimit: number;
    private readonly timeoutMs: number;
    private readonly retryPolicy: RetryPolicy;
    private readonly headers: Record<string, string>;

    private contentHash: string | null = null;
    private etag: string | null = null;
    private lastModified: string | null = null;
    private lastResponseTime: number | null = null;
    private consecutiveNoChangeCount = 0;
    private currentIntervalSeconds: number;

    constructor(options: AdaptivePollerOptions = {}) {
        this.url = options.url ?? env.PRICE_URL;
        this.baseIntervalSeconds = options.baseIntervalSeconds ?? env.POLLING_INTERVAL_S;
        this.relaxedIntervalSeconds = this.baseIntervalSeconds * (options.relaxMultiplier ?? env.RELAX_MULTIPLIER);
        this.noChangeLimit = options.noChangeLimit ?? env.NO_CHANGE_LIMIT;
        this.timeoutMs = options.timeoutMs ?? env.REQUEST_TIMEOUT_MS;
        this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
        this.headers = { ...DEFAULT_REQUEST_HEADERS, ...(options.headers ?? {}) };
        this.currentIntervalSeconds = this.baseIntervalSeconds;
    }

    /**
     * Fetch the endpoint once (with retries). Failures are reported through
     * `info.error`; this never rejects.
     */
    async fetch(useConditional: boolean = true): Promise<FetchOutcome> {
        const startTime = Date.now();
        const headers = { ...this.headers, ...(useConditional ? this.conditionalHeaders() : {}) };
        let attempts = 0;

        try {
            const response = await this.requestWithRetry(headers, (attempt) => {
                attempts = attempt;
            });
            const timestamp = Date.now();
            const info = {
                statusCode: response.status,
                responseTimeMs: timestamp - startTime,
                timestamp,
                attempts,
            };

            if (response.status === 304) {
                this.lastResponseTime = timestamp;
                log.info('fetch.not_modified', { url: this.url, responseTimeMs: info.responseTimeMs });
                this.recordSample(false);
                return { changed: false, payload: null, info };
            }

            if (response.status === 200 && response.body !== null) {
                this.lastResponseTime = timestamp;
                const hash = contentFingerprint(response.body);
                const changed = hash !== this.contentHash;

                if (changed) {
                    this.contentHash = hash;
                    this.etag = response.headers.get('etag') ?? this.etag;
                    this.lastModified = response.headers.get('last-modified') ?? this.lastModified;
                    log.info('fetch.changed', { hash: hash.slice(0, 8), bytes: response.body.length });
                } else {
                    log.info('fetch.unchanged', { hash: hash.slice(0, 8) });
                }

                this.recordSample(changed);
                return { changed, payload: response.body, info };
            }

            const error: FetchErrorKind = `http_status:${response.status}`;
            log.warn('fetch.unexpected_status', { url: this.url, statusCode: response.status, attempts });
            return { changed: false, payload: null, info: { ...info, error } };
        } catch (error) {
            const timestamp = Date.now();
            const kind = classifyFetchError(error);

            log.error('fetch.error', {
                url: this.url,
                kind,
                attempts,
                error: errorMessage(error),
            });

            return {
                changed: false,
                payload: null,
                info: { responseTimeMs: timestamp - startTime, timestamp, attempts, error: kind },
            };
        }
    }

    /**
     * Epoch ms at which the next poll is due
     */
    nextPollTime(): number {
        if (this.lastResponseTime === null) {
            return Date.now() + this.baseIntervalSeconds * 1000;
        }
        return this.lastResponseTime + this.currentIntervalSeconds * 1000;
    }

    state(): PollState {
        return {
            contentHash: this.contentHash,
            etag: this.etag,
            lastModified: this.lastModified,
            lastResponseTime: this.lastResponseTime,
            consecutiveNoChangeCount: this.consecutiveNoChangeCount,
            currentIntervalSeconds: this.currentIntervalSeconds,
        };
    }

    status(): PollStatus {
        return {
            ...this.state(),
            contentHash: this.contentHash ? this.contentHash.slice(0, 8) : null,
            url: this.url,
            baseIntervalSeconds: this.baseIntervalSeconds,
            relaxedIntervalSeconds: this.relaxedIntervalSeconds,
            nextPollTime: this.nextPollTime(),
        };
    }

    /**
     * Forget validators, fingerprint and counters
     */
    reset(): void {
        this.contentHash = null;
        this.etag = null;
        this.lastModified = null;
        this.lastResponseTime = null;
        this.consecutiveNoChangeCount = 0;
        this.currentIntervalSeconds = this.baseIntervalSeconds;

        log.info('state.reset', { url: this.url });
    }

    private conditionalHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};

        if (this.etag) {
            headers['If-None-Match'] = this.etag;
        }
        if (this.lastModified) {
            headers['If-Modified-Since'] = this.lastModified;
        }

        return headers;
    }

    /**
     * Two-state rate limiter: reset on change, relax after N quiet samples
     */
    private recordSample(changed: boolean): void {
        if (changed) {
            if (this.currentIntervalSeconds !== this.baseIntervalSeconds) {
                log.info('interval.reset', { intervalSeconds: this.baseIntervalSeconds });
            }
            this.consecutiveNoChangeCount = 0;
            this.currentIntervalSeconds = this.baseIntervalSeconds;
            return;
        }

        this.consecutiveNoChangeCount++;

        if (
            this.consecutiveNoChangeCount >= this.noChangeLimit &&
            this.currentIntervalSeconds !== this.relaxedIntervalSeconds
        ) {
            this.currentIntervalSeconds = this.relaxedIntervalSeconds;
            log.info('interval.relaxed', {
                consecutiveNoChangeCount: this.consecutiveNoChangeCount,
                intervalSeconds: this.relaxedIntervalSeconds,
            });
        }
    }

    /**
     * GET with capped exponential backoff on retryable statuses and
     * network failures. Returns the last response once retries run out.
     */
    private async requestWithRetry(
        headers: Record<string, string>,
        onAttempt: (attempt: number) => void
    ): Promise<RawResponse> {
        const { maxRetries, retryableStatusCodes } = this.retryPolicy;
        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
            onAttempt(attempt);
            const canRetry = attempt <= maxRetries;

            try {
                const response = await this.requestOnce(headers);

                if (canRetry && retryableStatusCodes.includes(response.status)) {
                    const delayMs = this.retryAfterDelay(response) ?? this.backoffDelay(attempt);
                    log.warn('fetch.retry', { attempt, statusCode: response.status, delayMs });
                    await this.sleep(delayMs);
                    continue;
                }

                return response;
            } catch (error) {
                lastError = error;

                if (canRetry) {
                    log.warn('fetch.retry', { attempt, error: errorMessage(error) });
                    await this.sleep(this.backoffDelay(attempt));
                    continue;
                }
            }
        }

        throw lastError;
    }

    /**
     * Single attempt; the timeout covers reading the body too
     */
    private async requestOnce(headers: Record<string, string>): Promise<RawResponse> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            const response = await fetch(this.url, {
                method: 'GET',
                headers,
                signal: controller.signal,
                redirect: 'follow',
            });
            const text = await response.text();

            return {
                status: response.status,
                headers: response.headers,
                body: response.status === 200 ? text : null,
            };
        } catch (error) {
            if (controller.signal.aborted) {
                throw new RequestTimeoutError(this.timeoutMs);
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private backoffDelay(attempt: number): number {
        const { initialDelayMs, backoffMultiplier, maxDelayMs } = this.retryPolicy;
        return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
    }

    /**
     * Server-requested wait on 429/503, in delta-seconds or HTTP-date
     * form, capped at the policy's maxDelayMs. Null when absent or unusable.
     */
    private retryAfterDelay(response: RawResponse): number | null {
        if (response.status !== 429 && response.status !== 503) {
            return null;
        }

        const value = response.headers.get('retry-after')?.trim();
        if (!value) {
            return null;
        }

        let delayMs: number;
        if (/^\d+$/.test(value)) {
            delayMs = parseInt(value, 10) * 1000;
        } else {
            const at = Date.parse(value);
            if (Number.isNaN(at)) {
                return null;
            }
            delayMs = Math.max(0, at - Date.now());
        }

        return Math.min(delayMs, this.retryPolicy.maxDelayMs);
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
