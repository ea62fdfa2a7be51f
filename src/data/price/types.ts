/**
 * One price record from the upstream payload
 */
export interface PricePoint {
    readonly price: number;
    readonly cycle: number;         // Upstream generation round, integer
    readonly observedAt?: string;   // ISO timestamp when restored from history
}

/**
 * Event kind: first observation vs. subsequent change
 */
export type ChangeKind = 'initial' | 'update';

/**
 * Reportable price transition
 */
export interface ChangeEvent {
    readonly timestamp: number;     // Epoch ms
    readonly oldPrice: number | null;
    readonly newPrice: number;
    readonly oldCycle: number | null;
    readonly newCycle: number;
    readonly delta: number;
    readonly deltaPercent: number;
    readonly kind: ChangeKind;
}

/**
 * Aggregate view over the records of one payload
 */
export interface PayloadStatistics {
    latestPrice: number;
    latestCycle: number;
    minPrice: number;
    maxPrice: number;
    avgPrice: number;
    minCycle: number;
    maxCycle: number;
    totalEntries: number;
}

/**
 * Classified fetch failure
 */
export type FetchErrorKind = 'timeout' | 'connection' | 'unexpected' | `http_status:${number}`;

/**
 * Metadata about one fetch attempt
 */
export interface ResponseInfo {
    statusCode?: number;
    responseTimeMs: number;
    timestamp: number;              // Epoch ms when the fetch finished
    attempts: number;               // Includes retries
    error?: FetchErrorKind;
}

/**
 * Result of `AdaptivePoller.fetch`
 */
export interface FetchOutcome {
    changed: boolean;
    payload: string | null;
    info: ResponseInfo;
}

/**
 * Poller-owned state
 */
export interface PollState {
    contentHash: string | null;
    etag: string | null;
    lastModified: string | null;
    lastResponseTime: number | null;    // Epoch ms
    consecutiveNoChangeCount: number;
    currentIntervalSeconds: number;
}

/**
 * Poller snapshot for status displays
 */
export interface PollStatus extends PollState {
    url: string;
    baseIntervalSeconds: number;
    relaxedIntervalSeconds: number;
    nextPollTime: number;           // Epoch ms
}

/**
 * Retry policy for transient failures
 */
export interface RetryPolicy {
    maxRetries: number;
    initialDelayMs: number;
    backoffMultiplier: number;
    maxDelayMs: number;
    retryableStatusCodes: number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxRetries: 3,
    initialDelayMs: 1000,
    backoffMultiplier: 2,
    maxDelayMs: 8000,
    retryableStatusCodes: [429, 500, 502, 503, 504],
};

export const DEFAULT_REQUEST_HEADERS: Record<string, string> = {
    'User-Agent': 'cycle-price-watch/0.1 (+price monitor)',
    'Accept': 'application/json, text/plain, */*',
    'Accept-Language': 'en-US,en;q=0.9',
    'Cache-Control': 'no-cache',
    'Pragma': 'no-cache',
};
