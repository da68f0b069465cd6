/**
 * Network Manager for chapter-binder
 * Handles HTTP requests with retry logic, failure classification and anti-ban pacing
 */

import { HEADERS, NETWORK } from '../config/constants';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { sleep, backoffDelay } from '../utils/time';
import { CancelledError, HttpError } from './errors';
import type { FetchOptions, NetworkSettings } from '../types';

/**
 * Longest wait honoured from a Retry-After header, in milliseconds
 */
const MAX_RETRY_AFTER = 120000;

export interface NetworkOptions extends Partial<NetworkSettings> {
    headers?: Record<string, string>;
    logger?: Logger;
}

/**
 * Whether an HTTP status is worth retrying
 */
export function isTransientStatus(status: number): boolean {
    return status >= 500 || status === 429 || status === 408;
}

/**
 * NetworkManager handles all HTTP operations with built-in resilience features:
 * - Bounded exponential backoff retry on transient failures
 * - Immediate failure on non-transient HTTP statuses
 * - Anti-ban pause every N requests
 * - Cooperative cancellation between attempts
 */
export class NetworkManager {
    private requestCount: number = 0;
    private readonly headers: Record<string, string>;
    private readonly settings: NetworkSettings;
    private readonly logger: Logger;

    constructor(options?: NetworkOptions) {
        this.headers = { ...HEADERS, ...options?.headers };
        this.logger = options?.logger ?? silentLogger;
        this.settings = {
            maxRetries: options?.maxRetries ?? NETWORK.MAX_RETRIES,
            timeout: options?.timeout ?? NETWORK.TIMEOUT,
            backoffBase: options?.backoffBase ?? NETWORK.BACKOFF_BASE,
            backoffCeiling: options?.backoffCeiling ?? NETWORK.BACKOFF_CEILING,
            requestsBeforePause: options?.requestsBeforePause ?? NETWORK.REQUESTS_BEFORE_PAUSE,
            antiBanPause: options?.antiBanPause ?? NETWORK.ANTI_BAN_PAUSE,
        };
    }

    /**
     * Performs a single GET with a timeout
     */
    private async fetchOnce(url: string, headers: Record<string, string>, timeout: number): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            return await fetch(url, { headers, signal: controller.signal });
        } finally {
            clearTimeout(timeoutId);
            this.requestCount++;
        }
    }

    /**
     * Maps a thrown fetch error to an HttpError. Timeouts, resets and DNS
     * failures are all transient.
     */
    private toHttpError(url: string, error: unknown): HttpError {
        if (error instanceof HttpError) return error;
        const message = error instanceof Error ? error.message : String(error);
        if (error instanceof Error && error.name === 'AbortError') {
            return new HttpError(`Request timed out: ${url}`, null, true, { cause: error });
        }
        return new HttpError(`Network error for ${url}: ${message}`, null, true, { cause: error });
    }

    /**
     * Retry loop shared by all fetch helpers. `read` runs inside the loop so
     * a body that fails mid-transfer is retried like any other transient failure.
     *
     * An attempt that has started always runs to completion or timeout;
     * the signal is only consulted before a retry.
     *
     * @throws HttpError when the failure is not transient or retries are exhausted
     * @throws CancelledError when the signal aborted before a retry
     */
    private async retrying<T>(
        url: string,
        options: FetchOptions | undefined,
        read: (response: Response) => Promise<T>
    ): Promise<T> {
        await this.applyAntiBan(options?.signal);

        const timeout = options?.timeout ?? this.settings.timeout;
        const headers = { ...this.headers, ...options?.headers };
        const { maxRetries, backoffBase, backoffCeiling } = this.settings;
        const pacing = options?.pacing ?? 0;

        let lastError: HttpError | null = null;

        for (let attempt = 0; attempt < maxRetries; attempt++) {
            if (attempt > 0 && options?.signal?.aborted) {
                throw new CancelledError(`Cancelled before retrying ${url}`);
            }

            let retryAfter = 0;
            try {
                const response = await this.fetchOnce(url, headers, timeout);
                if (response.ok) {
                    const result = await read(response);
                    await sleep(pacing);
                    return result;
                }

                await response.body?.cancel();
                if (response.status === 429) {
                    retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                }
                lastError = new HttpError(
                    `HTTP ${response.status}: ${response.statusText || 'request failed'} (${url})`,
                    response.status,
                    isTransientStatus(response.status)
                );
            } catch (error) {
                lastError = this.toHttpError(url, error);
            }

            await sleep(pacing);
            options?.onAttemptFailed?.(attempt + 1, lastError, lastError.transient);

            if (!lastError.transient) {
                throw lastError;
            }

            if (attempt < maxRetries - 1) {
                const delay = Math.max(backoffDelay(attempt, backoffBase, backoffCeiling), retryAfter);
                await sleep(delay, options?.signal);
            }
        }

        throw lastError ?? new HttpError(`Failed to fetch ${url} after ${maxRetries} retries`, null, true);
    }

    /**
     * Fetches a URL and returns its body as a Buffer
     */
    async fetchBuffer(url: string, options?: FetchOptions): Promise<Buffer> {
        return this.retrying(url, options, async (response) => Buffer.from(await response.arrayBuffer()));
    }

    /**
     * Fetches a URL and returns its body as text
     */
    async fetchText(url: string, options?: FetchOptions): Promise<string> {
        return this.retrying(url, options, (response) => response.text());
    }

    private parseRetryAfter(value: string | null): number {
        if (!value) return 0;
        const seconds = Number(value);
        return Number.isFinite(seconds) && seconds > 0 ? Math.min(seconds * 1000, MAX_RETRY_AFTER) : 0;
    }

    /**
     * Applies anti-ban pause after every N requests
     */
    private async applyAntiBan(signal?: AbortSignal): Promise<void> {
        const every = this.settings.requestsBeforePause;
        if (every > 0 && this.requestCount > 0 && this.requestCount % every === 0) {
            this.logger.info(`Anti-ban pause: waiting ${this.settings.antiBanPause / 1000}s after ${this.requestCount} requests`);
            await sleep(this.settings.antiBanPause, signal);
        }
    }

    /**
     * Gets the current request count
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    /**
     * Resets the request count
     */
    resetRequestCount(): void {
        this.requestCount = 0;
    }
}
