/**
 * Timer helpers
 */

/**
 * Waits for `ms` milliseconds. Resolves early, without throwing,
 * when the signal aborts, so callers can check the signal afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
        return Promise.resolve();
    }

    return new Promise((resolve) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Exponential backoff delay for a zero-based retry attempt, bounded by `ceiling`
 */
export function backoffDelay(attempt: number, base: number, ceiling: number): number {
    return Math.min(base * Math.pow(2, attempt), ceiling);
}

/**
 * Formats elapsed seconds as mm:ss or hh:mm:ss
 */
export function formatDuration(seconds: number): string {
    const total = Math.max(0, Math.floor(seconds));
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor((total % 3600) / 60);
    const secs = total % 60;
    const pad = (n: number): string => String(n).padStart(2, '0');

    if (hours === 0) {
        return `${pad(minutes)}:${pad(secs)}`;
    }
    return `${pad(hours)}:${pad(minutes)}:${pad(secs)}`;
}
