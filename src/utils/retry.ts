/** Backoff policy for supervised restarts. */
export interface BackoffOptions {
    /** Base delay in ms before the first restart. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 60000 */
    maxDelayMs?: number;
}

const DEFAULTS: Required<BackoffOptions> = {
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 60_000,
};

/**
 * Delay before restart number `attempt` (1-based): the base delay grows by
 * `backoffFactor` per attempt and is capped at `maxDelayMs`.
 */
export function backoffDelay(attempt: number, options: BackoffOptions = {}): number {
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const exponent = Math.max(0, Math.floor(attempt) - 1);
    return Math.min(baseDelayMs * backoffFactor ** exponent, maxDelayMs);
}

/** Resolve after `ms`, or early when `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
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
