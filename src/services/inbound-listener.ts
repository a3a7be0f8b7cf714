import type { InboundMessageHandler, MessagingTransport } from '../types/messaging.js';
import { backoffDelay, sleep, type BackoffOptions } from '../utils/retry.js';
import { logThought } from '../utils/logger.js';

export type ListenerState = 'idle' | 'running' | 'backoff' | 'stopped' | 'failed';

export interface InboundListenerOptions extends BackoffOptions {
    /** Give up after this many failed runs in a row; 0 keeps retrying. */
    maxConsecutiveFailures?: number;
    label?: string;
}

export interface ListenerSnapshot {
    state: ListenerState;
    consecutiveFailures: number;
    restarts: number;
    lastError: string | null;
}

/**
 * Supervises the transport's long-running receive loop: restarts it with
 * exponential backoff when it fails or ends, and stops it on request.
 * Failures are logged and never reach the caller of `start()`.
 */
export class InboundListener {
    readonly #transport: MessagingTransport;
    readonly #onMessage: InboundMessageHandler;
    readonly #options: InboundListenerOptions;
    readonly #label: string;

    #state: ListenerState = 'idle';
    #abortController: AbortController | null = null;
    #loop: Promise<void> | null = null;
    #consecutiveFailures = 0;
    #restarts = 0;
    #lastError: string | null = null;

    constructor(transport: MessagingTransport, onMessage: InboundMessageHandler, options: InboundListenerOptions = {}) {
        this.#transport = transport;
        this.#onMessage = onMessage;
        this.#options = options;
        this.#label = options.label ?? 'listener';
    }

    get state(): ListenerState {
        return this.#state;
    }

    snapshot(): ListenerSnapshot {
        return {
            state: this.#state,
            consecutiveFailures: this.#consecutiveFailures,
            restarts: this.#restarts,
            lastError: this.#lastError,
        };
    }

    start(): void {
        if (this.#loop) return;
        const controller = new AbortController();
        this.#abortController = controller;
        this.#loop = this.#run(controller.signal);
    }

    /** Abort the receive loop and wait until it has wound down. */
    async stop(): Promise<void> {
        this.#abortController?.abort();
        const loop = this.#loop;
        if (loop) {
            await loop;
        }
        this.#loop = null;
        this.#abortController = null;
        if (this.#state !== 'failed') {
            this.#state = 'stopped';
        }
    }

    async #run(signal: AbortSignal): Promise<void> {
        const maxFailures = this.#options.maxConsecutiveFailures ?? 0;

        while (!signal.aborted) {
            this.#state = 'running';
            const startedAt = Date.now();
            try {
                await this.#transport.listen(this.#onMessage, signal);
                if (signal.aborted) break;
                // A clean end is not a failure, but it still goes through the backoff.
                this.#consecutiveFailures = 0;
                await logThought(`[Listener] ${this.#label} ended after ${Date.now() - startedAt}ms; restarting.`, 'notice');
            } catch (err) {
                if (signal.aborted) break;
                this.#consecutiveFailures += 1;
                this.#lastError = err instanceof Error ? err.message : String(err);
                await logThought(
                    `[Listener] ${this.#label} failed (${this.#consecutiveFailures} in a row): ${this.#lastError}`,
                    'error',
                );

                if (maxFailures > 0 && this.#consecutiveFailures >= maxFailures) {
                    this.#state = 'failed';
                    await logThought(`[Listener] ${this.#label} gave up after ${maxFailures} consecutive failures.`, 'error');
                    return;
                }
            }

            this.#state = 'backoff';
            this.#restarts += 1;
            await sleep(backoffDelay(Math.max(1, this.#consecutiveFailures), this.#options), signal);
        }

        this.#state = 'stopped';
    }
}
