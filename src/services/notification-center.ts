import { randomUUID } from 'node:crypto';
import type { NotificationData } from '../types/api.js';

export type NotificationLevel = NotificationData['level'];

interface ActiveNotification {
    data: NotificationData;
    timer: NodeJS.Timeout;
}

const DEFAULT_TTL_MS = 30_000;

/**
 * Transient, user-facing notices. Each notice clears itself on its own timer,
 * so raising one never waits on whatever triggered it.
 */
export class NotificationCenter {
    readonly #active = new Map<string, ActiveNotification>();
    readonly #defaultTtlMs: number;
    readonly #now: () => number;

    constructor(options: { defaultTtlMs?: number; now?: () => number } = {}) {
        this.#defaultTtlMs = Math.max(0, options.defaultTtlMs ?? DEFAULT_TTL_MS);
        this.#now = options.now ?? (() => Date.now());
    }

    notify(level: NotificationLevel, message: string, ttlMs: number = this.#defaultTtlMs): string {
        const id = randomUUID();
        const createdAt = this.#now();
        const timer = setTimeout(() => this.remove(id), ttlMs);
        timer.unref();

        this.#active.set(id, {
            data: {
                id,
                level,
                message,
                createdAt: new Date(createdAt).toISOString(),
                expiresAt: new Date(createdAt + ttlMs).toISOString(),
            },
            timer,
        });
        return id;
    }

    remove(id: string): boolean {
        const active = this.#active.get(id);
        if (!active) return false;
        clearTimeout(active.timer);
        this.#active.delete(id);
        return true;
    }

    list(): NotificationData[] {
        return [...this.#active.values()].map((active) => ({ ...active.data }));
    }

    get size(): number {
        return this.#active.size;
    }

    dispose(): void {
        for (const active of this.#active.values()) {
            clearTimeout(active.timer);
        }
        this.#active.clear();
    }
}
