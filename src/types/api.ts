import type { GatewayErrorCode } from './errors.js';
import type { ListenerState } from '../services/inbound-listener.js';
import type { ActivationState } from '../core/activation.js';

export type ApiStatus = 'OK' | 'KO';

export interface ApiEnvelope<T = unknown> {
    status: ApiStatus;
    /** Payload on success, error message on failure. */
    response: T | string | null;
    code?: GatewayErrorCode;
    correlationId?: string;
    timestamp: string;
}

// ── Messaging ───────────────────────────────────────────────────────────────

export interface SendMessageRequest {
    /** Contact file path, relative to the storage mount point. */
    contact: string;
    msg: string;
    /** Attachment file path, relative to the storage mount point. */
    attachment?: string;
}

export interface HistoryRequest {
    contact: string;
}

// ── Status ──────────────────────────────────────────────────────────────────

export interface NotificationData {
    id: string;
    level: 'notice' | 'error';
    message: string;
    createdAt: string;
    expiresAt: string;
}

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    activation: ActivationState;
    number: string | null;
    listener: {
        state: ListenerState;
        consecutiveFailures: number;
        lastError: string | null;
    } | null;
    notifications: number;
}
