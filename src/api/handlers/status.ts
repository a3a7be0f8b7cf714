import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { ActivationMachine } from '../../core/activation.js';
import type { NotificationCenter } from '../../services/notification-center.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface StatusDeps {
    activation: ActivationMachine;
    notifications: NotificationCenter;
}

/** GET /health — activation, listener and notification summary. */
export function handleHealth(deps: StatusDeps) {
    return (_req: Request, res: Response): void => {
        const listener = deps.activation.listener?.snapshot() ?? null;
        const data: HealthData = {
            status: deps.activation.state === 'ListenerRunning' && listener?.state !== 'failed' ? 'ok' : 'degraded',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            activation: deps.activation.state,
            number: deps.activation.number,
            listener: listener
                ? {
                    state: listener.state,
                    consecutiveFailures: listener.consecutiveFailures,
                    lastError: listener.lastError,
                }
                : null,
            notifications: deps.notifications.size,
        };
        sendOk(res, data);
    };
}

/** GET /api/status/notifications — active transient notifications. */
export function handleNotifications(deps: StatusDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, deps.notifications.list());
    };
}
