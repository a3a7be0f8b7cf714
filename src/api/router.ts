import { createServer, type Server } from 'node:http';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { handleSend, handleHistory, type MessagingDeps } from './handlers/messaging.js';
import { handleDownload, type FileDeps } from './handlers/files.js';
import { handleHealth, handleNotifications, type StatusDeps } from './handlers/status.js';
import { requestLogger, requireSignature, sendError, setRawRequestBody } from './shared.js';
import type { ActivationMachine } from '../core/activation.js';
import type { AttachmentStore } from '../services/attachment-store.js';
import type { MessageRelay } from '../services/message-relay.js';
import type { NotificationCenter } from '../services/notification-center.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    relay: MessageRelay;
    attachments: AttachmentStore;
    activation: ActivationMachine;
    notifications: NotificationCenter;
}

/**
 * Build the HTTP API.
 *
 * Endpoints:
 *   GET  /health                     — Activation and listener snapshot
 *   POST /api/messaging/send         — Send a message, optionally with an attachment (signed)
 *   GET  /api/messaging/history      — Tail of a contact's history, `contact` in the query (signed)
 *   POST /api/messaging/history      — Same, `contact` in the body (signed)
 *   POST /api/file/download          — Download a stored file, e.g. an attachment (signed)
 *   GET  /api/status/notifications   — Active transient notifications (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    const messagingDeps: MessagingDeps = { relay: deps.relay };
    const fileDeps: FileDeps = { attachments: deps.attachments };
    const statusDeps: StatusDeps = { activation: deps.activation, notifications: deps.notifications };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(statusDeps));

    app.post('/api/messaging/send', requireSignature, handleSend(messagingDeps));
    app.get('/api/messaging/history', requireSignature, handleHistory(messagingDeps));
    app.post('/api/messaging/history', requireSignature, handleHistory(messagingDeps));
    app.post('/api/file/download', requireSignature, handleDownload(fileDeps));
    app.get('/api/status/notifications', requireSignature, handleNotifications(statusDeps));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    // body-parser failures (malformed JSON, oversized payloads)
    const bodyErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
        if (res.headersSent) {
            next(err);
            return;
        }
        const message = err instanceof Error ? err.message : String(err);
        sendError(res, `Invalid request body: ${message}`, 400, 'InvalidRequest');
    };
    app.use(bodyErrorHandler);

    return app;
}

/** Create the API and start listening on `port`. */
export function startApiServer(deps: ApiServerDeps, port: number): Server {
    const server = createServer(createApiApp(deps));

    server.listen(port, () => {
        console.log(`[Vaultline API] Listening on http://localhost:${port}`);
        void logThought(`[API] HTTP server started on port ${port}.`, 'notice');
    });
    return server;
}
