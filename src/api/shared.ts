import type { Request, Response, NextFunction } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { errnoCode, isGatewayError, type GatewayErrorCode } from '../types/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { getConfigValue } from '../config/json-config.js';

type SignatureRequest = Request & { rawBody?: string };

function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        const serialized = JSON.stringify(value);
        return serialized ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    const record = value as Record<string, unknown>;
    const keys = Object.keys(record).sort((left, right) => left.localeCompare(right));
    const entries = keys.map((key) => `${JSON.stringify(key)}:${stableStringify(record[key])}`);
    return `{${entries.join(',')}}`;
}

function isEmptyBody(body: unknown): boolean {
    return body === undefined || (typeof body === 'object' && body !== null && Object.keys(body).length === 0);
}

function getSignaturePayloadCandidates(req: Request): string[] {
    // GET requests carry their parameters in the URL, so the URL is what gets signed.
    if (req.method === 'GET') {
        return [req.originalUrl];
    }

    const payloads = new Set<string>();
    const rawBody = (req as SignatureRequest).rawBody;
    if (typeof rawBody === 'string') {
        payloads.add(rawBody);
    }

    if (isEmptyBody(req.body)) {
        payloads.add('');
    }
    if (req.body !== undefined) {
        payloads.add(JSON.stringify(req.body));
        payloads.add(stableStringify(req.body));
    }

    return [...payloads];
}

/** `verify` hook for `express.json()` keeping the raw body for signature checks. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    (req as IncomingMessage & { rawBody?: string }).rawBody = buffer.toString('utf8');
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const correlationId = res.locals.correlationId as string | undefined;
    const body: ApiEnvelope<T> = {
        status: 'OK',
        response: data,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400, code?: GatewayErrorCode): void {
    const correlationId = res.locals.correlationId as string | undefined;
    const body: ApiEnvelope = {
        status: 'KO',
        response: scrubSensitiveText(message),
        code,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

/**
 * Validate the `X-Signature` header on incoming signed API requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(payload, API_SECRET)>`, where
 * the payload is the JSON body, or the path and query string for GET requests.
 *
 * If API_SECRET is not configured, all signed API requests are rejected.
 */
export function requireSignature(req: Request, res: Response, next: NextFunction): void {
    const apiSecret = getConfigValue('API_SECRET') ?? '';

    if (!apiSecret) {
        void logThought('[API] Signed request rejected — API_SECRET not configured.', 'warning');
        sendError(res, 'Signed API endpoints are unavailable (missing API_SECRET).', 503);
        return;
    }

    const signatureHeader = req.headers['x-signature'];
    if (typeof signatureHeader !== 'string' || !signatureHeader.startsWith('sha256=')) {
        void logThought('[API] Signed request rejected — missing or malformed X-Signature header.', 'warning');
        sendError(res, 'Missing or malformed X-Signature header.', 401);
        return;
    }

    const providedHex = signatureHeader.slice('sha256='.length);
    if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
        void logThought('[API] Signed request rejected — malformed signature digest.', 'warning');
        sendError(res, 'Malformed signature digest.', 401);
        return;
    }
    const provided = Buffer.from(providedHex, 'hex');
    const signatureMatches = getSignaturePayloadCandidates(req).some((payload) => {
        const expected = createHmac('sha256', apiSecret).update(payload).digest();
        return provided.length === expected.length && timingSafeEqual(provided, expected);
    });

    if (!signatureMatches) {
        void logThought('[API] Signed request rejected — signature mismatch.', 'warning');
        sendError(res, 'Invalid signature.', 403);
        return;
    }

    next();
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const STATUS_BY_CODE: Record<GatewayErrorCode, number> = {
    InvalidRequest: 400,
    InvalidContact: 400,
    InvalidNumber: 400,
    Forbidden: 403,
    TransportFailure: 502,
    StorageFailure: 500,
    VolumeFailure: 500,
    AlreadyRegistered: 409,
    NotRegistered: 503,
};

/** Map a caught error to a status code, message and gateway error code. */
export function mapError(err: unknown): { status: number; message: string; code?: GatewayErrorCode } {
    if (isGatewayError(err)) {
        const status = err.code === 'StorageFailure' && errnoCode(err) === 'ENOENT' ? 404 : STATUS_BY_CODE[err.code];
        return { status, message: scrubSensitiveText(err.message), code: err.code };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

/** Answer a request with the mapped error and log it. */
export function sendMappedError(res: Response, err: unknown): void {
    const { status, message, code } = mapError(err);
    const correlationId = res.locals.correlationId as string | undefined;
    void logThought(`[API] [${correlationId ?? '-'}] ${code ?? 'Error'}: ${message}`, status >= 500 ? 'error' : 'notice');
    sendError(res, message, status, code);
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    const method = req.method;
    const path = req.path;
    console.log(`[API] [${correlationId}] ${method} ${path}`);
    void logThought(`[API] [${correlationId}] ${method} ${path}`, 'debug');
    next();
}
