import { Readable } from 'node:stream';
import type {
    InboundAttachment,
    InboundMessage,
    InboundMessageHandler,
    MessagingTransport,
    TransportConfig,
    TransportHooks,
} from '../types/messaging.js';
import { GatewayError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';

type FetchFn = typeof fetch;

export interface SignalRestTransportOptions {
    /** Base URL of the signal-cli REST daemon, e.g. `http://127.0.0.1:8080`. */
    baseUrl: string;
    /** Long-poll window of a single receive request. */
    receiveTimeoutSec: number;
    fetchImpl?: FetchFn;
}

interface RestAttachment {
    id: string;
    contentType?: string;
    filename?: string;
}

interface RestEnvelope {
    source?: string;
    sourceNumber?: string;
    timestamp?: number;
    dataMessage?: {
        timestamp?: number;
        message?: string | null;
        attachments?: RestAttachment[];
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function parseAttachment(value: unknown): RestAttachment | null {
    if (!isRecord(value) || typeof value.id !== 'string') {
        return null;
    }
    return {
        id: value.id,
        contentType: optionalString(value.contentType),
        filename: optionalString(value.filename),
    };
}

export function parseEnvelope(value: unknown): RestEnvelope | null {
    if (!isRecord(value) || !isRecord(value.envelope)) {
        return null;
    }
    const envelope = value.envelope;
    const data = isRecord(envelope.dataMessage) ? envelope.dataMessage : null;

    return {
        source: optionalString(envelope.source),
        sourceNumber: optionalString(envelope.sourceNumber),
        timestamp: optionalNumber(envelope.timestamp),
        dataMessage: data
            ? {
                timestamp: optionalNumber(data.timestamp),
                message: optionalString(data.message) ?? null,
                attachments: Array.isArray(data.attachments)
                    ? data.attachments
                        .map(parseAttachment)
                        .filter((attachment): attachment is RestAttachment => attachment !== null)
                    : [],
            }
            : undefined,
    };
}

function isAbortError(err: unknown): boolean {
    return err instanceof Error && err.name === 'AbortError';
}

/**
 * Transport backed by a signal-cli REST daemon. Registration, sending and
 * receiving go over its HTTP API; the daemon owns the protocol state.
 */
export class SignalRestTransport implements MessagingTransport {
    readonly #baseUrl: string;
    readonly #receiveTimeoutSec: number;
    readonly #fetch: FetchFn;
    #config: TransportConfig | null = null;

    constructor(options: SignalRestTransportOptions) {
        this.#baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.#receiveTimeoutSec = Math.max(1, Math.floor(options.receiveTimeoutSec));
        this.#fetch = options.fetchImpl ?? fetch;
    }

    #requireConfig(): TransportConfig {
        if (!this.#config) {
            throw new GatewayError('TransportFailure', 'transport not set up');
        }
        return this.#config;
    }

    async #request(method: 'GET' | 'POST', route: string, body?: unknown, signal?: AbortSignal): Promise<Response> {
        const url = `${this.#baseUrl}${route}`;
        if (this.#config?.logLevel === 'debug') {
            void logThought(`[SignalTransport] ${method} ${route}`, 'debug');
        }

        let response: Response;
        try {
            response = await this.#fetch(url, {
                method,
                headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
                body: body === undefined ? undefined : JSON.stringify(body),
                signal,
            });
        } catch (err) {
            if (isAbortError(err)) throw err;
            const message = err instanceof Error ? err.message : String(err);
            throw new GatewayError('TransportFailure', `${method} ${route} failed: ${message}`, { cause: err });
        }

        if (!response.ok) {
            const detail = (await response.text().catch(() => '')).trim();
            throw new GatewayError(
                'TransportFailure',
                `${method} ${route} failed (${response.status})${detail ? `: ${detail}` : ''}`,
            );
        }
        return response;
    }

    async setup(hooks: TransportHooks): Promise<void> {
        const config = hooks.getConfig();
        this.#config = config;

        const storagePassword = await hooks.getStoragePassword();
        if (storagePassword) {
            throw new GatewayError('TransportFailure', 'the REST daemon keeps its own store and takes no storage password');
        }

        const number = encodeURIComponent(config.number);
        if (config.register) {
            await this.#request('POST', `/v1/register/${number}`, { use_voice: config.verificationType === 'voice' });
            const code = (await hooks.getVerificationCode()).trim();
            if (!code) {
                throw new GatewayError('TransportFailure', 'empty verification code');
            }
            await this.#request('POST', `/v1/register/${number}/verify/${encodeURIComponent(code)}`, {});
            await hooks.registrationDone();
            return;
        }

        const response = await this.#request('GET', '/v1/accounts');
        const accounts: unknown = await response.json();
        if (!Array.isArray(accounts) || !accounts.includes(config.number)) {
            throw new GatewayError('TransportFailure', `account ${config.number} is not registered with the daemon`);
        }
    }

    async sendMessage(number: string, text: string): Promise<void> {
        const config = this.#requireConfig();
        await this.#request('POST', '/v2/send', {
            number: config.number,
            recipients: [number],
            message: text,
        });
    }

    async sendAttachment(number: string, text: string, attachment: Readable, fileName: string): Promise<void> {
        const config = this.#requireConfig();
        const chunks: Buffer[] = [];
        for await (const chunk of attachment) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
        }
        const encoded = Buffer.concat(chunks).toString('base64');
        const safeName = fileName.replace(/[;,]/g, '_');

        await this.#request('POST', '/v2/send', {
            number: config.number,
            recipients: [number],
            message: text,
            base64_attachments: [`data:application/octet-stream;filename=${safeName};base64,${encoded}`],
        });
    }

    #toAttachment(attachment: RestAttachment): InboundAttachment {
        return {
            contentType: attachment.contentType,
            fileName: attachment.filename,
            open: async () => {
                const response = await this.#request('GET', `/v1/attachments/${encodeURIComponent(attachment.id)}`);
                return Readable.from([Buffer.from(await response.arrayBuffer())]);
            },
        };
    }

    #toInbound(envelope: RestEnvelope): InboundMessage | null {
        const data = envelope.dataMessage;
        const source = envelope.sourceNumber ?? envelope.source;
        if (!data || !source) {
            return null;
        }
        const millis = data.timestamp ?? envelope.timestamp;
        return {
            source,
            text: data.message ?? '',
            timestamp: millis === undefined ? new Date() : new Date(millis),
            attachments: (data.attachments ?? []).map((attachment) => this.#toAttachment(attachment)),
        };
    }

    async listen(onMessage: InboundMessageHandler, signal: AbortSignal): Promise<void> {
        const config = this.#requireConfig();
        const route = `/v1/receive/${encodeURIComponent(config.number)}?timeout=${this.#receiveTimeoutSec}`;

        while (!signal.aborted) {
            let batch: unknown;
            try {
                const response = await this.#request('GET', route, undefined, signal);
                batch = await response.json();
            } catch (err) {
                if (signal.aborted || isAbortError(err)) return;
                throw err;
            }

            if (!Array.isArray(batch)) {
                throw new GatewayError('TransportFailure', 'unexpected receive payload');
            }
            for (const item of batch) {
                const envelope = parseEnvelope(item);
                const message = envelope ? this.#toInbound(envelope) : null;
                if (message) {
                    await onMessage(message);
                }
            }
        }
    }
}
