import { open, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { HistoryRequest, SendMessageRequest } from '../types/api.js';
import type { ContactRecord, HistoryEntry } from '../types/contacts.js';
import { GatewayError, invalidRequest, toGatewayError } from '../types/errors.js';
import type { InboundMessage, MessagingTransport } from '../types/messaging.js';
import { logThought } from '../utils/logger.js';
import type { AttachmentStore } from './attachment-store.js';
import type { ContactDirectory } from './contact-directory.js';
import type { ConversationLog } from './conversation-log.js';
import type { NotificationCenter } from './notification-center.js';
import type { StoragePaths } from './storage-paths.js';

export interface MessageRelayDeps {
    paths: StoragePaths;
    directory: ContactDirectory;
    log: ConversationLog;
    attachments: AttachmentStore;
    notifications: NotificationCenter;
    /** Transport set up by activation; outbound calls fail until it is there. */
    getTransport: () => MessagingTransport | null;
    historySizeBytes: number;
    notificationTtlMs: number;
    now?: () => Date;
}

function requireString(body: Record<string, unknown>, field: string): string {
    const value = body[field];
    if (typeof value !== 'string' || value.length === 0) {
        throw invalidRequest(`missing or invalid "${field}" (string)`);
    }
    return value;
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
    const value = body[field];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string' || value.length === 0) {
        throw invalidRequest(`invalid "${field}" (string)`);
    }
    return value;
}

export function parseSendRequest(body: Record<string, unknown>): SendMessageRequest {
    return {
        contact: requireString(body, 'contact'),
        msg: requireString(body, 'msg'),
        attachment: optionalString(body, 'attachment'),
    };
}

export function parseHistoryRequest(body: Record<string, unknown>): HistoryRequest {
    return { contact: requireString(body, 'contact') };
}

/**
 * Outbound sends and history reads triggered by API requests, and the inbound
 * handler the listener calls. Both sides meet on the contact directory and the
 * two stores.
 */
export class MessageRelay {
    readonly #deps: MessageRelayDeps;
    readonly #now: () => Date;

    constructor(deps: MessageRelayDeps) {
        this.#deps = deps;
        this.#now = deps.now ?? (() => new Date());
    }

    #transport(): MessagingTransport {
        const transport = this.#deps.getTransport();
        if (!transport) {
            throw new GatewayError('TransportFailure', 'messaging transport is not active');
        }
        return transport;
    }

    #resolveContact(clientPath: string): ContactRecord {
        return this.#deps.directory.resolveByPath(this.#deps.paths.absolutePath(clientPath));
    }

    async send(request: SendMessageRequest): Promise<void> {
        const contact = this.#resolveContact(request.contact);
        const transport = this.#transport();
        let entry: HistoryEntry;

        if (request.attachment !== undefined) {
            const attachmentPath = await this.#deps.attachments.resolveReadablePath(request.attachment);
            // the name the operator chose, even when the path is a symlink
            const fileName = path.basename(request.attachment);

            let handle: FileHandle;
            try {
                handle = await open(attachmentPath, 'r');
            } catch (err) {
                throw toGatewayError(err, 'StorageFailure', `cannot open ${request.attachment}`);
            }
            try {
                await transport.sendAttachment(contact.number, request.msg, handle.createReadStream({ autoClose: false }), fileName);
            } catch (err) {
                throw toGatewayError(err, 'TransportFailure', 'failed to send attachment');
            } finally {
                await handle.close();
            }
            entry = { timestamp: this.#now(), direction: 'outbound', body: `[${fileName}] ${request.msg}` };
        } else {
            try {
                await transport.sendMessage(contact.number, request.msg);
            } catch (err) {
                throw toGatewayError(err, 'TransportFailure', 'failed to send message');
            }
            entry = { timestamp: this.#now(), direction: 'outbound', body: request.msg };
        }

        await this.#deps.log.append(contact, entry);
    }

    async history(request: HistoryRequest): Promise<string> {
        const contact = this.#resolveContact(request.contact);
        return this.#deps.log.readTail(contact, this.#deps.historySizeBytes);
    }

    #report(err: unknown, context: string): void {
        const message = `${context}: ${err instanceof Error ? err.message : String(err)}`;
        void logThought(`[Relay] ${message}`, 'error');
        this.#deps.notifications.notify('error', message);
    }

    /**
     * Inbound listener callback. Never rejects: every failure is reported and
     * the rest of the message is still processed where possible.
     */
    async handleInbound(message: InboundMessage): Promise<void> {
        void logThought(`[Relay] Received message from ${message.source}.`, 'notice');
        this.#deps.notifications.notify('notice', `received message from ${message.source}`, this.#deps.notificationTtlMs);

        let contact: ContactRecord;
        try {
            contact = await this.#deps.directory.resolveByNumber(message.source);
        } catch (err) {
            this.#report(err, `dropped message from ${message.source}`);
            return;
        }

        if (message.text !== '') {
            try {
                await this.#deps.log.append(contact, { timestamp: message.timestamp, direction: 'inbound', body: message.text });
            } catch (err) {
                this.#report(err, `failed to record message from ${message.source}`);
            }
        }

        for (const attachment of message.attachments) {
            try {
                const source = await attachment.open();
                const name = await this.#deps.attachments.save(contact, source, { fileName: attachment.fileName });
                await this.#deps.log.append(contact, { timestamp: message.timestamp, direction: 'inbound', body: `[${name}]` });
            } catch (err) {
                this.#report(err, `failed to save attachment from ${message.source}`);
            }
        }
    }
}
