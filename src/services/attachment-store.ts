import { randomUUID } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, realpath, unlink } from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { ContactRecord } from '../types/contacts.js';
import { GatewayError, toGatewayError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import type { StoragePaths } from './storage-paths.js';

const ATTACHMENT_PREFIX = 'attachment_';
const SAFE_EXTENSION_PATTERN = /^\.[A-Za-z0-9]{1,10}$/;

export interface SaveAttachmentOptions {
    /** Original file name; only its extension is kept, and only when it is plain. */
    fileName?: string;
}

/**
 * Per-contact attachment directories, plus the read guard every file download
 * goes through.
 */
export class AttachmentStore {
    readonly #paths: StoragePaths;

    constructor(paths: StoragePaths) {
        this.#paths = paths;
    }

    /**
     * Stream `source` into a new, uniquely named file of the contact's
     * attachment directory. Returns the file path relative to the storage root.
     */
    async save(contact: ContactRecord, source: Readable, options: SaveAttachmentOptions = {}): Promise<string> {
        const extension = options.fileName ? path.extname(options.fileName) : '';
        const name = `${ATTACHMENT_PREFIX}${randomUUID()}${SAFE_EXTENSION_PATTERN.test(extension) ? extension : ''}`;
        const target = path.join(contact.attachmentDir, name);

        try {
            await mkdir(contact.attachmentDir, { recursive: true, mode: 0o700 });
            // 'wx' fails instead of reusing an existing file
            await pipeline(source, createWriteStream(target, { flags: 'wx', mode: 0o600 }));
        } catch (err) {
            await unlink(target).catch(() => undefined);
            throw toGatewayError(err, 'StorageFailure', `failed to save attachment from ${contact.displayName} ${contact.number}`);
        }

        void logThought(`[Attachments] Saved attachment from ${contact.displayName} ${contact.number}.`, 'notice');
        return this.#paths.relativePath(target);
    }

    /**
     * Resolve a client-supplied path for reading. Both the joined path and the
     * path it really points to are checked against private key storage.
     */
    async resolveReadablePath(clientPath: string): Promise<string> {
        const absolute = this.#paths.absolutePath(clientPath);
        if (this.#paths.isPrivateKeyPath(absolute)) {
            throw new GatewayError('Forbidden', 'downloading private key(s) is not allowed');
        }

        let resolved: string;
        try {
            resolved = await realpath(absolute);
        } catch (err) {
            throw toGatewayError(err, 'StorageFailure', `cannot access ${clientPath}`);
        }

        const realKeyRoot = await realpath(this.#paths.keyRoot).catch(() => this.#paths.keyRoot);
        if (this.#paths.isPrivateKeyPath(resolved) || this.#paths.isPrivateKeyPath(resolved, realKeyRoot)) {
            throw new GatewayError('Forbidden', 'downloading private key(s) is not allowed');
        }
        return resolved;
    }
}
