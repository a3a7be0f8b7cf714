import { mkdir, readdir } from 'node:fs/promises';
import path from 'node:path';
import type { ContactRecord } from '../types/contacts.js';
import { invalidContact, invalidNumber, toGatewayError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import {
    filenameToIdentity,
    identityToFilename,
    identityToStem,
    isCanonicalNumber,
    type ContactIdentity,
} from './contact-naming.js';
import type { StoragePaths } from './storage-paths.js';

export const UNKNOWN_CONTACT_NAME = 'Unknown';

/**
 * Resolves phone-number identities to contact records backed by the
 * `<displayName> <number>.<ext>` files of the contacts root.
 */
export class ContactDirectory {
    readonly #paths: StoragePaths;

    constructor(paths: StoragePaths) {
        this.#paths = paths;
    }

    #toRecord(identity: ContactIdentity): ContactRecord {
        return {
            displayName: identity.displayName,
            number: identity.number,
            historyPath: path.join(this.#paths.contactsRoot, identityToFilename(identity, this.#paths.contactExtension)),
            attachmentDir: path.join(this.#paths.attachmentsRoot, identityToStem(identity)),
        };
    }

    /**
     * Resolve an absolute contact file path. The path must sit directly in the
     * contacts root, carry no traversal segments and follow the naming grammar.
     */
    resolveByPath(contactPath: string): ContactRecord {
        if (!path.isAbsolute(contactPath) || path.normalize(contactPath) !== contactPath) {
            throw invalidContact();
        }
        if (path.dirname(contactPath) !== this.#paths.contactsRoot) {
            throw invalidContact();
        }

        const identity = filenameToIdentity(path.basename(contactPath), this.#paths.contactExtension);
        if (!identity) {
            throw invalidContact();
        }
        return this.#toRecord(identity);
    }

    /**
     * Resolve a sender number. Falls back to an `Unknown <number>` record, which
     * is not written to disk here; its history file appears on first append.
     */
    async resolveByNumber(number: string): Promise<ContactRecord> {
        if (!isCanonicalNumber(number)) {
            throw invalidNumber(number);
        }

        let entries: string[];
        try {
            await mkdir(this.#paths.contactsRoot, { recursive: true, mode: 0o700 });
            entries = await readdir(this.#paths.contactsRoot);
        } catch (err) {
            throw toGatewayError(err, 'StorageFailure', 'failed to list contacts');
        }

        const matches = entries
            .filter((name) => filenameToIdentity(name, this.#paths.contactExtension)?.number === number)
            .sort((left, right) => left.localeCompare(right));

        if (matches.length === 0) {
            return this.#toRecord({ displayName: UNKNOWN_CONTACT_NAME, number });
        }
        if (matches.length > 1) {
            void logThought(`[Contacts] ${matches.length} contact files match ${number}; using '${matches[0]}'.`, 'warning');
        }
        return this.resolveByPath(path.join(this.#paths.contactsRoot, matches[0]));
    }
}
