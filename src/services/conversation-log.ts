import { appendFile, open, type FileHandle } from 'node:fs/promises';
import { DIRECTION_MARKERS, type ContactRecord, type HistoryEntry } from '../types/contacts.js';
import { toGatewayError } from '../types/errors.js';

export const DEFAULT_HISTORY_SIZE_BYTES = 10 * 1024;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const LINE_FEED = 0x0a;

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

/** `Jan 02 15:04`, local time, minute resolution. */
export function formatTimestamp(date: Date): string {
    return `${MONTHS[date.getMonth()]} ${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

export function formatHistoryLine(entry: HistoryEntry): string {
    const body = entry.body.replace(/[\r\n]+/g, ' ');
    return `${formatTimestamp(entry.timestamp)} ${DIRECTION_MARKERS[entry.direction]} ${body}\n`;
}

/**
 * Append-only conversation history, one file per contact.
 *
 * Each append is one `O_APPEND` write of a complete line. Appends to the same
 * file are additionally chained inside the process so two callers can never
 * interleave, whatever the platform's write semantics.
 */
export class ConversationLog {
    readonly #pending = new Map<string, Promise<void>>();

    async append(contact: ContactRecord, entry: HistoryEntry): Promise<void> {
        const line = formatHistoryLine(entry);
        const target = contact.historyPath;
        const previous = this.#pending.get(target) ?? Promise.resolve();

        const write = previous.then(async () => {
            try {
                await appendFile(target, line, { encoding: 'utf8', mode: 0o600, flag: 'a' });
            } catch (err) {
                throw toGatewayError(err, 'StorageFailure', `failed to update history for ${contact.displayName} ${contact.number}`);
            }
        });
        // the chain must survive a failed write
        const settled = write.catch(() => undefined);
        this.#pending.set(target, settled);
        void settled.then(() => {
            if (this.#pending.get(target) === settled) {
                this.#pending.delete(target);
            }
        });

        await write;
    }

    /**
     * Read at most `maxBytes` from the end of the contact's history. When the
     * file is larger, the partial first line is dropped so the text starts
     * right after the first line feed of the window.
     */
    async readTail(contact: ContactRecord, maxBytes: number = DEFAULT_HISTORY_SIZE_BYTES): Promise<string> {
        let handle: FileHandle;
        try {
            handle = await open(contact.historyPath, 'r');
        } catch (err) {
            throw toGatewayError(err, 'StorageFailure', 'failed to open history');
        }

        try {
            const { size } = await handle.stat();
            const start = size > maxBytes ? size - maxBytes : 0;
            const length = size - start;
            const buffer = Buffer.alloc(length);

            let offset = 0;
            while (offset < length) {
                const { bytesRead } = await handle.read(buffer, offset, length - offset, start + offset);
                if (bytesRead === 0) break;
                offset += bytesRead;
            }

            const window = buffer.subarray(0, offset);
            if (start === 0) {
                return window.toString('utf8');
            }
            const firstLineFeed = window.indexOf(LINE_FEED);
            return window.subarray(firstLineFeed < 0 ? 0 : firstLineFeed + 1).toString('utf8');
        } catch (err) {
            throw toGatewayError(err, 'StorageFailure', 'failed to read history');
        } finally {
            await handle.close();
        }
    }
}
