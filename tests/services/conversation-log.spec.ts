import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    ConversationLog,
    formatHistoryLine,
    formatTimestamp,
} from '../../src/services/conversation-log.js';
import type { ContactRecord } from '../../src/types/contacts.js';
import { createTempStorage, type TempStorage } from '../harness/fakes.js';

const at = new Date(2024, 0, 2, 15, 4, 59);

describe('history line format', () => {
    it('formats local time with minute resolution', () => {
        expect(formatTimestamp(at)).toBe('Jan 02 15:04');
        expect(formatTimestamp(new Date(2024, 11, 31, 9, 5))).toBe('Dec 31 09:05');
    });

    it('writes the direction marker and flattens line breaks', () => {
        expect(formatHistoryLine({ timestamp: at, direction: 'outbound', body: 'hello' })).toBe('Jan 02 15:04 > hello\n');
        expect(formatHistoryLine({ timestamp: at, direction: 'inbound', body: 'one\r\ntwo\nthree' })).toBe(
            'Jan 02 15:04 < one two three\n',
        );
    });
});

describe('ConversationLog', () => {
    let storage: TempStorage;
    let contact: ContactRecord;
    const log = new ConversationLog();

    beforeEach(async () => {
        storage = await createTempStorage();
        await mkdir(storage.paths.contactsRoot, { recursive: true });
        contact = {
            displayName: 'Alice',
            number: '+15550001',
            historyPath: path.join(storage.paths.contactsRoot, 'Alice +15550001.textsecure'),
            attachmentDir: path.join(storage.paths.attachmentsRoot, 'Alice +15550001'),
        };
    });

    afterEach(async () => {
        await storage.cleanup();
    });

    it('creates the history file on first append', async () => {
        await log.append(contact, { timestamp: at, direction: 'outbound', body: 'hello' });
        expect(await readFile(contact.historyPath, 'utf8')).toBe('Jan 02 15:04 > hello\n');
    });

    it('keeps every line intact under concurrent appends', async () => {
        const count = 50;
        await Promise.all(
            Array.from({ length: count }, (_, index) =>
                log.append(contact, { timestamp: at, direction: 'outbound', body: `msg-${index}` }),
            ),
        );

        const lines = (await readFile(contact.historyPath, 'utf8')).split('\n');
        expect(lines.pop()).toBe('');
        expect(lines).toHaveLength(count);
        for (const line of lines) {
            expect(line).toMatch(/^Jan 02 15:04 > msg-\d+$/);
        }
        expect(new Set(lines).size).toBe(count);
    });

    it('reports a storage failure when the file cannot be written', async () => {
        const broken = { ...contact, historyPath: path.join(storage.paths.contactsRoot, 'missing', 'x.textsecure') };
        await expect(log.append(broken, { timestamp: at, direction: 'outbound', body: 'x' })).rejects.toMatchObject({
            code: 'StorageFailure',
        });
        // the chain for that path is still usable
        await mkdir(path.dirname(broken.historyPath));
        await log.append(broken, { timestamp: at, direction: 'outbound', body: 'y' });
        expect(await readFile(broken.historyPath, 'utf8')).toBe('Jan 02 15:04 > y\n');
    });

    it('returns the whole file when it fits', async () => {
        await writeFile(contact.historyPath, '0123456\nabcdefg\n');
        expect(await log.readTail(contact, 16)).toBe('0123456\nabcdefg\n');
    });

    it('drops the partial first line when the file is one byte over', async () => {
        await writeFile(contact.historyPath, 'X0123456\nabcdefg\n');
        expect(await log.readTail(contact, 16)).toBe('abcdefg\n');
    });

    it('starts right after a line feed that opens the window', async () => {
        await writeFile(contact.historyPath, 'abc\ndef\n');
        expect(await log.readTail(contact, 5)).toBe('def\n');
    });

    it('returns the raw window when it holds no line feed', async () => {
        await writeFile(contact.historyPath, 'a'.repeat(20));
        expect(await log.readTail(contact, 16)).toBe('a'.repeat(16));
    });

    it('returns whole lines from the end of a large history', async () => {
        const lines: string[] = [];
        let size = 0;
        for (let index = 0; size < 50 * 1024; index++) {
            const line = `Jan 02 15:04 ${index % 2 === 0 ? '>' : '<'} message ${index} ${'x'.repeat(index % 37)}\n`;
            lines.push(line);
            size += Buffer.byteLength(line);
        }
        const full = lines.join('');
        await writeFile(contact.historyPath, full);

        const tail = await log.readTail(contact, 10 * 1024);
        expect(Buffer.byteLength(tail)).toBeLessThanOrEqual(10 * 1024);
        expect(tail.startsWith('Jan 02 15:04 ')).toBe(true);
        expect(full.endsWith(tail)).toBe(true);
        expect(full[full.length - tail.length - 1]).toBe('\n');
        expect(await log.readTail(contact, 10 * 1024)).toBe(tail);
    });

    it('reports a missing history as a storage failure', async () => {
        await expect(log.readTail(contact, 16)).rejects.toMatchObject({ code: 'StorageFailure' });
    });
});
