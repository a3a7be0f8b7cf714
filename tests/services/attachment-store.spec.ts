import { mkdir, readFile, symlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AttachmentStore } from '../../src/services/attachment-store.js';
import type { ContactRecord } from '../../src/types/contacts.js';
import { createTempStorage, type TempStorage } from '../harness/fakes.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
}));

describe('AttachmentStore', () => {
    let storage: TempStorage;
    let store: AttachmentStore;
    let contact: ContactRecord;

    beforeEach(async () => {
        storage = await createTempStorage();
        store = new AttachmentStore(storage.paths);
        contact = {
            displayName: 'Unknown',
            number: '+15559999',
            historyPath: path.join(storage.paths.contactsRoot, 'Unknown +15559999.textsecure'),
            attachmentDir: path.join(storage.paths.attachmentsRoot, 'Unknown +15559999'),
        };
    });

    afterEach(async () => {
        await storage.cleanup();
    });

    it('streams an attachment into a uniquely named file', async () => {
        const first = await store.save(contact, Readable.from([Buffer.from('photo-bytes')]));
        const second = await store.save(contact, Readable.from([Buffer.from('other')]));

        expect(first).toMatch(/^\/textsecure\/attachments\/Unknown \+15559999\/attachment_[0-9a-f-]{36}$/);
        expect(second).not.toBe(first);
        expect(await readFile(path.join(storage.mountPoint, first), 'utf8')).toBe('photo-bytes');
    });

    it('keeps a plain extension from the original name only', async () => {
        const kept = await store.save(contact, Readable.from(['x']), { fileName: 'holiday.jpg' });
        const dropped = await store.save(contact, Readable.from(['x']), { fileName: 'evil.j/../pg' });
        expect(kept).toMatch(/attachment_[0-9a-f-]{36}\.jpg$/);
        expect(dropped).toMatch(/attachment_[0-9a-f-]{36}$/);
    });

    it('resolves readable paths inside the storage root', async () => {
        const saved = await store.save(contact, Readable.from(['data']));
        const resolved = await store.resolveReadablePath(saved);
        expect(await readFile(resolved, 'utf8')).toBe('data');
    });

    it('refuses private key storage however the path is spelled', async () => {
        await mkdir(storage.paths.privateDir, { recursive: true });
        await writeFile(storage.paths.numberFile, '+15550001');

        await expect(store.resolveReadablePath('/keys/textsecure/private/number')).rejects.toMatchObject({
            code: 'Forbidden',
            message: 'downloading private key(s) is not allowed',
        });
        await expect(store.resolveReadablePath('/textsecure/../keys/textsecure/private/number')).rejects.toMatchObject({
            code: 'Forbidden',
        });
    });

    it('refuses symlinks that point into private key storage', async () => {
        await mkdir(storage.paths.privateDir, { recursive: true });
        await writeFile(storage.paths.numberFile, '+15550001');
        await mkdir(storage.paths.attachmentsRoot, { recursive: true });
        await symlink(storage.paths.numberFile, path.join(storage.paths.attachmentsRoot, 'link'));

        await expect(store.resolveReadablePath('/textsecure/attachments/link')).rejects.toMatchObject({ code: 'Forbidden' });
    });

    it('refuses paths that leave the storage root', async () => {
        await expect(store.resolveReadablePath('/../../etc/passwd')).rejects.toMatchObject({ code: 'InvalidContact' });
    });

    it('reports a missing file as a storage failure', async () => {
        await expect(store.resolveReadablePath('/textsecure/attachments/none')).rejects.toMatchObject({
            code: 'StorageFailure',
        });
    });
});
