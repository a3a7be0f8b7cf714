import { readdir, readFile, stat } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RegistrationStateStore } from '../../src/services/registration-state.js';
import { createTempStorage, type TempStorage } from '../harness/fakes.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
}));

describe('RegistrationStateStore', () => {
    let storage: TempStorage;
    let store: RegistrationStateStore;

    beforeEach(async () => {
        storage = await createTempStorage();
        store = new RegistrationStateStore(storage.paths);
    });

    afterEach(async () => {
        await storage.cleanup();
    });

    it('starts out unregistered', async () => {
        expect(await store.isProvisioned()).toBe(false);
        expect(await store.needsRegistration()).toBe(true);
        expect(await store.readRegisteredNumber()).toBeNull();
    });

    it('creates the private storage directory owner-only', async () => {
        await store.ensureStorageDir();
        const info = await stat(store.storageDir);
        expect(info.isDirectory()).toBe(true);
        expect(info.mode & 0o777).toBe(0o700);
    });

    it('saves the number verbatim and leaves no temp file behind', async () => {
        await store.ensureStorageDir();
        await store.saveRegisteredNumber('+15550001');

        expect(await readFile(storage.paths.numberFile, 'utf8')).toBe('+15550001');
        expect(await store.readRegisteredNumber()).toBe('+15550001');
        expect(await readdir(store.storageDir)).toEqual(['number']);
        expect((await stat(storage.paths.numberFile)).mode & 0o777).toBe(0o600);
    });

    it('marks key provisioning with the sentinel file', async () => {
        await store.markProvisioned();
        expect(await store.isProvisioned()).toBe(true);
        expect(await store.needsRegistration()).toBe(false);
        expect((await stat(storage.paths.sentinelFile)).isFile()).toBe(true);
    });
});
