import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { StoragePaths } from './storage-paths.js';
import { errnoCode, toGatewayError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';

/**
 * Process-wide registration state kept under the decrypted volume: the
 * registered number and the sentinel marker that proves key provisioning
 * completed. Registration is one-shot; clearing it means deleting the private
 * storage directory by hand.
 */
export class RegistrationStateStore {
    readonly #paths: StoragePaths;

    constructor(paths: StoragePaths) {
        this.#paths = paths;
    }

    get storageDir(): string {
        return this.#paths.privateDir;
    }

    async ensureStorageDir(): Promise<void> {
        try {
            await mkdir(this.#paths.privateDir, { recursive: true, mode: 0o700 });
        } catch (err) {
            throw toGatewayError(err, 'StorageFailure', `failed to create ${this.#paths.privateDir}`);
        }
    }

    async isProvisioned(): Promise<boolean> {
        try {
            await stat(this.#paths.sentinelFile);
            return true;
        } catch {
            return false;
        }
    }

    async needsRegistration(): Promise<boolean> {
        return !(await this.isProvisioned());
    }

    /** The registered number, or `null` when none was ever saved. */
    async readRegisteredNumber(): Promise<string | null> {
        try {
            return await readFile(this.#paths.numberFile, 'utf8');
        } catch (err) {
            if (errnoCode(err) === 'ENOENT') {
                return null;
            }
            throw toGatewayError(err, 'StorageFailure', 'failed to read registered number');
        }
    }

    /** Persist the number exactly as given. */
    async saveRegisteredNumber(number: string): Promise<void> {
        await this.#atomicWrite(this.#paths.numberFile, number, 'failed to save number');
        await logThought(`Registration number saved to ${this.#paths.numberFile}.`, 'notice');
    }

    async markProvisioned(): Promise<void> {
        await this.#atomicWrite(this.#paths.sentinelFile, new Date().toISOString(), 'failed to record key provisioning');
    }

    async #atomicWrite(target: string, content: string, context: string): Promise<void> {
        const tempPath = path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);
        try {
            await mkdir(path.dirname(target), { recursive: true, mode: 0o700 });
            await writeFile(tempPath, content, { encoding: 'utf8', mode: 0o600 });
            await rename(tempPath, target);
        } catch (err) {
            await unlink(tempPath).catch(() => undefined);
            throw toGatewayError(err, 'StorageFailure', context);
        }
    }
}
