import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../src/config/json-config.js';
import { StoragePaths } from '../../src/services/storage-paths.js';
import { isGatewayError } from '../../src/types/errors.js';

const mountPoint = path.resolve('/srv/vault');
const paths = new StoragePaths({ ...DEFAULT_CONFIG.storage, mountPoint });

describe('StoragePaths', () => {
    it('derives the persisted layout from the mount point', () => {
        expect(paths.keyRoot).toBe(path.join(mountPoint, 'keys'));
        expect(paths.privateDir).toBe(path.join(mountPoint, 'keys', 'textsecure', 'private'));
        expect(paths.numberFile).toBe(path.join(paths.privateDir, 'number'));
        expect(paths.sentinelFile).toBe(path.join(paths.privateDir, 'prekeys', '016777215'));
        expect(paths.contactsRoot).toBe(path.join(mountPoint, 'textsecure', 'contacts'));
        expect(paths.attachmentsRoot).toBe(path.join(mountPoint, 'textsecure', 'attachments'));
    });

    it('joins client paths onto the mount point', () => {
        expect(paths.absolutePath('/textsecure/contacts/Alice +15550001.textsecure')).toBe(
            path.join(mountPoint, 'textsecure', 'contacts', 'Alice +15550001.textsecure'),
        );
    });

    it('rejects client paths that leave the mount point', () => {
        let caught: unknown;
        try {
            paths.absolutePath('/../../etc/passwd');
        } catch (err) {
            caught = err;
        }
        expect(isGatewayError(caught, 'InvalidContact')).toBe(true);
    });

    it('renders paths relative to the mount point with a leading separator', () => {
        expect(paths.relativePath(path.join(mountPoint, 'textsecure', 'attachments', 'a'))).toBe(
            `${path.sep}${path.join('textsecure', 'attachments', 'a')}`,
        );
    });

    it('classifies key paths', () => {
        expect(paths.classifyKeyPath(paths.numberFile)).toEqual({ inKeyPath: true, isPrivate: true });
        expect(paths.classifyKeyPath(path.join(paths.keyRoot, 'textsecure', 'public'))).toEqual({ inKeyPath: true, isPrivate: false });
        expect(paths.classifyKeyPath(paths.contactsRoot)).toEqual({ inKeyPath: false, isPrivate: false });
        expect(paths.isPrivateKeyPath(paths.absolutePath('/textsecure/../keys/textsecure/private/number'))).toBe(true);
    });
});
