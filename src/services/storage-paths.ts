import path from 'node:path';
import type { VaultlineConfig } from '../config/json-config.js';
import { GatewayError } from '../types/errors.js';

/** Key id of the last-resort prekey; its presence proves key provisioning finished. */
export const LAST_RESORT_KEY_ID = 0xffffff;

export interface KeyPathClassification {
    inKeyPath: boolean;
    isPrivate: boolean;
}

function isWithin(root: string, candidate: string): boolean {
    const relative = path.relative(root, candidate);
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Every on-disk location of the persisted layout, derived from the decrypted
 * volume's mount point.
 */
export class StoragePaths {
    readonly mountPoint: string;
    readonly keyRoot: string;
    readonly privateDir: string;
    readonly numberFile: string;
    readonly sentinelFile: string;
    readonly contactsRoot: string;
    readonly attachmentsRoot: string;
    readonly contactExtension: string;

    constructor(storage: VaultlineConfig['storage']) {
        this.mountPoint = path.resolve(storage.mountPoint);
        this.keyRoot = path.join(this.mountPoint, storage.keyPath);
        this.privateDir = path.join(this.keyRoot, storage.serviceDir, 'private');
        this.numberFile = path.join(this.privateDir, 'number');
        this.sentinelFile = path.join(this.privateDir, 'prekeys', String(LAST_RESORT_KEY_ID).padStart(9, '0'));
        this.contactsRoot = path.join(this.mountPoint, storage.serviceDir, 'contacts');
        this.attachmentsRoot = path.join(this.mountPoint, storage.serviceDir, 'attachments');
        this.contactExtension = storage.contactExtension;
    }

    /**
     * Join a client-supplied path onto the mount point. Rejects results that
     * leave the mount point.
     */
    absolutePath(clientPath: string): string {
        const absolute = path.join(this.mountPoint, clientPath);
        if (!isWithin(this.mountPoint, absolute)) {
            throw new GatewayError('InvalidContact', 'path traversal detected');
        }
        return absolute;
    }

    /** Path relative to the mount point, rendered with a leading separator. */
    relativePath(absolutePath: string): string {
        const resolved = path.resolve(absolutePath);
        if (!isWithin(this.mountPoint, resolved)) {
            throw new GatewayError('InvalidContact', 'path traversal detected');
        }
        return path.sep + path.relative(this.mountPoint, resolved);
    }

    /**
     * `keyRoot` defaults to the configured key directory; pass its real path
     * when classifying a path that symlinks were already resolved on.
     */
    classifyKeyPath(absolutePath: string, keyRoot: string = this.keyRoot): KeyPathClassification {
        const resolved = path.resolve(absolutePath);
        if (!isWithin(keyRoot, resolved)) {
            return { inKeyPath: false, isPrivate: false };
        }
        const segments = path.relative(keyRoot, resolved).split(path.sep);
        return { inKeyPath: true, isPrivate: segments.includes('private') };
    }

    isPrivateKeyPath(absolutePath: string, keyRoot?: string): boolean {
        const { inKeyPath, isPrivate } = this.classifyKeyPath(absolutePath, keyRoot);
        return inKeyPath && isPrivate;
    }
}
