import path from 'node:path';
import type { Request, Response } from 'express';
import type { AttachmentStore } from '../../services/attachment-store.js';
import { invalidRequest } from '../../types/errors.js';
import { sendMappedError } from '../shared.js';

export interface FileDeps {
    attachments: AttachmentStore;
}

/**
 * POST /api/file/download
 *
 * Body:
 *   path: string   — File to download, relative to the storage root.
 *
 * Private key storage is refused however the path is spelled.
 */
export function handleDownload(deps: FileDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            const body: unknown = req.body;
            const clientPath = typeof body === 'object' && body !== null && 'path' in body ? body.path : undefined;
            if (typeof clientPath !== 'string' || clientPath.length === 0) {
                throw invalidRequest('missing or invalid "path" (string)');
            }

            const resolved = await deps.attachments.resolveReadablePath(clientPath);
            res.download(resolved, path.basename(resolved), { dotfiles: 'allow' }, (err) => {
                if (err && !res.headersSent) {
                    sendMappedError(res, err);
                }
            });
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
