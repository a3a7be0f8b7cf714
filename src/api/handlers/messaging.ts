import type { Request, Response } from 'express';
import type { MessageRelay } from '../../services/message-relay.js';
import { parseHistoryRequest, parseSendRequest } from '../../services/message-relay.js';
import { logThought } from '../../utils/logger.js';
import { sendMappedError, sendOk } from '../shared.js';

export interface MessagingDeps {
    relay: MessageRelay;
}

function requestFields(req: Request): Record<string, unknown> {
    const source: unknown = req.method === 'GET' ? req.query : req.body;
    return typeof source === 'object' && source !== null ? { ...source } : {};
}

/**
 * POST /api/messaging/send
 *
 * Body:
 *   contact:     string   — Contact file path, relative to the storage root.
 *   msg:         string   — Message text.
 *   attachment?: string   — File to send along, relative to the storage root.
 */
export function handleSend(deps: MessagingDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            const request = parseSendRequest(requestFields(req));
            await deps.relay.send(request);
            await logThought(
                `[API] Message sent via ${request.contact}${request.attachment ? ' with attachment' : ''}.`,
                'notice',
            );
            sendOk(res, null);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** GET|POST /api/messaging/history — bounded tail of a contact's history, as text. */
export function handleHistory(deps: MessagingDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            const history = await deps.relay.history(parseHistoryRequest(requestFields(req)));
            sendOk(res, history);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
