export type GatewayErrorCode =
    | 'InvalidRequest'
    | 'InvalidContact'
    | 'InvalidNumber'
    | 'Forbidden'
    | 'TransportFailure'
    | 'StorageFailure'
    | 'VolumeFailure'
    | 'AlreadyRegistered'
    | 'NotRegistered';

/**
 * Error raised anywhere in the gateway. The `code` decides how the API layer
 * answers and whether startup may continue.
 */
export class GatewayError extends Error {
    readonly code: GatewayErrorCode;

    constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GatewayError';
        this.code = code;
    }
}

export function invalidRequest(message: string): GatewayError {
    return new GatewayError('InvalidRequest', message);
}

export function invalidContact(message = 'invalid contact'): GatewayError {
    return new GatewayError('InvalidContact', message);
}

export function invalidNumber(number: string): GatewayError {
    return new GatewayError('InvalidNumber', `invalid contact number format: ${number}`);
}

export function isGatewayError(err: unknown, code?: GatewayErrorCode): err is GatewayError {
    return err instanceof GatewayError && (code === undefined || err.code === code);
}

/** Wrap a foreign error with context, leaving gateway errors untouched. */
export function toGatewayError(err: unknown, code: GatewayErrorCode, context: string): GatewayError {
    if (err instanceof GatewayError) {
        return err;
    }
    const detail = err instanceof Error ? err.message : String(err);
    return new GatewayError(code, `${context}: ${detail}`, { cause: err });
}

/** Node errno code of a filesystem error, if any. */
export function errnoCode(err: unknown): string | undefined {
    if (err instanceof GatewayError) {
        return errnoCode(err.cause);
    }
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}
