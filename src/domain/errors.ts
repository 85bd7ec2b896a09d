export type ConfigurationErrorCode = 'FILE_NOT_FOUND' | 'INVALID_CONFIG' | 'CHAIN_MISSING' | 'INVALID_CURRENCY';

export type SessionErrorCode = 'UNKNOWN_SESSION' | 'ADDRESS_MISMATCH';

export type CapabilityErrorCode = 'CHAIN_NOT_SUPPORTED';

export type VerificationErrorCode =
    | 'NETWORK_ERROR'
    | 'RPC_ERROR'
    | 'INVALID_ADDRESS'
    | 'PARSE_ERROR'
    | 'CHAIN_NOT_SUPPORTED'
    | 'INSUFFICIENT_AMOUNT'
    | 'TRANSACTION_NOT_FOUND'
    | 'INVALID_CURRENCY'
    | 'TIMEOUT'
    | 'VERIFICATION_FAILED';

export type X402ErrorCode = ConfigurationErrorCode | SessionErrorCode | CapabilityErrorCode | VerificationErrorCode;

export class X402Error extends Error {
    constructor(readonly code: X402ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'X402Error';
    }
}

export class ConfigurationError extends X402Error {
    declare readonly code: ConfigurationErrorCode;

    constructor(code: ConfigurationErrorCode, message: string, options?: { cause?: unknown }) {
        super(code, message, options);
        this.name = 'ConfigurationError';
    }
}

export class SessionError extends X402Error {
    declare readonly code: SessionErrorCode;

    constructor(code: SessionErrorCode, message: string) {
        super(code, message);
        this.name = 'SessionError';
    }
}

export class CapabilityError extends X402Error {
    declare readonly code: CapabilityErrorCode;

    constructor(code: CapabilityErrorCode, message: string) {
        super(code, message);
        this.name = 'CapabilityError';
    }
}

export class VerificationError extends X402Error {
    declare readonly code: VerificationErrorCode;

    constructor(code: VerificationErrorCode, message: string, options?: { cause?: unknown }) {
        super(code, message, options);
        this.name = 'VerificationError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
