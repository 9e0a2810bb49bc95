/**
 * Error types raised by the transport.
 *
 * ParseError and TransportError are recovered per record by the pipeline;
 * ConfigError is fatal at startup.
 */

export type ErrorCode = 'PARSE_ERROR' | 'TRANSPORT_ERROR' | 'CONFIG_ERROR';

export class TransportBaseError extends Error {
    public readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class ParseError extends TransportBaseError {
    constructor(message: string) {
        super('PARSE_ERROR', message);
    }
}

export class TransportError extends TransportBaseError {
    public readonly statusCode?: number;

    constructor(message: string, statusCode?: number) {
        super('TRANSPORT_ERROR', message);
        this.statusCode = statusCode;
    }
}

export class ConfigError extends TransportBaseError {
    constructor(message: string) {
        super('CONFIG_ERROR', message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
