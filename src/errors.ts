/**
 * @module root.errors
 */

/**
 * Raised when a call is made with arguments that do not match what the
 * remote procedure expects, or when a local helper is misused.
 */
export class ArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ArgumentError';
    }
}

/**
 * An error explicitly signalled by the remote service.
 */
export class FaultError extends Error {
    public readonly faultCode: number;
    public readonly faultString: string;

    constructor(faultCode: number, faultString: string) {
        super(`${faultCode}, ${faultString}`);
        this.name = 'FaultError';
        this.faultCode = faultCode;
        this.faultString = faultString;
    }
}

/**
 * A network or protocol level failure while talking to the remote service.
 */
export class TransportError extends Error {
    public readonly url: string;
    public readonly code: string | number;
    public readonly cause?: unknown;

    constructor(
        url: string,
        code: string | number,
        message: string,
        cause?: unknown
    ) {
        super(message);
        this.name = 'TransportError';
        this.url = url;
        this.code = code;
        this.cause = cause;
    }
}

/**
 * Login against the remote service failed.
 */
export class LoginError extends Error {
    public readonly cause?: unknown;

    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = 'LoginError';
        this.cause = cause;
    }
}

/**
 * A script file could not be read, parsed or validated.
 */
export class ScriptError extends Error {
    public readonly cause?: unknown;

    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = 'ScriptError';
        this.cause = cause;
    }
}

/**
 * A report could not be written.
 */
export class ReportError extends Error {
    public readonly cause?: unknown;

    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = 'ReportError';
        this.cause = cause;
    }
}

/**
 * Returns the message of an arbitrary thrown value.
 */
export function getErrorMessage(value: unknown): string {
    return value instanceof Error ? value.message : String(value);
}
