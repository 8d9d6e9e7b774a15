/**
 * Custom Error Classes for AVR Operations
 */

/**
 * Error thrown when the telnet session cannot be opened, is not open,
 * or is lost while writing or reading
 */
export class AvrConnectionError extends Error {
    public host: string;
    public port: number;

    constructor(host: string, port: number, message: string) {
        super(message);
        this.name = 'AvrConnectionError';
        this.host = host;
        this.port = port;
    }
}

/**
 * Error thrown when an operation does not complete within its window.
 * Read timeouts are the normal "nothing to report" outcome.
 */
export class AvrTimeoutError extends Error {
    public operation: string;
    public timeout: number;

    constructor(operation: string, timeout: number) {
        super(`Operation "${operation}" timed out after ${timeout}ms`);
        this.name = 'AvrTimeoutError';
        this.operation = operation;
        this.timeout = timeout;
    }
}

/**
 * Error thrown when a user-supplied command fails validation
 */
export class AvrValidationError extends Error {
    public command: string;
    public reason: string;

    constructor(command: string, reason: string) {
        super(`Invalid command: ${reason}`);
        this.name = 'AvrValidationError';
        this.command = command;
        this.reason = reason;
    }
}

/**
 * Error thrown when receiver settings cannot be resolved
 */
export class AvrConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AvrConfigError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
