export const DEBUG_AVR = process.env.DEBUG_AVR === '1' || process.env.DEBUG_AVR === 'true';

/**
 * Minimal logging surface. Inside Node-RED the owning node supplies one
 * (see `nodeLogger`); elsewhere `consoleLogger` is used.
 */
export interface AvrLogger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export const consoleLogger: AvrLogger = {
    debug(message: string) {
        if (DEBUG_AVR) console.log('[AVR]', message);
    },
    info(message: string) {
        console.log('[AVR]', message);
    },
    warn(message: string) {
        console.warn('[AVR]', message);
    },
    error(message: string) {
        console.error('[AVR]', message);
    }
};

/** The subset of a Node-RED node used for logging */
export interface NodeLogTarget {
    debug(msg: unknown): void;
    log(msg: unknown): void;
    warn(msg: unknown): void;
    error(msg: unknown): void;
}

export function nodeLogger(node: NodeLogTarget): AvrLogger {
    return {
        debug: (message) => node.debug(message),
        info: (message) => node.log(message),
        warn: (message) => node.warn(message),
        error: (message) => node.error(message)
    };
}
