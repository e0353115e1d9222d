export interface Logger {
    info: (msg: string) => void;
    warn: (msg: string) => void;
    error: (msg: string) => void;
    debug: (msg: string) => void;
}

/**
 * Console-backed logger. Debug lines are dropped unless `debug` is set.
 */
export function createConsoleLogger(scope: string, debug = false): Logger {
    return {
        info: (msg: string) => console.log(`[${scope}] ${msg}`),
        warn: (msg: string) => console.warn(`[${scope}] ${msg}`),
        error: (msg: string) => console.error(`[${scope}] ${msg}`),
        debug: (msg: string) => {
            if (debug) console.debug(`[${scope}] ${msg}`);
        },
    };
}
