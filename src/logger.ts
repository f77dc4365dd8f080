export type StepwiseLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export const LOG_PREFIX = '[Stepwise]';

/**
 * Console-backed logger. Debug output is opt-in because ingestion can log one
 * line per event.
 */
export function createConsoleLogger(prefix: string = LOG_PREFIX, debug: boolean = false): StepwiseLogger {
    return {
        debug: debug ? (msg) => console.debug(`${prefix} ${msg}`) : undefined,
        info: (msg) => console.log(`${prefix} ${msg}`),
        warn: (msg) => console.warn(`${prefix} ${msg}`),
        error: (msg) => console.error(`${prefix} ${msg}`),
    };
}

/**
 * Options accept `undefined` (use the console logger) or `null` (silence).
 */
export function resolveLogger(logger: StepwiseLogger | null | undefined): StepwiseLogger | null {
    return logger === undefined ? createConsoleLogger() : logger;
}
