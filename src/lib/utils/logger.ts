/**
 * Logger interface for injectable logging implementation.
 */
interface Logger {
    /** Log normal messages. */
    log(...args: unknown[]): void;
    /** Log warning messages. */
    warn(...args: unknown[]): void;
    /** Log error messages. */
    error(...args: unknown[]): void;
    /** Log debug/verbose messages. */
    debug(...args: unknown[]): void;
    /** Output data to stdout (for piping). */
    output(text: string): void;
}

/**
 * Default logger implementation. Debug output is off unless DEBUG is set,
 * since the file server logs every request at this level.
 */
const defaultLogger: Logger = {
    log: (...args) => console.log(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
    debug: (...args) => {
        if (process.env.DEBUG) console.debug(...args);
    },
    output: text => console.log(text)
};

let impl: Logger = defaultLogger;
let quiet = false;

/**
 * Global logger instance with injectable implementation.
 * Use setLogger() to provide a custom implementation.
 * Use setQuiet() to suppress log/warn/debug output.
 */
const logger = {
    /**
     * Set a custom logger implementation.
     * @param l - The logger implementation to use.
     */
    setLogger(l: Logger) {
        impl = l;
    },

    /**
     * Set quiet mode. When quiet, log/warn/debug are suppressed. Errors always show.
     * @param q - Whether to enable quiet mode.
     */
    setQuiet(q: boolean) {
        quiet = q;
    },

    log(...args: unknown[]) {
        if (!quiet) impl.log(...args);
    },

    warn(...args: unknown[]) {
        if (!quiet) impl.warn(...args);
    },

    /**
     * Log error messages. Always shown, even in quiet mode.
     * @param args - The arguments to log.
     */
    error(...args: unknown[]) {
        impl.error(...args);
    },

    debug(...args: unknown[]) {
        if (!quiet) impl.debug(...args);
    },

    /**
     * Output data to stdout (for piping). Always shown, even in quiet mode.
     * @param text - The text to output.
     */
    output(text: string) {
        impl.output(text);
    }
};

export { logger };
export type { Logger };
