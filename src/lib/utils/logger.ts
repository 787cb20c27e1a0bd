/**
 * Diagnostic sink accepted by readers and decoders. Messages are printf-style:
 * the format string takes `%s`, `%d`, `%o` placeholders filled from `args`.
 */
interface Logger {
    /** Log notable events (network requests, responses). */
    info(format: string, ...args: unknown[]): void;
    /** Log verbose tracing (cache decisions, every read and seek). */
    debug(format: string, ...args: unknown[]): void;
}

type LogLevel = 'silent' | 'info' | 'debug';

const levels: Record<LogLevel, number> = {
    silent: 0,
    info: 1,
    debug: 2
};

/**
 * Console-backed logger. Diagnostics go to stderr so that stdout carries only
 * data written through {@link ConsoleLogger.output}.
 */
class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(level: LogLevel = 'info') {
        this.level = level;
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    info(format: string, ...args: unknown[]) {
        if (levels[this.level] >= levels.info) {
            console.error(`[INFO] ${format}`, ...args);
        }
    }

    debug(format: string, ...args: unknown[]) {
        if (levels[this.level] >= levels.debug) {
            console.error(`[DEBUG] ${format}`, ...args);
        }
    }

    /**
     * Log error messages. Always shown, even when silent.
     * @param args - The values to log.
     */
    error(...args: unknown[]) {
        console.error(...args);
    }

    /**
     * Output data to stdout (for piping). Always shown, even when silent.
     * @param text - The line to write.
     */
    output(text: string) {
        process.stdout.write(`${text}\n`);
    }
}

export { ConsoleLogger };
export type { Logger, LogLevel };
