import { Logger, LogLevel, LogContext } from '../interfaces/logger.js';
import { mapErrorToLogPayload } from '../utils/error-mapper.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/** Where a formatted line goes; defaults to the console method of the same level. */
export type LogSink = (level: LogLevel, line: string) => void;

/* eslint-disable-next-line no-console */
const consoleSink: LogSink = (level, line) => console[level](line);

/**
 * Logger that writes one JSON line per entry: `timestamp`, `level`, `message`,
 * then the bindings and the entry's context. Errors are written in the same
 * `{ type, message, code? }` form the role checks use for discarded failures.
 */
export class ConsoleLogger implements Logger {
    constructor(
        private readonly bindings: LogContext = {},
        private readonly minLevel: LogLevel = 'info',
        private readonly sink: LogSink = consoleSink
    ) {}

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    error(message: string, error?: Error | unknown, context?: LogContext): void {
        this.write('error', message, error === undefined ? context : { ...context, error: mapErrorToLogPayload(error) });
    }

    child(bindings: LogContext): Logger {
        return new ConsoleLogger({ ...this.bindings, ...bindings }, this.minLevel, this.sink);
    }

    private write(level: LogLevel, message: string, context?: LogContext): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
            return;
        }
        const timestamp = new Date().toISOString();
        let line: string;
        try {
            line = JSON.stringify({ timestamp, level, message, ...this.bindings, ...context });
        } catch {
            // Circular or BigInt context: keep the entry, drop the context
            line = JSON.stringify({ timestamp, level, message, unserializableContext: true });
        }
        this.sink(level, line);
    }
}
