/** Log severity levels. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** Context object for structured logging. */
export type LogContext = Record<string, unknown>;

/**
 * Interface for a structured logger used by the role checks.
 */
export interface Logger {
    /** Logs a debug message. */
    debug(message: string, context?: LogContext): void;
    /** Logs an informational message. */
    info(message: string, context?: LogContext): void;
    /** Logs a warning message. */
    warn(message: string, context?: LogContext): void;
    /** Logs an error message, optionally including an Error object. */
    error(message: string, error?: Error | unknown, context?: LogContext): void;

    /**
     * Optional: Creates a child logger bound to extra context.
     * When present, each check writes through a child bound to its `checkId`.
     */
    child?: (bindings: LogContext) => Logger;
}
