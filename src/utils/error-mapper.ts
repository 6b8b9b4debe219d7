import { InvalidOptionsError, MissingRolesError, NoUserError } from '../errors/index.js';
import { RoleId } from '../types.js';

/** Shape of a thrown value as written into structured log entries. */
export interface ErrorLogPayload {
    type: string;
    message: string;
    code?: 'NO_USER' | 'MISSING_ROLES' | 'INVALID_OPTIONS';
    missing?: RoleId[];
}

/**
 * String form of any thrown value. Values without a usable `toString`
 * (e.g. `Object.create(null)`) fall back to their `[object Tag]` form.
 */
export function describeThrown(value: unknown): string {
    try {
        return String(value);
    } catch {
        return Object.prototype.toString.call(value);
    }
}

function mapKnownError(error: Error | unknown): ErrorLogPayload {
    if (error instanceof MissingRolesError) {
        return {
            type: error.name,
            message: error.message,
            code: 'MISSING_ROLES',
            missing: [...error.missing],
        };
    }
    if (error instanceof NoUserError) {
        return { type: error.name, message: error.message, code: 'NO_USER' };
    }
    if (error instanceof InvalidOptionsError) {
        return { type: error.name, message: error.message, code: 'INVALID_OPTIONS' };
    }
    if (error instanceof Error) {
        return { type: error.name, message: error.message };
    }
    return {
        type: "UnknownError",
        message: describeThrown(error),
    };
}

/** Maps any thrown value to a log-friendly payload. Never throws. */
export function mapErrorToLogPayload(error: Error | unknown): ErrorLogPayload {
    try {
        return mapKnownError(error);
    } catch {
        // Errors whose name or message getters throw
        return { type: "UnknownError", message: Object.prototype.toString.call(error) };
    }
}
