import { RoleId } from '../types.js';

/** Structured, non-sensitive details attached to an error. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for errors raised by the role checks.
 */
export class RolesAuthorizationError extends Error {
    constructor(message: string, public readonly details?: ErrorDetails) {
        super(message);
        this.name = this.constructor.name;
        // Maintains proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error indicating that no subject could be resolved:
 * nobody is logged in and no user was passed to the check.
 */
export class NoUserError extends RolesAuthorizationError {
    constructor(message: string = "no logged in user, and none supplied as argument") {
        super(message, { reason: 'no_user' });
    }
}

/**
 * Error indicating that the subject lacks one or more required roles.
 */
export class MissingRolesError extends RolesAuthorizationError {
    constructor(
        /** Required roles the subject does not hold, in the order they were required. */
        public readonly missing: readonly RoleId[],
        /** Every distinct role the check required. */
        public readonly required: readonly RoleId[] = missing
    ) {
        super(`Missing roles: ${missing.join(', ')}`, {
            reason: 'missing_roles',
            missing: [...missing],
        });
    }
}

/**
 * Error indicating that checker options failed validation.
 */
export class InvalidOptionsError extends RolesAuthorizationError {
    constructor(message: string, public readonly issues: readonly string[] = []) {
        super(message, { issues: [...issues] });
    }
}
