import { RoleSubject } from './interfaces/subject.js';
import { MissingRolesError, NoUserError } from './errors/index.js';

// --- Basic Role Types ---

/**
 * Identifier of a role a subject may hold.
 * @example "admin"
 */
export type RoleId = string;

/**
 * Where the subject of a check comes from: supplied by the caller,
 * or looked up on the context at evaluation time.
 */
export type SubjectArg =
    | { kind: 'explicit'; user: RoleSubject }
    | { kind: 'context' };

/**
 * Variadic call form shared by the assert/check entry points:
 * an optional explicit user followed by the required roles.
 */
export type RoleArgs = [RoleSubject, ...RoleId[]] | RoleId[];

/**
 * Normalized arguments of a single check.
 */
export interface RoleCheckRequest {
    readonly subject: SubjectArg;
    readonly required: readonly RoleId[];
}

/** Errors a check can report without throwing. */
export type RoleCheckError = NoUserError | MissingRolesError;

/**
 * Outcome of evaluating a check.
 * `granted` lists the distinct required roles, in the order first given.
 */
export type RoleCheckResult =
    | { readonly ok: true; readonly granted: RoleId[] }
    | { readonly ok: false; readonly error: RoleCheckError };

/** Which way a check went, as reported in logs and span attributes. */
export type RoleCheckOutcome = 'granted' | 'denied' | 'no_user';
