import { RoleSubject } from '../interfaces/subject.js';
import { RoleArgs, RoleCheckRequest, RoleId, SubjectArg } from '../types.js';

/**
 * Type guard for the RoleSubject capability: a non-null object with a callable `roles`.
 */
export function isRoleSubject(value: unknown): value is RoleSubject {
    return typeof value === 'object'
        && value !== null
        && 'roles' in value
        && typeof value.roles === 'function';
}

/**
 * Splits the variadic call form into an explicit subject (when the first
 * argument is one) and the required roles.
 * @throws TypeError when a user appears anywhere but first.
 */
export function parseRoleArgs(args: RoleArgs): RoleCheckRequest {
    let subject: SubjectArg = { kind: 'context' };
    const required: RoleId[] = [];

    let position = 0;
    for (const arg of args) {
        if (typeof arg === 'string') {
            required.push(arg);
        } else if (position === 0 && isRoleSubject(arg)) {
            subject = { kind: 'explicit', user: arg };
        } else {
            throw new TypeError(`Expected a role name at argument ${position}, got ${typeof arg}`);
        }
        position++;
    }

    return { subject, required };
}

