import { AuthorizationContext } from '../interfaces/context.js';
import { RoleArgs, RoleCheckResult } from '../types.js';
import { RoleChecker, defaultRoleChecker } from './role-checker.js';
import { RoleCheckerOptions } from './options.js';

/** Role checks bound to a single request context. */
export interface BoundRoleChecks {
    evaluateUserRoles(...args: RoleArgs): RoleCheckResult;
    assertUserRoles(...args: RoleArgs): void;
    checkUserRoles(...args: RoleArgs): boolean;
}

/**
 * Binds the role checks to a request context, so handlers can call
 * `checks.assertUserRoles('admin')` without passing the context around.
 * @param checker - A checker, or options for a new one. Defaults to the shared default checker.
 * @example
 * const checks = bindRoleChecks(ctx);
 * checks.assertUserRoles('editor');
 * if (checks.checkUserRoles('admin')) showDeleteButton();
 */
export function bindRoleChecks(
    ctx: AuthorizationContext,
    checker: RoleChecker | RoleCheckerOptions = defaultRoleChecker
): BoundRoleChecks {
    const resolved = checker instanceof RoleChecker ? checker : new RoleChecker(checker);
    return {
        evaluateUserRoles: (...args) => resolved.evaluateUserRoles(ctx, ...args),
        assertUserRoles: (...args) => resolved.assertUserRoles(ctx, ...args),
        checkUserRoles: (...args) => resolved.checkUserRoles(ctx, ...args),
    };
}
