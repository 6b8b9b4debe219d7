/* eslint-disable no-console */
import { AuthorizationContext } from '../interfaces/context.js';
import { LogContext, Logger } from '../interfaces/logger.js';
import { MissingRolesError, NoUserError } from '../errors/index.js';
import { RoleArgs, RoleCheckRequest, RoleCheckResult, RoleId } from '../types.js';
import { mapErrorToLogPayload } from '../utils/error-mapper.js';
import { distinct, generateCheckId } from '../utils/helpers.js';
import { parseRoleArgs } from './role-args.js';
import { parseRoleCheckerOptions, ResolvedRoleCheckerOptions, RoleCheckerOptions } from './options.js';
import { annotateCheckSpan, withCheckSpan } from './tracing-utils.js';

/**
 * Decides whether a subject holds every required role.
 *
 * Three call conventions share one decision:
 * - `evaluate` returns a {@link RoleCheckResult} and never reports a denial by throwing.
 * - `assert` throws {@link NoUserError} or {@link MissingRolesError} on denial.
 * - `check` returns a boolean and never throws, whatever the collaborators do.
 *
 * The `*UserRoles` methods take the variadic form `(ctx, [user], ...roles)`.
 */
export class RoleChecker {
    private readonly options: ResolvedRoleCheckerOptions;

    constructor(options: RoleCheckerOptions = {}) {
        this.options = parseRoleCheckerOptions(options);
    }

    evaluate(ctx: AuthorizationContext, request: RoleCheckRequest): RoleCheckResult {
        const attributes = {
            'roles.required': [...request.required],
            'roles.subject_source': request.subject.kind,
        };
        return withCheckSpan(this.options, attributes, (span) => {
            const result = this.decide(ctx, request);
            if (span) {
                annotateCheckSpan(span, result);
            }
            return result;
        });
    }

    assert(ctx: AuthorizationContext, request: RoleCheckRequest): void {
        const result = this.evaluate(ctx, request);
        if (!result.ok) {
            throw result.error;
        }
    }

    check(ctx: AuthorizationContext, request: RoleCheckRequest): boolean {
        return this.checkUsing(ctx, () => request);
    }

    evaluateUserRoles(ctx: AuthorizationContext, ...args: RoleArgs): RoleCheckResult {
        return this.evaluate(ctx, parseRoleArgs(args));
    }

    assertUserRoles(ctx: AuthorizationContext, ...args: RoleArgs): void {
        this.assert(ctx, parseRoleArgs(args));
    }

    checkUserRoles(ctx: AuthorizationContext, ...args: RoleArgs): boolean {
        return this.checkUsing(ctx, () => parseRoleArgs(args));
    }

    /** Evaluates the request built by `buildRequest`; anything thrown along the way is a denial. */
    private checkUsing(ctx: AuthorizationContext, buildRequest: () => RoleCheckRequest): boolean {
        try {
            return this.evaluate(ctx, buildRequest()).ok;
        } catch (error) {
            const logger = this.debugLogger(ctx);
            if (logger) {
                this.writeDebug(logger, 'Role check raised an error, treating as denied', {
                    error: mapErrorToLogPayload(error),
                });
            }
            return false;
        }
    }

    private decide(ctx: AuthorizationContext, request: RoleCheckRequest): RoleCheckResult {
        const subject = request.subject.kind === 'explicit'
            ? request.subject.user
            : ctx.currentUser();
        if (!subject) {
            return { ok: false, error: new NoUserError() };
        }

        const have = new Set<RoleId>(subject.roles(...request.required));
        const need = distinct(request.required);
        const missing = need.filter(role => !have.has(role));

        const logger = this.debugLogger(ctx);
        const entryContext: LogContext = { required: need, subject: request.subject.kind };
        if (missing.length === 0) {
            this.writeDebug(logger, `Role granted: ${need.join(', ')}`, entryContext);
            return { ok: true, granted: need };
        }

        this.writeDebug(logger, `Role denied: ${need.join(', ')}`, { ...entryContext, missing });
        return { ok: false, error: new MissingRolesError(missing, need) };
    }

    /**
     * The logger the debug entries of one check go to, or undefined when none
     * should be written. Failures here never reach the caller.
     */
    private debugLogger(ctx: AuthorizationContext): Logger | undefined {
        try {
            const enabled = this.options.debug ?? ctx.isDebugEnabled?.() ?? false;
            if (!enabled || !ctx.logger) {
                return undefined;
            }
            return ctx.logger.child?.({ checkId: generateCheckId() }) ?? ctx.logger;
        } catch (logError) {
            console.error('Failed to resolve role check debug logger:', logError);
            return undefined;
        }
    }

    private writeDebug(logger: Logger | undefined, message: string, context: LogContext): void {
        if (!logger) {
            return;
        }
        try {
            logger.debug(message, context);
        } catch (logError) {
            console.error('Failed to write role check debug entry:', logError, { message });
        }
    }
}

/** Checker with default options, behind the module-level functions. */
export const defaultRoleChecker = new RoleChecker();

/** Evaluates `(ctx, [user], ...roles)` with the default checker. */
export function evaluateUserRoles(ctx: AuthorizationContext, ...args: RoleArgs): RoleCheckResult {
    return defaultRoleChecker.evaluateUserRoles(ctx, ...args);
}

/**
 * Throws unless the user (first argument, or the context's current user)
 * holds every listed role.
 * @throws NoUserError when there is no user to check.
 * @throws MissingRolesError naming the roles the user lacks.
 */
export function assertUserRoles(ctx: AuthorizationContext, ...args: RoleArgs): void {
    defaultRoleChecker.assertUserRoles(ctx, ...args);
}

/** Same check as {@link assertUserRoles}, reported as a boolean. */
export function checkUserRoles(ctx: AuthorizationContext, ...args: RoleArgs): boolean {
    return defaultRoleChecker.checkUserRoles(ctx, ...args);
}
