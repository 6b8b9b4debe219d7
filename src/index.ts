export * from './interfaces.js';
export * from './errors/index.js';
export * from './defaults/index.js';
export { RoleChecker, defaultRoleChecker, evaluateUserRoles, assertUserRoles, checkUserRoles } from './core/role-checker.js';
export { bindRoleChecks } from './core/bind.js';
export type { BoundRoleChecks } from './core/bind.js';
export { isRoleSubject, parseRoleArgs } from './core/role-args.js';
export { roleCheckerOptionsSchema, parseRoleCheckerOptions, DEFAULT_TRACER_NAME } from './core/options.js';
export type { RoleCheckerOptions, ResolvedRoleCheckerOptions } from './core/options.js';
export { mapErrorToLogPayload, describeThrown } from './utils/error-mapper.js';
export type { ErrorLogPayload } from './utils/error-mapper.js';
