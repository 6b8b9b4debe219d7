import { z } from 'zod';
import { InvalidOptionsError } from '../errors/index.js';

export const DEFAULT_TRACER_NAME = 'roles-authorization-sdk';

export const roleCheckerOptionsSchema = z.object({
    /** Overrides the context's debug flag when set. */
    debug: z.boolean().optional(),
    /** Wraps each evaluation in an OpenTelemetry span. */
    enableTracing: z.boolean().default(false),
    tracerName: z.string().min(1).default(DEFAULT_TRACER_NAME),
}).strict();

/** Options accepted by `new RoleChecker(...)`. */
export type RoleCheckerOptions = z.input<typeof roleCheckerOptionsSchema>;

/** Options after defaults have been applied. */
export type ResolvedRoleCheckerOptions = z.output<typeof roleCheckerOptionsSchema>;

/**
 * Validates checker options and fills in defaults.
 * @throws InvalidOptionsError listing every rejected field.
 */
export function parseRoleCheckerOptions(options: unknown = {}): ResolvedRoleCheckerOptions {
    const parsed = roleCheckerOptionsSchema.safeParse(options);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
        );
        throw new InvalidOptionsError(`Invalid role checker options: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
}
