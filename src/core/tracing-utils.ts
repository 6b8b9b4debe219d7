import { trace, Attributes, Span, SpanStatusCode } from '@opentelemetry/api';
import { ResolvedRoleCheckerOptions } from './options.js';
import { MissingRolesError, NoUserError } from '../errors/index.js';
import { describeThrown, mapErrorToLogPayload } from '../utils/error-mapper.js';
import { RoleCheckOutcome, RoleCheckResult } from '../types.js';

export const CHECK_SPAN_NAME = 'roles.check';

/** Outcome of a finished check, as reported on its span. */
export function outcomeOf(result: RoleCheckResult): RoleCheckOutcome {
    if (result.ok) {
        return 'granted';
    }
    return result.error instanceof NoUserError ? 'no_user' : 'denied';
}

/** Writes the outcome attributes of a finished check onto its span. */
export function annotateCheckSpan(span: Pick<Span, 'setAttributes'>, result: RoleCheckResult): void {
    const attributes: Attributes = { 'roles.outcome': outcomeOf(result) };
    if (!result.ok && result.error instanceof MissingRolesError) {
        attributes['roles.missing'] = [...result.error.missing];
    }
    span.setAttributes(attributes);
}

/**
 * Runs `fn` inside an active `roles.check` span when tracing is enabled,
 * or directly otherwise. Errors thrown by `fn` are recorded and rethrown.
 */
export function withCheckSpan<T>(
    options: Pick<ResolvedRoleCheckerOptions, 'enableTracing' | 'tracerName'>,
    attributes: Attributes,
    fn: (span?: Span) => T
): T {
    if (!options.enableTracing) {
        return fn();
    }

    const tracer = trace.getTracer(options.tracerName);
    return tracer.startActiveSpan(CHECK_SPAN_NAME, { attributes }, (span: Span) => {
        try {
            const result = fn(span);
            span.setStatus({ code: SpanStatusCode.OK });
            return result;
        } catch (error) {
            const { message } = mapErrorToLogPayload(error);
            span.setStatus({ code: SpanStatusCode.ERROR, message });
            span.recordException(error instanceof Error ? error : describeThrown(error));
            throw error;
        } finally {
            span.end();
        }
    });
}
