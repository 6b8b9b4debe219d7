import { Logger } from './logger.js';
import { RoleSubject } from './subject.js';

/**
 * The request-scoped context a check runs against.
 */
export interface AuthorizationContext {
    /** The currently authenticated user, or null/undefined when nobody is logged in. */
    currentUser(): RoleSubject | null | undefined;

    /** Whether debug entries should be written. Treated as false when absent. */
    isDebugEnabled?(): boolean;

    /** Sink for debug entries. Checks run normally without one. */
    readonly logger?: Logger;
}
