import { AuthorizationContext } from '../interfaces/context.js';
import { Logger } from '../interfaces/logger.js';
import { RoleSubject } from '../interfaces/subject.js';

export interface AuthorizationContextInit {
    /** The logged in user, if any. */
    user?: RoleSubject | null;
    /** Enables debug entries. Defaults to false. */
    debug?: boolean;
    logger?: Logger;
}

/**
 * Builds a plain AuthorizationContext for hosts that don't have their own.
 */
export function createAuthorizationContext(init: AuthorizationContextInit = {}): AuthorizationContext {
    const { user = null, debug = false, logger } = init;
    return {
        currentUser: () => user,
        isDebugEnabled: () => debug,
        logger,
    };
}
