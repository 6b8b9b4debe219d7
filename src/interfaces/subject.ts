import { RoleId } from '../types.js';

/**
 * A user whose roles can be checked.
 * Implemented by whatever the host's authentication layer hands out as "the user".
 */
export interface RoleSubject {
    /**
     * Returns the roles the subject currently holds.
     * The required roles are passed as a hint; the checker treats the result
     * as the subject's complete role set either way.
     * @param candidates - The roles being checked for.
     */
    roles(...candidates: RoleId[]): Iterable<RoleId>;
}
