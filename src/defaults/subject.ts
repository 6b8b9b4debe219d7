import { RoleSubject } from '../interfaces/subject.js';
import { RoleId } from '../types.js';

/**
 * Subject with a fixed list of roles.
 * Suitable for tests and for hosts whose user objects already carry their roles,
 * e.g. decoded from a token.
 */
export class StaticRoleSubject implements RoleSubject {
    private readonly heldRoles: readonly RoleId[];

    constructor(roles: Iterable<RoleId>, public readonly id?: string) {
        this.heldRoles = Array.from(roles);
    }

    /** Returns every held role; the candidates are ignored. */
    roles(..._candidates: RoleId[]): RoleId[] {
        return [...this.heldRoles];
    }
}
