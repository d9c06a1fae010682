import type { CircleRole } from '../../types';

export type CircleOperation =
    | 'circle:read'
    | 'circle:update'
    | 'circle:delete'
    | 'member:list'
    | 'member:add'
    | 'member:remove'
    | 'member:update_role'
    | 'invite:create'
    | 'invite:list'
    | 'invite:revoke'
    | 'usage:record';

export const ROLE_RANK: Record<CircleRole, number> = {
    member: 1,
    admin: 2,
    owner: 3,
};

const EVERY_ROLE: readonly CircleRole[] = ['owner', 'admin', 'member'];
const MANAGERS: readonly CircleRole[] = ['owner', 'admin'];
const OWNER_ONLY: readonly CircleRole[] = ['owner'];

/** Roles allowed to perform each operation. */
export const PERMISSION_MATRIX: Record<CircleOperation, readonly CircleRole[]> = {
    'circle:read': EVERY_ROLE,
    'circle:update': MANAGERS,
    'circle:delete': OWNER_ONLY,
    'member:list': EVERY_ROLE,
    'member:add': MANAGERS,
    'member:remove': MANAGERS,
    'member:update_role': OWNER_ONLY,
    'invite:create': MANAGERS,
    'invite:list': MANAGERS,
    'invite:revoke': MANAGERS,
    'usage:record': EVERY_ROLE,
};

export function isAllowed(role: CircleRole, operation: CircleOperation): boolean {
    return PERMISSION_MATRIX[operation].includes(role);
}

export function hasRoleAtLeast(role: CircleRole, required: CircleRole): boolean {
    return ROLE_RANK[role] >= ROLE_RANK[required];
}
