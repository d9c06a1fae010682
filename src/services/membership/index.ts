export { MembershipManager } from './membership.service';
export { PERMISSION_MATRIX, ROLE_RANK, isAllowed, hasRoleAtLeast, type CircleOperation } from './permissions';
export type { RemoveMemberOptions, RemovalResult, AuthorizedMember, DissolveReason } from './types';
