import type { Circle, CircleMembership } from '../../types';

export interface RemoveMemberOptions {
    /** Member who becomes owner when the owner leaves a circle with other members. */
    successorId?: string;
}

export interface RemovalResult {
    circleId: string;
    userId: string;
    circleDeleted: boolean;
    newOwnerId: string | null;
}

export interface AuthorizedMember {
    circle: Circle;
    membership: CircleMembership;
}

export type DissolveReason = 'deleted' | 'last_member_left';
