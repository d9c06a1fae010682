import type { CircleMembership, CirclePrivacy, CircleType, CircleView } from '../../types';

export interface CreateCircleInput {
    type: CircleType;
    name: string;
    description?: string | null;
    privacy?: CirclePrivacy;
}

export interface UpdateCircleInput {
    name?: string;
    description?: string | null;
    privacy?: CirclePrivacy;
}

export interface JoinResult {
    circle: CircleView;
    membership: CircleMembership;
}

export interface DeleteResult {
    circleId: string;
    deleted: true;
}
