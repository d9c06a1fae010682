import type { CircleRole } from '../../types';

export const CircleEvents = {
    MEMBER_ADDED: 'MemberAdded',
    MEMBER_REMOVED: 'MemberRemoved',
    OWNERSHIP_TRANSFERRED: 'OwnershipTransferred',
    INVITE_CONSUMED: 'InviteConsumed',
    CIRCLE_DELETED: 'CircleDeleted',
} as const;

export interface MemberAddedEvent {
    type: typeof CircleEvents.MEMBER_ADDED;
    circleId: string;
    userId: string;
    role: CircleRole;
    addedBy: string;
    via: 'direct' | 'invite';
    occurredAt: number;
}

export interface MemberRemovedEvent {
    type: typeof CircleEvents.MEMBER_REMOVED;
    circleId: string;
    userId: string;
    removedBy: string;
    reason: 'removed' | 'left';
    occurredAt: number;
}

export interface OwnershipTransferredEvent {
    type: typeof CircleEvents.OWNERSHIP_TRANSFERRED;
    circleId: string;
    fromUserId: string;
    toUserId: string;
    occurredAt: number;
}

export interface InviteConsumedEvent {
    type: typeof CircleEvents.INVITE_CONSUMED;
    circleId: string;
    tokenPrefix: string;
    userId: string;
    usesRemaining: number;
    occurredAt: number;
}

export interface CircleDeletedEvent {
    type: typeof CircleEvents.CIRCLE_DELETED;
    circleId: string;
    deletedBy: string;
    reason: 'deleted' | 'last_member_left';
    memberIds: string[];
    occurredAt: number;
}

export type DomainEvent =
    | MemberAddedEvent
    | MemberRemovedEvent
    | OwnershipTransferredEvent
    | InviteConsumedEvent
    | CircleDeletedEvent;

/** Fire-and-forget receiver of committed domain events. */
export interface EventSink {
    emit(event: DomainEvent): void;
}

export interface HttpEventSinkConfig {
    url: string;
    timeoutMs: number;
}
