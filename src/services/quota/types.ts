import type { ResourceKind } from '../../types';

export type ReservationState = 'reserved' | 'committed' | 'released';

/**
 * Capacity claimed against a usage counter. The increment is written when
 * the handle is created and becomes durable with the enclosing transaction.
 */
export interface ReservationHandle {
    readonly id: string;
    readonly kind: ResourceKind;
    readonly ownerKey: string;
    readonly amount: number;
    state: ReservationState;
}
