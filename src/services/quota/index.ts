export { QuotaEnforcer, toUsageStatus } from './quota.service';
export type { ReservationHandle, ReservationState } from './types';
