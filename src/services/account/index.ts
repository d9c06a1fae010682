export { AccountService } from './account.service';
export type { UpsertSubscriptionInput, RegisterUserResult } from './types';
