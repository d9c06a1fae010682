import type { ServiceResult, Subscription } from '../../types';
import { notFound, runMutation, type ServiceContext } from '../shared';
import type { RegisterUserResult, UpsertSubscriptionInput } from './types';

// AccountService - writes from upstream systems: users registered by the
// identity gateway and subscription state pushed by billing.
export class AccountService {
    constructor(private ctx: ServiceContext) {}

    async registerUser(userId: string): Promise<ServiceResult<RegisterUserResult>> {
        return runMutation(this.ctx, 'account.register', async (scope) => {
            const result = await scope.repos.users.ensure(userId, scope.now);
            if (result.created) {
                this.ctx.logger.info('user_registered', { userId });
            }
            return result;
        });
    }

    async upsertSubscription(userId: string, input: UpsertSubscriptionInput): Promise<ServiceResult<Subscription>> {
        return runMutation(this.ctx, 'account.subscription', async (scope) => {
            const user = await scope.repos.users.getById(userId);
            if (!user) {
                throw notFound('user');
            }

            const subscription: Subscription = {
                userId,
                tier: input.tier,
                status: input.status,
                currentPeriodEnd: input.currentPeriodEnd ?? null,
                updatedAt: scope.now,
            };
            await scope.repos.subscriptions.upsert(subscription);

            this.ctx.logger.info('subscription_updated', {
                userId,
                tier: subscription.tier,
                status: subscription.status,
            });
            return subscription;
        });
    }
}
