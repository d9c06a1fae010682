import type { Queryable } from '../utils/db';
import { CircleRepository } from './circles';
import { InviteRepository } from './invites';
import { MembershipRepository } from './memberships';
import { SubscriptionRepository } from './subscriptions';
import { UsageCounterRepository } from './usage-counters';
import { UserRepository } from './users';

export { CircleRepository, type CircleUpdate } from './circles';
export { InviteRepository } from './invites';
export { MembershipRepository } from './memberships';
export { SubscriptionRepository } from './subscriptions';
export { UsageCounterRepository } from './usage-counters';
export { UserRepository } from './users';

/**
 * Table repositories bound to one executor, usually a transaction handle.
 */
export interface Repositories {
    users: UserRepository;
    subscriptions: SubscriptionRepository;
    circles: CircleRepository;
    memberships: MembershipRepository;
    invites: InviteRepository;
    usage: UsageCounterRepository;
}

export function createRepositories(db: Queryable): Repositories {
    return {
        users: new UserRepository(db),
        subscriptions: new SubscriptionRepository(db),
        circles: new CircleRepository(db),
        memberships: new MembershipRepository(db),
        invites: new InviteRepository(db),
        usage: new UsageCounterRepository(db),
    };
}
