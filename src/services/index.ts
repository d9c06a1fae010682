import type { CircleDB } from '../utils/db';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { AccountService } from './account';
import { CircleRegistry } from './circle';
import { LogEventSink, type EventSink } from './events';
import { InviteService } from './invite';
import { MembershipManager } from './membership';
import { QuotaEnforcer } from './quota';
import { DEFAULT_MAX_ATTEMPTS, nowMs, type ServiceContext } from './shared';
import { SubscriptionResolver, type SubscriptionProvider } from './subscription';
import { DEFAULT_INVITE_TTL_SECONDS } from '../constants/invite';

export interface CircleServicesOptions {
    db: CircleDB;
    events?: EventSink;
    logger?: Logger;
    maxAttempts?: number;
    inviteTtlSeconds?: number;
    clock?: () => number;
    subscriptionProvider?: SubscriptionProvider;
}

export interface CircleServices {
    context: ServiceContext;
    subscriptions: SubscriptionResolver;
    quota: QuotaEnforcer;
    memberships: MembershipManager;
    invites: InviteService;
    circles: CircleRegistry;
    accounts: AccountService;
}

/** Wires the circle services around one database handle. */
export function createCircleServices(options: CircleServicesOptions): CircleServices {
    const logger = options.logger ?? rootLogger;
    const context: ServiceContext = {
        db: options.db,
        events: options.events ?? new LogEventSink(logger),
        logger,
        maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
        clock: options.clock ?? nowMs,
    };

    const subscriptions = new SubscriptionResolver(context, options.subscriptionProvider);
    const quota = new QuotaEnforcer(context, subscriptions);
    const memberships = new MembershipManager(context, quota);
    const invites = new InviteService(context, memberships, {
        defaultTtlSeconds: options.inviteTtlSeconds ?? DEFAULT_INVITE_TTL_SECONDS,
    });
    const circles = new CircleRegistry(context, quota, memberships, invites);
    const accounts = new AccountService(context);

    return { context, subscriptions, quota, memberships, invites, circles, accounts };
}

export { AccountService } from './account';
export { CircleRegistry } from './circle';
export { InviteService } from './invite';
export { MembershipManager } from './membership';
export { QuotaEnforcer } from './quota';
export { SubscriptionResolver, StoredSubscriptionProvider } from './subscription';
export { LogEventSink, HttpEventSink, FanoutEventSink, createEventSink } from './events';
export type { EventSink, DomainEvent } from './events';
