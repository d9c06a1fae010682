import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { onValidationError, sendFailure } from '../respond';
import { RegisterUserSchema, SubscriptionParamsSchema, UpsertSubscriptionSchema } from './schemas';

const internalHandlers = new Hono<AppEnv>();

/**
 * POST /internal/users
 * Register a user authenticated by the gateway. Idempotent.
 */
internalHandlers.post('/users', zValidator('json', RegisterUserSchema, onValidationError), async (c) => {
    const { userId } = c.req.valid('json');

    const result = await c.get('services').accounts.registerUser(userId);
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data.user }, result.data.created ? 201 : 200);
});

/**
 * PUT /internal/subscriptions/:userId
 * Billing pushes the current subscription state of a user.
 */
internalHandlers.put(
    '/subscriptions/:userId',
    zValidator('param', SubscriptionParamsSchema, onValidationError),
    zValidator('json', UpsertSubscriptionSchema, onValidationError),
    async (c) => {
        const { userId } = c.req.valid('param');
        const body = c.req.valid('json');

        const result = await c.get('services').accounts.upsertSubscription(userId, body);
        if (!result.success) {
            return sendFailure(c, result);
        }

        return c.json({ success: true, data: result.data });
    }
);

export default internalHandlers;
