import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { getAuth } from '../../middleware/auth';
import { onValidationError, sendFailure } from '../respond';
import { MediaUsageParamsSchema, MediaUsageQuerySchema, MediaUsageSchema } from './schemas';

const usageRouter = new Hono<AppEnv>();

usageRouter.post(
    '/:id/usage/:kind',
    zValidator('param', MediaUsageParamsSchema, onValidationError),
    zValidator('json', MediaUsageSchema, onValidationError),
    async (c) => {
        const auth = getAuth(c);
        const { id, kind } = c.req.valid('param');
        const { amount } = c.req.valid('json');

        const result = await c.get('services').circles.recordMedia(auth.userId, id, kind, amount);
        if (!result.success) {
            return sendFailure(c, result);
        }

        return c.json({ success: true, data: result.data });
    }
);

usageRouter.delete(
    '/:id/usage/:kind',
    zValidator('param', MediaUsageParamsSchema, onValidationError),
    zValidator('query', MediaUsageQuerySchema, onValidationError),
    async (c) => {
        const auth = getAuth(c);
        const { id, kind } = c.req.valid('param');
        const { amount } = c.req.valid('query');

        const result = await c.get('services').circles.releaseMedia(auth.userId, id, kind, amount);
        if (!result.success) {
            return sendFailure(c, result);
        }

        return c.json({ success: true, data: result.data });
    }
);

export default usageRouter;
