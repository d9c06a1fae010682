import { Hono } from 'hono';
import type { AppEnv } from '../env';
import { getAuth } from '../middleware/auth';
import { sendFailure } from './respond';

const usageRoutes = new Hono<AppEnv>();

/**
 * GET /api/usage
 * Tier, limits and usage of the caller and of the circles they own.
 */
usageRoutes.get('/', async (c) => {
    const auth = getAuth(c);

    const result = await c.get('services').quota.getUsageSummary(auth.userId);
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

export default usageRoutes;
