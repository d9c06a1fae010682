import { Hono } from 'hono';
import type { AppEnv } from '../env';
import { sendFailure } from './respond';

const inviteRoutes = new Hono<AppEnv>();

/**
 * GET /api/invites/:token
 * Preview the circle an invite leads to. Fails when the invite can no
 * longer be used.
 */
inviteRoutes.get('/:token', async (c) => {
    const result = await c.get('services').invites.preview(c.req.param('token'));
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

export default inviteRoutes;
