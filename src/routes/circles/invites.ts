import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { getAuth } from '../../middleware/auth';
import { onValidationError, sendFailure } from '../respond';
import { CircleParamsSchema, CreateInviteSchema } from './schemas';

const invitesRouter = new Hono<AppEnv>();

invitesRouter.get('/:id/invites', async (c) => {
    const auth = getAuth(c);

    const result = await c.get('services').invites.list(auth.userId, c.req.param('id'));
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

invitesRouter.post(
    '/:id/invites',
    zValidator('param', CircleParamsSchema, onValidationError),
    zValidator('json', CreateInviteSchema, onValidationError),
    async (c) => {
        const auth = getAuth(c);
        const { id } = c.req.valid('param');
        const body = c.req.valid('json');

        const result = await c.get('services').invites.create(auth.userId, id, body);
        if (!result.success) {
            return sendFailure(c, result);
        }

        return c.json({ success: true, data: result.data }, 201);
    }
);

invitesRouter.delete('/:id/invites/:token', async (c) => {
    const auth = getAuth(c);

    const result = await c.get('services').invites.revoke(
        auth.userId,
        c.req.param('token'),
        c.req.param('id')
    );
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

export default invitesRouter;
