import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { getAuth } from '../../middleware/auth';
import { onValidationError, sendFailure } from '../respond';
import { CircleParamsSchema, CreateCircleSchema, JoinCircleSchema, UpdateCircleSchema } from './schemas';

const crudRouter = new Hono<AppEnv>();

crudRouter.post('/', zValidator('json', CreateCircleSchema, onValidationError), async (c) => {
    const auth = getAuth(c);
    const body = c.req.valid('json');

    const result = await c.get('services').circles.createCircle(auth.userId, body);
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data }, 201);
});

crudRouter.get('/', async (c) => {
    const auth = getAuth(c);

    const result = await c.get('services').circles.listCircles(auth.userId);
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

// Static path, registered before the /:id routes
crudRouter.post('/join', zValidator('json', JoinCircleSchema, onValidationError), async (c) => {
    const auth = getAuth(c);
    const { token } = c.req.valid('json');

    const result = await c.get('services').circles.joinViaInvite(auth.userId, token);
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data }, 201);
});

crudRouter.get('/:id', async (c) => {
    const auth = getAuth(c);

    const result = await c.get('services').circles.getCircle(auth.userId, c.req.param('id'));
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

crudRouter.patch(
    '/:id',
    zValidator('param', CircleParamsSchema, onValidationError),
    zValidator('json', UpdateCircleSchema, onValidationError),
    async (c) => {
        const auth = getAuth(c);
        const { id } = c.req.valid('param');
        const body = c.req.valid('json');

        const result = await c.get('services').circles.updateCircle(auth.userId, id, body);
        if (!result.success) {
            return sendFailure(c, result);
        }

        return c.json({ success: true, data: result.data });
    }
);

crudRouter.delete('/:id', async (c) => {
    const auth = getAuth(c);

    const result = await c.get('services').circles.deleteCircle(auth.userId, c.req.param('id'));
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

export default crudRouter;
