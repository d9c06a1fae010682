import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { getAuth } from '../../middleware/auth';
import { onValidationError, sendFailure } from '../respond';
import {
    AddMemberSchema,
    CircleParamsSchema,
    LeaveCircleSchema,
    MemberParamsSchema,
    UpdateMemberRoleSchema,
} from './schemas';

const membersRouter = new Hono<AppEnv>();

membersRouter.get('/:id/members', async (c) => {
    const auth = getAuth(c);

    const result = await c.get('services').memberships.listMembers(auth.userId, c.req.param('id'));
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

membersRouter.post(
    '/:id/members',
    zValidator('param', CircleParamsSchema, onValidationError),
    zValidator('json', AddMemberSchema, onValidationError),
    async (c) => {
        const auth = getAuth(c);
        const { id } = c.req.valid('param');
        const body = c.req.valid('json');

        const result = await c.get('services').memberships.addMember(auth.userId, id, body.userId, body.role);
        if (!result.success) {
            return sendFailure(c, result);
        }

        return c.json({ success: true, data: result.data }, 201);
    }
);

membersRouter.patch(
    '/:id/members/:userId',
    zValidator('param', MemberParamsSchema, onValidationError),
    zValidator('json', UpdateMemberRoleSchema, onValidationError),
    async (c) => {
        const auth = getAuth(c);
        const { id, userId } = c.req.valid('param');
        const { role } = c.req.valid('json');

        const result = await c.get('services').memberships.updateRole(auth.userId, id, userId, role);
        if (!result.success) {
            return sendFailure(c, result);
        }

        return c.json({ success: true, data: result.data });
    }
);

membersRouter.delete('/:id/members/:userId', async (c) => {
    const auth = getAuth(c);

    const result = await c.get('services').memberships.removeMember(
        auth.userId,
        c.req.param('id'),
        c.req.param('userId')
    );
    if (!result.success) {
        return sendFailure(c, result);
    }

    return c.json({ success: true, data: result.data });
});

membersRouter.post(
    '/:id/leave',
    zValidator('param', CircleParamsSchema, onValidationError),
    zValidator('json', LeaveCircleSchema, onValidationError),
    async (c) => {
        const auth = getAuth(c);
        const { id } = c.req.valid('param');
        const { successorId } = c.req.valid('json');

        const result = await c.get('services').memberships.leave(auth.userId, id, successorId);
        if (!result.success) {
            return sendFailure(c, result);
        }

        return c.json({ success: true, data: result.data });
    }
);

export default membersRouter;
