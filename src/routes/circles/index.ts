import { Hono } from 'hono';
import type { AppEnv } from '../../env';
import crudRouter from './crud';
import invitesRouter from './invites';
import membersRouter from './members';
import usageRouter from './usage';

const circleRoutes = new Hono<AppEnv>();

circleRoutes.route('/', crudRouter);
circleRoutes.route('/', membersRouter);
circleRoutes.route('/', invitesRouter);
circleRoutes.route('/', usageRouter);

export default circleRoutes;
