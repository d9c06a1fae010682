import { Hono } from 'hono';
import type { AppEnv } from '../../env';
import { internalAuthMiddleware } from '../../middleware/auth';
import internalHandlers from './handlers';

const internalRoutes = new Hono<AppEnv>();

internalRoutes.use('*', internalAuthMiddleware);
internalRoutes.route('/', internalHandlers);

export default internalRoutes;
