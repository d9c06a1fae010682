import { Hono } from 'hono';
import type { AppEnv } from '../env';
import { HTTP_STATUS, SERVICE_NAME } from '../constants/http';

const healthRoutes = new Hono<AppEnv>();

/**
 * GET /health
 * Liveness plus a database round trip
 */
healthRoutes.get('/', async (c) => {
    try {
        await c.get('db').first('SELECT 1 AS health');

        return c.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            service: SERVICE_NAME,
        }, HTTP_STATUS.OK);
    } catch (error) {
        c.get('logger').error('Health check failed', error);
        return c.json({
            status: 'unhealthy',
            timestamp: new Date().toISOString(),
            service: SERVICE_NAME,
            error: error instanceof Error ? error.message : 'Unknown error',
        }, HTTP_STATUS.SERVICE_UNAVAILABLE);
    }
});

export default healthRoutes;
