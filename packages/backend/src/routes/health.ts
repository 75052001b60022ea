/**
 * Health check routes
 */

import { FastifyPluginAsync } from 'fastify';

const healthRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * Basic health check
   */
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    };
  });

  /**
   * Readiness check (includes the sensor store)
   */
  fastify.get('/ready', async (request, reply) => {
    const { sensors, sessions, cache, registry } = fastify.engine;
    const sensorsReachable = await sensors.healthCheck();
    const checks = {
      sensors: sensorsReachable ? 'connected' : 'unreachable',
      sensorBackend: sensors.name,
      tools: registry.getNames().length,
      sessions: sessions.size,
      cache: cache.stats(),
    };

    if (!sensorsReachable) {
      return reply.status(503).send({
        status: 'error',
        timestamp: new Date().toISOString(),
        checks,
      });
    }

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      checks,
    };
  });
};

export default healthRoutes;
