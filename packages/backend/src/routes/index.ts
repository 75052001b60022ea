/**
 * Route index - registers all API routes
 */

import { FastifyPluginAsync } from 'fastify';
import healthRoutes from './health.js';
import toolCallRoutes from './tool-calls.js';
import sessionRoutes from './sessions.js';
import exportRoutes from './exports.js';

const routes: FastifyPluginAsync = async (fastify) => {
  // Health routes (no /api/v1 prefix)
  await fastify.register(healthRoutes);

  // API v1 routes
  await fastify.register(async (api) => {
    await api.register(toolCallRoutes);
    await api.register(sessionRoutes);
    await api.register(exportRoutes);
  }, { prefix: '/api/v1' });
};

export default routes;
