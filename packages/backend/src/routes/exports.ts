/**
 * Export download routes
 */

import { FastifyPluginAsync } from 'fastify';
import { ExportParamsSchema } from '../schemas/index.js';
import { InvalidRequestError, NotFoundError } from '../utils/errors.js';

const exportRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * Stream the CSV behind an export handle
   */
  fastify.get('/exports/:handle', async (request, reply) => {
    const parseResult = ExportParamsSchema.safeParse(request.params);
    if (!parseResult.success) {
      throw new InvalidRequestError('Invalid export handle');
    }

    const { exports } = fastify.engine;
    const entry = exports.get(parseResult.data.handle);
    if (!entry) {
      throw new NotFoundError('Export');
    }

    request.logger.info({ handle: entry.handle, sessionId: entry.sessionId }, 'Streaming export');
    reply.type('text/csv; charset=utf-8');
    reply.header('content-disposition', `attachment; filename="${entry.filename}"`);
    return reply.send(exports.openStream(entry.handle));
  });
};

export default exportRoutes;
