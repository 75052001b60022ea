/**
 * Session routes
 */

import { FastifyPluginAsync } from 'fastify';
import { SessionParamsSchema } from '../schemas/index.js';
import { InvalidRequestError, NotFoundError } from '../utils/errors.js';
import { toWireSnapshot } from '../utils/wire.js';

const sessionRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * Current context of a session
   */
  fastify.get('/sessions/:sessionId', async (request) => {
    const parseResult = SessionParamsSchema.safeParse(request.params);
    if (!parseResult.success) {
      throw new InvalidRequestError(
        'Invalid session id',
        parseResult.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message }))
      );
    }

    const { sessions } = fastify.engine;
    const { sessionId } = parseResult.data;
    if (!sessions.get(sessionId)) {
      throw new NotFoundError('Session');
    }
    return toWireSnapshot(sessions.snapshot(sessionId));
  });
};

export default sessionRoutes;
