/**
 * Tool call routes
 */

import { FastifyPluginAsync } from 'fastify';
import { ToolCallRequestSchema } from '../schemas/index.js';
import { InvalidRequestError } from '../utils/errors.js';
import { toOutboundEnvelope } from '../utils/wire.js';

const toolCallRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * Tool catalogue exposed to the agent
   */
  fastify.get('/tools', async () => {
    return { tools: fastify.engine.registry.catalogue() };
  });

  /**
   * Execute one tool call
   */
  fastify.post('/tool-calls', async (request, reply) => {
    const parseResult = ToolCallRequestSchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new InvalidRequestError(
        'Invalid tool call envelope',
        parseResult.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message }))
      );
    }

    const body = parseResult.data;
    const outcome = await fastify.engine.dispatcher.dispatch({
      sessionId: body.session_id,
      callerId: body.caller_id,
      tool: body.tool,
      arguments: body.arguments,
      message: body.message,
      correlationId: request.correlationId,
    });

    if (outcome.retryAfterMs !== undefined) {
      reply.header('retry-after', String(Math.ceil(outcome.retryAfterMs / 1000)));
    }
    return reply.status(outcome.statusCode).send(toOutboundEnvelope(outcome));
  });
};

export default toolCallRoutes;
