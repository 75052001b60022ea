/**
 * Fastify type augmentations
 */

import type { Logger } from 'pino';
import type { Engine } from '../engine.js';

declare module 'fastify' {
  interface FastifyInstance {
    engine: Engine;
  }

  interface FastifyRequest {
    // Request tracing
    correlationId: string;

    // Request-scoped logger
    logger: Logger;
  }
}
