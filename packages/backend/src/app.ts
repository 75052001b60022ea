/**
 * Fastify application setup
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import correlationIdPlugin from './plugins/correlation-id.js';
import authPlugin from './plugins/auth.js';
import errorHandlerPlugin from './plugins/error-handler.js';
import routes from './routes/index.js';
import type { Engine } from './engine.js';

export interface BuildAppOptions {
  /** Overrides ENGINE_API_KEY; an empty string disables authentication */
  apiKey?: string;
  /** Serve the OpenAPI UI at /docs */
  docs?: boolean;
}

export async function buildApp(engine: Engine, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
    requestIdHeader: 'x-correlation-id',
    requestIdLogLabel: 'correlationId',
  });

  app.decorate('engine', engine);

  // Register plugins in order
  await app.register(cors, {
    origin: config.isDev,
    exposedHeaders: ['x-correlation-id', 'retry-after'],
  });

  if (options.docs ?? config.isDev) {
    await app.register(swagger, {
      openapi: {
        info: {
          title: 'AirLens Tool Engine API',
          description: 'Tool orchestration and session state for the air-quality dashboard agent',
          version: '1.0.0',
        },
        servers: [
          {
            url: `http://localhost:${config.server.port}`,
            description: 'Development server',
          },
        ],
        components: {
          securitySchemes: {
            apiKey: {
              type: 'apiKey',
              name: 'X-API-Key',
              in: 'header',
            },
          },
        },
      },
    });

    await app.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  // Core plugins
  await app.register(correlationIdPlugin);
  await app.register(authPlugin, { apiKey: options.apiKey });
  await app.register(errorHandlerPlugin);

  await app.register(routes);

  // Log registered routes in development
  if (config.isDev && config.env !== 'test') {
    app.ready(() => {
      logger.info({ routes: app.printRoutes() }, 'Registered routes');
    });
  }

  return app;
}
