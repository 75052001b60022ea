/**
 * Authentication plugin
 * When an engine API key is configured, every /api route requires it in
 * the x-api-key header
 */

import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { config } from '../config/index.js';
import { apiKeysMatch } from '../utils/crypto.js';
import { UnauthorizedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface AuthPluginOptions {
  apiKey?: string;
}

/**
 * Check the presented key against the expected one
 */
export function authenticate(request: FastifyRequest, expectedKey: string): void {
  const apiKeyHeader = request.headers['x-api-key'];

  if (!apiKeyHeader || typeof apiKeyHeader !== 'string') {
    request.logger.warn('Authentication failed: Missing API key');
    throw new UnauthorizedError('Missing API key');
  }

  if (!apiKeysMatch(apiKeyHeader, expectedKey)) {
    request.logger.warn('Authentication failed: Invalid API key');
    throw new UnauthorizedError('Invalid API key');
  }

  request.logger.debug('Authentication successful');
}

const authPlugin: FastifyPluginAsync<AuthPluginOptions> = async (fastify, options) => {
  const expectedKey = options.apiKey ?? config.auth.engineApiKey;
  if (!expectedKey) {
    logger.warn('No engine API key configured; API routes are unauthenticated');
    return;
  }

  fastify.addHook('preHandler', async (request) => {
    if (!request.url.startsWith('/api/')) return;
    authenticate(request, expectedKey);
  });
};

export default fp(authPlugin, {
  name: 'auth',
  dependencies: ['correlation-id'],
});
