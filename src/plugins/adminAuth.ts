import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { config } from '../config/env';
import { safeEqual } from '../utils/secureCompare';

export function readAdminToken(request: FastifyRequest): string | undefined {
  const query = request.query;
  // An empty ?token= falls through to the header.
  if (query && typeof query === 'object' && 'token' in query && typeof query.token === 'string' && query.token) {
    return query.token;
  }
  const header = request.headers['x-admin-token'];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Shared-secret guard for the admin API and dashboard. Register inside the
 * scope it protects; the check runs before any handler (and any mutation).
 */
const adminAuthPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.addHook('onRequest', async (request, reply) => {
    if (!safeEqual(readAdminToken(request), config.ADMIN_TOKEN)) {
      return reply.status(401).send({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid admin token',
        },
      });
    }
  });
};

export default fp(adminAuthPlugin);
