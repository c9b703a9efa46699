import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { agentService } from '../services/agentService';
import { SESSION_COOKIE, verifySessionToken } from '../utils/jwt';

/**
 * Resolves `request.agent` from the signed session cookie. A missing,
 * expired or forged cookie, or one naming a deleted agent, leaves the
 * request logged out (`agent = null`); it never fails the request.
 */
const agentSessionPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('agent', null);

  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    const session = verifySessionToken(request.cookies[SESSION_COOKIE]);
    if (!session) {
      request.agent = null;
      return;
    }

    const agent = await agentService.findById(Number(session.sub));
    request.agent = agent && agent.tenantId === session.tenantId ? agent : null;
  });
};

// onRequest hook for pages that need a logged-in agent; runs after the session hook.
export async function requireAgent(request: FastifyRequest, reply: FastifyReply) {
  if (!request.agent) {
    return reply.redirect('/inbox/login', 303);
  }
}

export default fp(agentSessionPlugin);
