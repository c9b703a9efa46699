import type { FastifyReply, FastifyRequest } from 'fastify';
import { config } from '../config/env';
import type { Agent } from '../infrastructure/schema';
import { agentService } from '../services/agentService';
import { renderConversation, renderConversationList, renderLogin } from '../services/htmlTemplates/inboxTemplates';
import { inboxService } from '../services/inboxService';
import { AppError } from '../utils/appError';
import { SESSION_COOKIE, SESSION_TTL_SECONDS, signSessionToken } from '../utils/jwt';
import type { AgentReplyBody, ConversationParams, LoginBody, SetModeBody } from '../dtos/inboxDtos';

const html = (reply: FastifyReply, page: string) => reply.type('text/html; charset=utf-8').send(page);

// requireAgent has already run on every route that calls this.
function currentAgent(request: FastifyRequest): Agent {
  if (!request.agent) {
    throw new AppError(401, 'UNAUTHENTICATED', 'Login required');
  }
  return request.agent;
}

export class InboxController {
  loginPage = async (request: FastifyRequest, reply: FastifyReply) => {
    if (request.agent) return reply.redirect('/inbox', 303);
    return html(reply, renderLogin(null));
  };

  login = async (request: FastifyRequest<{ Body: LoginBody }>, reply: FastifyReply) => {
    const { email, password } = request.body;

    let agent: Agent;
    try {
      agent = await agentService.authenticate(email, password);
    } catch (err) {
      if (err instanceof AppError && err.statusCode === 401) {
        request.log.warn({ event: 'inbox.login_failed' }, 'Agent login failed');
        return html(reply.status(401), renderLogin(err.message));
      }
      throw err;
    }

    reply.setCookie(SESSION_COOKIE, signSessionToken(agent.id, agent.tenantId), {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: config.NODE_ENV === 'production',
      maxAge: SESSION_TTL_SECONDS,
    });
    request.log.info({ event: 'inbox.login', agentId: agent.id }, 'Agent logged in');
    return reply.redirect('/inbox', 303);
  };

  logout = async (_request: FastifyRequest, reply: FastifyReply) => {
    reply.clearCookie(SESSION_COOKIE, { path: '/' });
    return reply.redirect('/inbox/login', 303);
  };

  list = async (request: FastifyRequest, reply: FastifyReply) => {
    const agent = currentAgent(request);
    const conversations = await inboxService.listConversations(agent.tenantId);
    return html(reply, renderConversationList(agent, conversations));
  };

  show = async (request: FastifyRequest<{ Params: ConversationParams }>, reply: FastifyReply) => {
    const agent = currentAgent(request);
    const thread = await inboxService.getThread(agent.tenantId, request.params.id);
    return html(reply, renderConversation(agent, thread));
  };

  assign = async (request: FastifyRequest<{ Params: ConversationParams }>, reply: FastifyReply) => {
    const agent = currentAgent(request);
    await inboxService.assignToMe(agent, request.params.id);
    return reply.redirect(`/inbox/conversations/${request.params.id}`, 303);
  };

  setMode = async (request: FastifyRequest<{ Params: ConversationParams; Body: SetModeBody }>, reply: FastifyReply) => {
    const agent = currentAgent(request);
    await inboxService.setMode(agent, request.params.id, request.body.mode);
    return reply.redirect(`/inbox/conversations/${request.params.id}`, 303);
  };

  reply = async (request: FastifyRequest<{ Params: ConversationParams; Body: AgentReplyBody }>, reply: FastifyReply) => {
    const agent = currentAgent(request);
    const { send } = await inboxService.replyAsAgent(agent, request.params.id, request.body.body);
    if (!send.ok) {
      request.log.warn(
        { event: 'inbox.reply_send_failed', conversationId: request.params.id, status: send.status },
        'Agent reply stored but not delivered'
      );
    }
    return reply.redirect(`/inbox/conversations/${request.params.id}`, 303);
  };
}
