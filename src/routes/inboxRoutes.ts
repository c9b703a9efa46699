import type { FastifyInstance } from 'fastify';
import { InboxController } from '../controllers/inboxController';
import {
  AgentReplyBodySchema,
  ConversationParamsSchema,
  LoginBodySchema,
  SetModeBodySchema,
  type AgentReplyBody,
  type ConversationParams,
  type LoginBody,
  type SetModeBody,
} from '../dtos/inboxDtos';
import agentSessionPlugin, { requireAgent } from '../plugins/agentSession';

const inboxController = new InboxController();

export default async function inboxRoutes(fastify: FastifyInstance) {
  fastify.register(async (sessionApp) => {
    sessionApp.register(agentSessionPlugin);

    sessionApp.get('/login', inboxController.loginPage);
    sessionApp.post<{ Body: LoginBody }>('/login', { schema: { body: LoginBodySchema } }, inboxController.login);
    sessionApp.post('/logout', inboxController.logout);

    sessionApp.register(async (agentApp) => {
      agentApp.addHook('onRequest', requireAgent);

      agentApp.get('/', inboxController.list);

      agentApp.get<{ Params: ConversationParams }>(
        '/conversations/:id',
        { schema: { params: ConversationParamsSchema } },
        inboxController.show
      );

      agentApp.post<{ Params: ConversationParams }>(
        '/conversations/:id/assign',
        { schema: { params: ConversationParamsSchema } },
        inboxController.assign
      );

      agentApp.post<{ Params: ConversationParams; Body: SetModeBody }>(
        '/conversations/:id/mode',
        { schema: { params: ConversationParamsSchema, body: SetModeBodySchema } },
        inboxController.setMode
      );

      agentApp.post<{ Params: ConversationParams; Body: AgentReplyBody }>(
        '/conversations/:id/reply',
        { schema: { params: ConversationParamsSchema, body: AgentReplyBodySchema } },
        inboxController.reply
      );
    });
  });
}
