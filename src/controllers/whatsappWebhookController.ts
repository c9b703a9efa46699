import type { FastifyReply, FastifyRequest } from 'fastify';
import * as Sentry from '@sentry/node';
import { config } from '../config/env';
import { inboundMessageService, type InboundMessageService } from '../services/inboundMessageService';
import { verifyHubSignature } from '../services/whatsapp/signature';
import { VerifyQuerySchema } from '../services/whatsapp/types';
import { safeEqual } from '../utils/secureCompare';

export class WhatsAppWebhookController {
  constructor(private readonly service: InboundMessageService = inboundMessageService) {}

  // Provider subscription handshake.
  verify = async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = VerifyQuerySchema.safeParse(request.query);
    const query = parsed.success ? parsed.data : null;

    if (
      query &&
      query['hub.mode'] === 'subscribe' &&
      config.WHATSAPP_VERIFY_TOKEN &&
      safeEqual(query['hub.verify_token'], config.WHATSAPP_VERIFY_TOKEN) &&
      query['hub.challenge']
    ) {
      request.log.info({ event: 'whatsapp.webhook.verified' }, 'Webhook verified');
      return reply.status(200).type('text/plain').send(query['hub.challenge']);
    }

    request.log.warn({ event: 'whatsapp.webhook.verify_failed' }, 'Webhook verification failed');
    return reply.status(403).type('text/plain').send('Verification failed');
  };

  inbound = async (request: FastifyRequest, reply: FastifyReply) => {
    if (config.WHATSAPP_APP_SECRET) {
      const rawBody = request.rawBody;
      const signature = request.headers['x-hub-signature-256'];
      const valid =
        rawBody !== undefined &&
        typeof signature === 'string' &&
        verifyHubSignature(rawBody, signature, config.WHATSAPP_APP_SECRET);
      if (!valid) {
        request.log.warn({ event: 'whatsapp.webhook.bad_signature' }, 'Invalid X-Hub-Signature-256');
        return reply.status(401).send({ error: { code: 'INVALID_SIGNATURE', message: 'Invalid signature' } });
      }
    }

    const outcome = await this.service.handle(request.body);

    switch (outcome.status) {
      case 'failed':
        // The provider is always acknowledged; the failure goes to logs and Sentry only.
        request.log.error(
          { event: 'whatsapp.inbound.failed', code: outcome.error.code, err: outcome.error.message },
          'Inbound message processing failed'
        );
        Sentry.withScope((scope) => {
          scope.setTag('error_code', outcome.error.code);
          scope.setContext('request', { method: request.method, url: request.url });
          Sentry.captureException(outcome.error.cause ?? new Error(outcome.error.message));
        });
        break;
      case 'replied':
        request.log.info(
          {
            event: 'whatsapp.inbound.replied',
            conversationId: outcome.conversationId,
            reply: outcome.reply.type === 'menu' ? 'menu' : outcome.reply.kind,
            sent: outcome.send.ok,
          },
          'Inbound message answered'
        );
        break;
      case 'handed_off':
        request.log.info(
          { event: 'whatsapp.inbound.handed_off', conversationId: outcome.conversationId },
          'Inbound message left for agent'
        );
        break;
      case 'ignored':
        request.log.debug({ event: 'whatsapp.inbound.ignored', reason: outcome.reason }, 'No message in payload');
        break;
    }

    return reply.status(200).send({ ok: true });
  };
}
