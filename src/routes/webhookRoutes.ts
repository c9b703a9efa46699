import type { FastifyInstance } from 'fastify';
import { WhatsAppWebhookController } from '../controllers/whatsappWebhookController';

const whatsappWebhookController = new WhatsAppWebhookController();

// Payloads are parsed leniently inside the service, so no body schema here.
export default async function webhookRoutes(fastify: FastifyInstance) {
  fastify.get('/whatsapp', whatsappWebhookController.verify);

  fastify.post(
    '/whatsapp',
    {
      config: {
        // X-Hub-Signature-256 is computed over the exact bytes received.
        rawBody: true,
      },
    },
    whatsappWebhookController.inbound
  );
}
