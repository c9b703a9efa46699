import { type InboundMessage, type NormalizedInbound, WebhookPayloadSchema } from './types';

function extractBody(msg: InboundMessage): Pick<NormalizedInbound, 'messageType' | 'body'> | null {
  if (msg.type === 'text') {
    const body = (msg.text?.body ?? '').trim();
    return body ? { messageType: 'text', body } : null;
  }

  if (msg.type === 'interactive') {
    const inter = msg.interactive;
    if (inter?.type === 'list_reply' && inter.list_reply) {
      return { messageType: 'list_reply', body: inter.list_reply.id };
    }
    if (inter?.type === 'button_reply' && inter.button_reply) {
      return { messageType: 'button_reply', body: inter.button_reply.id };
    }
  }

  return null;
}

/**
 * Pulls the first message out of a Cloud API webhook delivery.
 *
 * Returns null for anything the bot does not answer: status callbacks (no
 * `messages`), unrecognised shapes, media/location/etc. message types and
 * empty bodies.
 */
export function parseInbound(payload: unknown): NormalizedInbound | null {
  const parsed = WebhookPayloadSchema.safeParse(payload);
  if (!parsed.success) return null;

  const value = parsed.data.entry[0]?.changes[0]?.value;
  const msg = value?.messages?.[0];
  if (!value || !msg || !msg.from) return null;

  const content = extractBody(msg);
  if (!content) return null;

  const contact = value.contacts?.find((c) => c.wa_id === msg.from) ?? value.contacts?.[0];

  return {
    messageId: msg.id ?? null,
    waFrom: msg.from,
    waTo: value.metadata?.display_phone_number ?? null,
    customerName: contact?.profile?.name ?? null,
    ...content,
  };
}
