import { z } from 'zod';
import type { DeliveryStatus } from '../../infrastructure/schema';
import { config } from '../../config/env';
import { logger } from '../../infrastructure/logger';
import { type InteractiveListMessage, type SendResult, WHATSAPP_TEXT_LIMIT } from './types';

export type WhatsAppClientOptions = {
  token: string;
  phoneNumberId: string;
  graphUrl: string;
  timeoutMs: number;
};

const GraphSendResponseSchema = z
  .object({
    messages: z.array(z.object({ id: z.string().optional() }).passthrough()).optional(),
    error: z.object({ message: z.string().optional(), code: z.number().optional() }).passthrough().optional(),
  })
  .passthrough();

export function truncateText(text: string, limit: number = WHATSAPP_TEXT_LIMIT): string {
  if (text.length <= limit) return text;
  const cut = text.slice(0, limit);
  // Never end on the first half of a surrogate pair.
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}

export function deliveryStatus(send: SendResult): DeliveryStatus {
  if (!send.ok) return 'failed';
  return send.skipped ? 'skipped' : 'sent';
}

/**
 * Outbound Cloud API sender. One attempt per message with a fixed timeout;
 * failures come back as `{ ok: false }` and are logged, never thrown or retried.
 */
export class WhatsAppClient {
  private readonly options: WhatsAppClientOptions;

  constructor(options: WhatsAppClientOptions) {
    this.options = options;
  }

  get isConfigured(): boolean {
    return Boolean(this.options.token && this.options.phoneNumberId);
  }

  async sendText(to: string, body: string): Promise<SendResult> {
    return this.post(to, { type: 'text', text: { body: truncateText(body) } });
  }

  async sendMenu(to: string, menu: InteractiveListMessage): Promise<SendResult> {
    return this.post(to, { ...menu });
  }

  private async post(to: string, message: Record<string, unknown>): Promise<SendResult> {
    if (!this.isConfigured) {
      logger.warn({ event: 'whatsapp.send.skipped', to }, 'WhatsApp token/phone number id missing; send skipped');
      return { ok: true, skipped: true, reason: 'NOT_CONFIGURED' };
    }

    const url = `${this.options.graphUrl}/${this.options.phoneNumberId}/messages`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ messaging_product: 'whatsapp', to, ...message }),
        signal: controller.signal,
      });

      const parsed = GraphSendResponseSchema.safeParse(await res.json().catch(() => ({})));
      const data = parsed.success ? parsed.data : null;

      if (!res.ok) {
        const error = data?.error?.message ?? `HTTP ${res.status}`;
        logger.error(
          { event: 'whatsapp.send.failed', to, status: res.status, metaCode: data?.error?.code },
          `WhatsApp send failed: ${error}`
        );
        return { ok: false, status: res.status, error };
      }

      return { ok: true, skipped: false, messageId: data?.messages?.[0]?.id ?? null };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.error({ event: 'whatsapp.send.error', to, err: error }, 'WhatsApp send request errored');
      return { ok: false, status: null, error };
    } finally {
      clearTimeout(timeout);
    }
  }
}

export const whatsappClient = new WhatsAppClient({
  token: config.WHATSAPP_TOKEN,
  phoneNumberId: config.WHATSAPP_PHONE_NUMBER_ID,
  graphUrl: config.GRAPH_API_URL,
  timeoutMs: config.WHATSAPP_SEND_TIMEOUT_MS,
});
