import { z } from 'zod';

// Cloud API text limit; longer bodies are cut before sending.
export const WHATSAPP_TEXT_LIMIT = 4096;

export interface InteractiveListRow {
  id: string;
  title: string;
  description?: string;
}

export interface InteractiveListMessage {
  type: 'interactive';
  interactive: {
    type: 'list';
    header: { type: 'text'; text: string };
    body: { text: string };
    footer: { text: string };
    action: {
      button: string;
      sections: Array<{ title: string; rows: InteractiveListRow[] }>;
    };
  };
}

export type NormalizedInbound = {
  messageId: string | null;
  waFrom: string;
  waTo: string | null;
  customerName: string | null;
  messageType: 'text' | 'list_reply' | 'button_reply';
  // Trimmed text, or the selected list/button id.
  body: string;
};

export type SendResult =
  | { ok: true; skipped: false; messageId: string | null }
  | { ok: true; skipped: true; reason: 'NOT_CONFIGURED' }
  | { ok: false; status: number | null; error: string };

// Inbound webhook payload. Only the fields the bot reads are modelled;
// everything else passes through untouched.
const InboundMessageSchema = z
  .object({
    id: z.string().optional(),
    from: z.string().optional(),
    type: z.string().optional(),
    text: z.object({ body: z.string() }).partial().optional(),
    interactive: z
      .object({
        type: z.string().optional(),
        list_reply: z.object({ id: z.string(), title: z.string().optional() }).optional(),
        button_reply: z.object({ id: z.string(), title: z.string().optional() }).optional(),
      })
      .optional(),
  })
  .passthrough();

const ChangeValueSchema = z
  .object({
    messages: z.array(InboundMessageSchema).optional(),
    metadata: z
      .object({
        display_phone_number: z.string().optional(),
        phone_number_id: z.string().optional(),
      })
      .passthrough()
      .optional(),
    contacts: z
      .array(
        z
          .object({
            wa_id: z.string().optional(),
            profile: z.object({ name: z.string().optional() }).optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

export const WebhookPayloadSchema = z
  .object({
    object: z.string().optional(),
    entry: z.array(
      z
        .object({
          changes: z.array(z.object({ value: ChangeValueSchema }).passthrough()),
        })
        .passthrough()
    ),
  })
  .passthrough();

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

export const VerifyQuerySchema = z.object({
  'hub.mode': z.string().optional(),
  'hub.verify_token': z.string().optional(),
  'hub.challenge': z.string().optional(),
});
