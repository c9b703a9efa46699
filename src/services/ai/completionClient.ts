/**
 * Completion Client
 *
 * Calls an OpenAI-compatible chat completions endpoint with raw fetch().
 * One request per call, fixed timeout, no retry; callers decide what to send
 * when it throws.
 */

import { z } from 'zod';
import { config } from '../../config/env';
import type { ChatTurn } from './conversationHistory';

export interface CompletionProvider {
  readonly name: string;
  complete(system: string, turns: ChatTurn[]): Promise<string>;
}

export type CompletionClientOptions = {
  apiUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
};

const CompletionResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).passthrough() }).passthrough())
    .min(1),
});

export const ASSISTANT_SYSTEM_PROMPT =
  'You are a client query assistant for an Indian stock broker, replying on WhatsApp. ' +
  'Keep answers short and plain. Never promise returns or give guaranteed outcomes; ' +
  'remind the reader that investments are market-linked and subject to risk.';

export class CompletionClient implements CompletionProvider {
  readonly name: string;
  private readonly options: CompletionClientOptions;

  constructor(options: CompletionClientOptions) {
    this.options = options;
    this.name = `completion:${options.model}`;
  }

  async complete(system: string, turns: ChatTurn[]): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const res = await fetch(this.options.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: this.options.model,
          messages: [{ role: 'system', content: system }, ...turns],
          temperature: 0.2,
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const errorBody = await res.text().catch(() => '');
        throw new Error(`Completion API error (${res.status}): ${errorBody.slice(0, 200)}`);
      }

      const parsed = CompletionResponseSchema.safeParse(await res.json());
      const content = parsed.success ? parsed.data.choices[0].message.content : null;
      if (typeof content !== 'string' || !content.trim()) {
        throw new Error('Completion API returned an unexpected response shape');
      }

      return content.trim();
    } finally {
      clearTimeout(timeout);
    }
  }
}

// null while no API key is configured: free text then gets the menu fallback.
export const completionClient: CompletionProvider | null = config.LLM_API_KEY
  ? new CompletionClient({
      apiUrl: config.LLM_API_URL,
      apiKey: config.LLM_API_KEY,
      model: config.LLM_MODEL,
      timeoutMs: config.LLM_TIMEOUT_MS,
    })
  : null;
