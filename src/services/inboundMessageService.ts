import { config } from '../config/env';
import { DEFAULT_PLAN } from '../config/plans';
import { logger } from '../infrastructure/logger';
import { messageLogRepository } from '../repositories/messageLogRepository';
import { ASSISTANT_SYSTEM_PROMPT, type CompletionProvider, completionClient } from './ai/completionClient';
import { ConversationHistoryStore } from './ai/conversationHistory';
import { type OutboundReply, routeCommand } from './bot/messageRouter';
import { enforcePlan } from './entitlements/enforcementService';
import { isFlagOn } from './entitlements/flagStore';
import type { FlagMap } from './entitlements/types';
import { inboxService } from './inboxService';
import { tenantService } from './tenantService';
import { parseInbound } from './whatsapp/parseInbound';
import type { InteractiveListMessage, NormalizedInbound, SendResult } from './whatsapp/types';
import { deliveryStatus, whatsappClient } from './whatsapp/whatsappClient';

export interface MessageSender {
  sendText(to: string, body: string): Promise<SendResult>;
  sendMenu(to: string, menu: InteractiveListMessage): Promise<SendResult>;
}

export type InboundProcessingError = {
  code: 'EMPTY_COMMAND' | 'PROCESSING_ERROR';
  message: string;
  cause?: unknown;
};

export type InboundOutcome =
  | { status: 'ignored'; reason: 'NO_MESSAGE' }
  | { status: 'handed_off'; conversationId: number }
  | { status: 'replied'; conversationId: number; reply: OutboundReply; send: SendResult }
  | { status: 'failed'; error: InboundProcessingError };

export type InboundMessageServiceDeps = {
  tenantId: number;
  sender: MessageSender;
  completion: CompletionProvider | null;
  history: ConversationHistoryStore;
};

// What the compliance log and the inbox record for a menu send.
const MENU_SENT = 'MENU_SENT';

/**
 * Inbound pipeline: parse → enforce → log → inbox → mode check → route →
 * optional completion → send.
 *
 * Never throws. Anything that goes wrong comes back as `status: 'failed'` so
 * the webhook boundary can acknowledge the provider and report the error.
 */
export class InboundMessageService {
  private readonly deps: InboundMessageServiceDeps;

  constructor(deps: InboundMessageServiceDeps) {
    this.deps = deps;
  }

  async handle(payload: unknown): Promise<InboundOutcome> {
    const inbound = parseInbound(payload);
    // Status callbacks and unsupported message types: no reads, no writes.
    if (!inbound) {
      return { status: 'ignored', reason: 'NO_MESSAGE' };
    }

    try {
      return await this.process(inbound);
    } catch (err) {
      return {
        status: 'failed',
        error: {
          code: 'PROCESSING_ERROR',
          message: err instanceof Error ? err.message : String(err),
          cause: err,
        },
      };
    }
  }

  private async process(inbound: NormalizedInbound): Promise<InboundOutcome> {
    const { tenantId } = this.deps;

    await tenantService.ensureTenant(tenantId);
    // Re-validated on every message, not only after admin mutations.
    const enforcement = await enforcePlan(tenantId);
    const flags = enforcement.flags;
    const complianceLog = isFlagOn(flags, 'F_COMPLIANCE_LOG');

    if (complianceLog) {
      await messageLogRepository.create({
        tenantId,
        waFrom: inbound.waFrom,
        waTo: inbound.waTo,
        direction: 'inbound',
        message: inbound.body,
      });
    }

    const conversation = await inboxService.recordInbound(tenantId, inbound);
    if (conversation.mode === 'human') {
      logger.info(
        { event: 'inbound.handed_off', conversationId: conversation.id, assignedAgentId: conversation.assignedAgentId },
        'Conversation in human mode; no auto-reply'
      );
      return { status: 'handed_off', conversationId: conversation.id };
    }

    const routed = routeCommand({ plan: enforcement.plan ?? DEFAULT_PLAN, flags }, inbound.body);
    if (!routed.ok) {
      return { status: 'failed', error: routed.error };
    }

    const reply = await this.maybeAnswerWithAi(inbound, flags, routed.reply);

    let send: SendResult;
    let recorded: string;
    if (reply.type === 'menu') {
      send = await this.deps.sender.sendMenu(inbound.waFrom, reply.message);
      recorded = MENU_SENT;
    } else {
      send = await this.deps.sender.sendText(inbound.waFrom, reply.body);
      recorded = reply.body;
    }

    await inboxService.recordOutbound(
      conversation.id,
      reply.type === 'text' && reply.kind === 'ai_answer' ? 'ai' : 'bot',
      recorded,
      deliveryStatus(send)
    );

    if (complianceLog && send.ok) {
      await messageLogRepository.create({
        tenantId,
        waFrom: inbound.waFrom,
        waTo: inbound.waTo,
        direction: 'outbound',
        message: recorded,
      });
    }

    return { status: 'replied', conversationId: conversation.id, reply, send };
  }

  /**
   * Free text the router could not place goes to the completion API when one
   * is configured and the tenant has the client assistant enabled. Any
   * completion failure keeps the router's fallback reply.
   */
  private async maybeAnswerWithAi(
    inbound: NormalizedInbound,
    flags: FlagMap,
    reply: OutboundReply
  ): Promise<OutboundReply> {
    const { completion, history, tenantId } = this.deps;
    if (
      !completion ||
      reply.type !== 'text' ||
      reply.kind !== 'fallback' ||
      inbound.messageType !== 'text' ||
      !isFlagOn(flags, 'F_CLIENT_AI')
    ) {
      return reply;
    }

    const historyKey = `${tenantId}:${inbound.waFrom}`;
    const userTurn = { role: 'user' as const, content: inbound.body };

    try {
      const answer = await completion.complete(ASSISTANT_SYSTEM_PROMPT, [...history.get(historyKey), userTurn]);
      history.append(historyKey, userTurn, { role: 'assistant', content: answer });
      return { type: 'text', kind: 'ai_answer', body: answer, feature: 'F_CLIENT_AI' };
    } catch (err) {
      logger.warn(
        { event: 'completion.failed', provider: completion.name, err: err instanceof Error ? err.message : String(err) },
        'Completion failed; sending fallback reply'
      );
      return reply;
    }
  }
}

export const inboundMessageService = new InboundMessageService({
  tenantId: config.DEFAULT_TENANT_ID,
  sender: whatsappClient,
  completion: completionClient,
  history: new ConversationHistoryStore({
    maxUsers: config.LLM_HISTORY_MAX_USERS,
    maxTurns: config.LLM_HISTORY_MAX_TURNS,
  }),
});
