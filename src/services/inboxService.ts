import type { Agent, Conversation, ConversationMessage, ConversationMode, DeliveryStatus } from '../infrastructure/schema';
import { logger } from '../infrastructure/logger';
import { conversationRepository, type ConversationListItem } from '../repositories/conversationRepository';
import { messageLogRepository } from '../repositories/messageLogRepository';
import { AppError } from '../utils/appError';
import { flagStore } from './entitlements/flagStore';
import type { NormalizedInbound, SendResult } from './whatsapp/types';
import { deliveryStatus, whatsappClient } from './whatsapp/whatsappClient';

export type ConversationThread = {
  conversation: Conversation;
  messages: ConversationMessage[];
};

async function requireConversation(tenantId: number, conversationId: number): Promise<Conversation> {
  const conversation = await conversationRepository.findForTenant(tenantId, conversationId);
  if (!conversation) {
    throw new AppError(404, 'CONVERSATION_NOT_FOUND', 'Conversation not found');
  }
  return conversation;
}

// Single ownership rule: an assigned conversation belongs to its assignee (admins excepted).
function canActOn(conversation: Conversation, agent: Agent): boolean {
  return agent.role === 'admin' || conversation.assignedAgentId === null || conversation.assignedAgentId === agent.id;
}

export const inboxService = {
  async recordInbound(tenantId: number, inbound: NormalizedInbound): Promise<Conversation> {
    const conversation = await conversationRepository.upsertForCustomer(tenantId, inbound.waFrom, inbound.customerName);
    await conversationRepository.addMessage({
      conversationId: conversation.id,
      direction: 'inbound',
      author: 'customer',
      body: inbound.body,
    });
    return conversation;
  },

  async recordOutbound(
    conversationId: number,
    author: 'bot' | 'ai',
    body: string,
    delivery: DeliveryStatus
  ): Promise<ConversationMessage> {
    return conversationRepository.addMessage({ conversationId, direction: 'outbound', author, body, delivery });
  },

  async listConversations(tenantId: number): Promise<ConversationListItem[]> {
    return conversationRepository.listForTenant(tenantId);
  },

  async getThread(tenantId: number, conversationId: number): Promise<ConversationThread> {
    const conversation = await requireConversation(tenantId, conversationId);
    const messages = await conversationRepository.listMessages(conversation.id);
    return { conversation, messages };
  },

  // Forces human mode and takes ownership, even from another agent.
  async assignToMe(agent: Agent, conversationId: number): Promise<Conversation> {
    await requireConversation(agent.tenantId, conversationId);
    const updated = await conversationRepository.updateMode(conversationId, {
      mode: 'human',
      assignedAgentId: agent.id,
    });
    if (!updated) throw new AppError(404, 'CONVERSATION_NOT_FOUND', 'Conversation not found');
    logger.info({ event: 'inbox.assigned', conversationId, agentId: agent.id }, 'Conversation assigned');
    return updated;
  },

  /**
   * Sets the mode directly. Handing back to `ai` releases the assignee so the
   * bot owns the conversation again.
   */
  async setMode(agent: Agent, conversationId: number, mode: ConversationMode): Promise<Conversation> {
    const conversation = await requireConversation(agent.tenantId, conversationId);
    if (!canActOn(conversation, agent)) {
      throw new AppError(403, 'CONVERSATION_OWNED', 'Conversation is assigned to another agent');
    }

    const updated = await conversationRepository.updateMode(
      conversationId,
      mode === 'ai' ? { mode, assignedAgentId: null } : { mode }
    );
    if (!updated) throw new AppError(404, 'CONVERSATION_NOT_FOUND', 'Conversation not found');
    logger.info({ event: 'inbox.mode_changed', conversationId, agentId: agent.id, mode }, 'Conversation mode changed');
    return updated;
  },

  async replyAsAgent(
    agent: Agent,
    conversationId: number,
    body: string
  ): Promise<{ message: ConversationMessage; send: SendResult }> {
    const conversation = await requireConversation(agent.tenantId, conversationId);
    if (conversation.mode !== 'human' || !canActOn(conversation, agent)) {
      throw new AppError(409, 'NOT_ASSIGNED', 'Assign the conversation to yourself before replying');
    }

    const send = await whatsappClient.sendText(conversation.waId, body);
    const message = await conversationRepository.addMessage({
      conversationId,
      direction: 'outbound',
      author: 'agent',
      agentId: agent.id,
      body,
      delivery: deliveryStatus(send),
    });

    // The compliance log only holds messages the provider accepted.
    if (send.ok && (await flagStore.isEnabled(agent.tenantId, 'F_COMPLIANCE_LOG'))) {
      await messageLogRepository.create({
        tenantId: agent.tenantId,
        waFrom: null,
        waTo: conversation.waId,
        direction: 'outbound',
        message: body,
      });
    }

    return { message, send };
  },
};
