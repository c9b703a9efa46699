import { and, asc, desc, eq } from 'drizzle-orm';
import { getDb } from '../infrastructure/db';
import {
  agents,
  conversationMessages,
  conversations,
  type Conversation,
  type ConversationMessage,
  type ConversationMode,
  type DeliveryStatus,
  type MessageAuthor,
  type MessageDirection,
} from '../infrastructure/schema';

export type ConversationListItem = Conversation & { assignedAgentName: string | null };

export type AddMessageInput = {
  conversationId: number;
  direction: MessageDirection;
  author: MessageAuthor;
  agentId?: number | null;
  body: string;
  delivery?: DeliveryStatus | null;
};

export const conversationRepository = {
  async upsertForCustomer(tenantId: number, waId: string, customerName: string | null): Promise<Conversation> {
    const now = new Date();
    return getDb()
      .insert(conversations)
      .values({ tenantId, waId, customerName, lastMessageAt: now })
      .onConflictDoUpdate({
        target: [conversations.tenantId, conversations.waId],
        // Keep a previously captured name when the provider omits the profile.
        set: customerName ? { customerName, lastMessageAt: now } : { lastMessageAt: now },
      })
      .returning()
      .get();
  },

  async findById(id: number): Promise<Conversation | null> {
    return getDb().select().from(conversations).where(eq(conversations.id, id)).get() ?? null;
  },

  async listForTenant(tenantId: number): Promise<ConversationListItem[]> {
    const rows = getDb()
      .select({ conversation: conversations, assignedAgentName: agents.displayName })
      .from(conversations)
      .leftJoin(agents, eq(agents.id, conversations.assignedAgentId))
      .where(eq(conversations.tenantId, tenantId))
      .orderBy(desc(conversations.lastMessageAt), desc(conversations.id))
      .all();
    return rows.map((row) => ({ ...row.conversation, assignedAgentName: row.assignedAgentName }));
  },

  async updateMode(
    id: number,
    data: { mode: ConversationMode; assignedAgentId?: number | null }
  ): Promise<Conversation | null> {
    return getDb()
      .update(conversations)
      .set(data)
      .where(eq(conversations.id, id))
      .returning()
      .get() ?? null;
  },

  async addMessage(data: AddMessageInput): Promise<ConversationMessage> {
    const db = getDb();
    const message = db
      .insert(conversationMessages)
      .values({ ...data, agentId: data.agentId ?? null, delivery: data.delivery ?? null })
      .returning()
      .get();
    db.update(conversations)
      .set({ lastMessageAt: message.createdAt })
      .where(eq(conversations.id, data.conversationId))
      .run();
    return message;
  },

  async listMessages(conversationId: number): Promise<ConversationMessage[]> {
    return getDb()
      .select()
      .from(conversationMessages)
      .where(eq(conversationMessages.conversationId, conversationId))
      .orderBy(asc(conversationMessages.id))
      .all();
  },

  async findForTenant(tenantId: number, id: number): Promise<Conversation | null> {
    return (
      getDb()
        .select()
        .from(conversations)
        .where(and(eq(conversations.id, id), eq(conversations.tenantId, tenantId)))
        .get() ?? null
    );
  },
};
