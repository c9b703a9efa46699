import { index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';

// Column layout mirrors migrations/*.sql; keep both in step.

const createdAt = () =>
  integer('created_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date());

export const tenants = sqliteTable('tenants', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().default('Unnamed Tenant'),
  whatsappNumber: text('whatsapp_number'),
  plan: text('plan').notNull().default('starter'),
  createdAt: createdAt(),
});

export const featureFlags = sqliteTable(
  'feature_flags',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    tenantId: integer('tenant_id')
      .notNull()
      .references(() => tenants.id),
    flagKey: text('flag_key').notNull(),
    enabled: integer('enabled', { mode: 'boolean' }).notNull().default(false),
  },
  (t) => ({
    tenantKeyUq: uniqueIndex('feature_flags_tenant_key_uq').on(t.tenantId, t.flagKey),
  })
);

export const messageLogs = sqliteTable(
  'message_logs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    tenantId: integer('tenant_id').notNull(),
    waFrom: text('wa_from'),
    waTo: text('wa_to'),
    direction: text('direction', { enum: ['inbound', 'outbound'] }).notNull(),
    message: text('message').notNull(),
    createdAt: createdAt(),
  },
  (t) => ({
    tenantIdx: index('message_logs_tenant_idx').on(t.tenantId),
  })
);

export const agents = sqliteTable(
  'agents',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    tenantId: integer('tenant_id')
      .notNull()
      .references(() => tenants.id),
    email: text('email').notNull(),
    displayName: text('display_name').notNull(),
    passwordHash: text('password_hash').notNull(),
    role: text('role', { enum: ['admin', 'agent'] }).notNull().default('agent'),
    createdAt: createdAt(),
  },
  (t) => ({
    emailUq: uniqueIndex('agents_email_uq').on(t.email),
  })
);

export const conversations = sqliteTable(
  'conversations',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    tenantId: integer('tenant_id')
      .notNull()
      .references(() => tenants.id),
    waId: text('wa_id').notNull(),
    customerName: text('customer_name'),
    mode: text('mode', { enum: ['ai', 'human'] }).notNull().default('ai'),
    assignedAgentId: integer('assigned_agent_id').references(() => agents.id),
    lastMessageAt: integer('last_message_at', { mode: 'timestamp_ms' }),
    createdAt: createdAt(),
  },
  (t) => ({
    tenantWaUq: uniqueIndex('conversations_tenant_wa_uq').on(t.tenantId, t.waId),
  })
);

export const conversationMessages = sqliteTable(
  'conversation_messages',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    conversationId: integer('conversation_id')
      .notNull()
      .references(() => conversations.id),
    direction: text('direction', { enum: ['inbound', 'outbound'] }).notNull(),
    author: text('author', { enum: ['customer', 'bot', 'ai', 'agent'] }).notNull(),
    agentId: integer('agent_id').references(() => agents.id),
    body: text('body').notNull(),
    delivery: text('delivery', { enum: ['sent', 'skipped', 'failed'] }),
    createdAt: createdAt(),
  },
  (t) => ({
    conversationIdx: index('conversation_messages_conv_idx').on(t.conversationId),
  })
);

export type Tenant = typeof tenants.$inferSelect;
export type FeatureFlag = typeof featureFlags.$inferSelect;
export type MessageLog = typeof messageLogs.$inferSelect;
export type Agent = typeof agents.$inferSelect;
export type Conversation = typeof conversations.$inferSelect;
export type ConversationMessage = typeof conversationMessages.$inferSelect;

export type ConversationMode = Conversation['mode'];
export type MessageDirection = MessageLog['direction'];
export type MessageAuthor = ConversationMessage['author'];
export type DeliveryStatus = NonNullable<ConversationMessage['delivery']>;
export type AgentRole = Agent['role'];
