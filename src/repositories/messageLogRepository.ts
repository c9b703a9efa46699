import { asc, count, eq, max } from 'drizzle-orm';
import { getDb } from '../infrastructure/db';
import { messageLogs, type MessageDirection, type MessageLog } from '../infrastructure/schema';

export type LogMessageInput = {
  tenantId: number;
  waFrom: string | null;
  waTo: string | null;
  direction: MessageDirection;
  message: string;
};

export const messageLogRepository = {
  async create(data: LogMessageInput): Promise<MessageLog> {
    return getDb().insert(messageLogs).values(data).returning().get();
  },

  async listForTenant(tenantId: number): Promise<MessageLog[]> {
    return getDb()
      .select()
      .from(messageLogs)
      .where(eq(messageLogs.tenantId, tenantId))
      .orderBy(asc(messageLogs.id))
      .all();
  },

  async statsForTenant(tenantId: number): Promise<{ count: number; lastAt: Date | null }> {
    const row = getDb()
      .select({ count: count(messageLogs.id), lastAt: max(messageLogs.createdAt) })
      .from(messageLogs)
      .where(eq(messageLogs.tenantId, tenantId))
      .get();
    return { count: row?.count ?? 0, lastAt: row?.lastAt ?? null };
  },
};
