import { eq } from 'drizzle-orm';
import { getDb } from '../infrastructure/db';
import { agents, type Agent, type AgentRole } from '../infrastructure/schema';

export type CreateAgentInput = {
  tenantId: number;
  email: string;
  displayName: string;
  passwordHash: string;
  role: AgentRole;
};

export const agentRepository = {
  async create(data: CreateAgentInput): Promise<Agent> {
    return getDb().insert(agents).values(data).returning().get();
  },

  async findById(id: number): Promise<Agent | null> {
    return getDb().select().from(agents).where(eq(agents.id, id)).get() ?? null;
  },

  async findByEmail(email: string): Promise<Agent | null> {
    return getDb().select().from(agents).where(eq(agents.email, email)).get() ?? null;
  },
};
