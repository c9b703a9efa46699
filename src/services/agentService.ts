import { config } from '../config/env';
import type { Agent, AgentRole } from '../infrastructure/schema';
import { logger } from '../infrastructure/logger';
import { agentRepository } from '../repositories/agentRepository';
import { AppError } from '../utils/appError';
import { hashPassword, verifyPassword } from '../utils/password';
import { tenantService } from './tenantService';

export type CreateAgentParams = {
  tenantId: number;
  email: string;
  displayName: string;
  password: string;
  role?: AgentRole;
};

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export const agentService = {
  async createAgent(params: CreateAgentParams): Promise<Agent> {
    const email = normalizeEmail(params.email);
    if (await agentRepository.findByEmail(email)) {
      throw new AppError(409, 'AGENT_EXISTS', 'An agent with this email already exists');
    }
    return agentRepository.create({
      tenantId: params.tenantId,
      email,
      displayName: params.displayName,
      passwordHash: await hashPassword(params.password),
      role: params.role ?? 'agent',
    });
  },

  // Same error for unknown email and wrong password.
  async authenticate(email: string, password: string): Promise<Agent> {
    const agent = await agentRepository.findByEmail(normalizeEmail(email));
    if (!agent || !(await verifyPassword(password, agent.passwordHash))) {
      throw new AppError(401, 'INVALID_CREDENTIALS', 'Invalid email or password');
    }
    return agent;
  },

  async findById(id: number): Promise<Agent | null> {
    return agentRepository.findById(id);
  },

  /**
   * Creates the admin agent named by SEED_ADMIN_EMAIL / SEED_ADMIN_PASSWORD
   * for the default tenant, once. Returns null when not configured or
   * already present.
   */
  async seedAdminFromEnv(): Promise<Agent | null> {
    const { SEED_ADMIN_EMAIL, SEED_ADMIN_PASSWORD, DEFAULT_TENANT_ID } = config;
    if (!SEED_ADMIN_EMAIL || !SEED_ADMIN_PASSWORD) return null;
    if (await agentRepository.findByEmail(normalizeEmail(SEED_ADMIN_EMAIL))) return null;

    await tenantService.ensureTenant(DEFAULT_TENANT_ID);
    const agent = await agentService.createAgent({
      tenantId: DEFAULT_TENANT_ID,
      email: SEED_ADMIN_EMAIL,
      displayName: 'Admin',
      password: SEED_ADMIN_PASSWORD,
      role: 'admin',
    });
    logger.info({ event: 'agent.seeded', agentId: agent.id }, 'Seed admin agent created');
    return agent;
  },
};
