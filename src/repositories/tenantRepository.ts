import { asc, eq } from 'drizzle-orm';
import { getDb } from '../infrastructure/db';
import { tenants, type Tenant } from '../infrastructure/schema';

export type CreateTenantInput = {
  id?: number;
  name: string;
  plan: string;
  whatsappNumber?: string | null;
};

export const tenantRepository = {
  async create(data: CreateTenantInput): Promise<Tenant> {
    return getDb()
      .insert(tenants)
      .values({
        id: data.id,
        name: data.name,
        plan: data.plan,
        whatsappNumber: data.whatsappNumber ?? null,
      })
      .returning()
      .get();
  },

  async findById(id: number): Promise<Tenant | null> {
    return getDb().select().from(tenants).where(eq(tenants.id, id)).get() ?? null;
  },

  async list(): Promise<Tenant[]> {
    return getDb().select().from(tenants).orderBy(asc(tenants.id)).all();
  },

  async updatePlan(id: number, plan: string): Promise<Tenant | null> {
    return getDb().update(tenants).set({ plan }).where(eq(tenants.id, id)).returning().get() ?? null;
  },
};
