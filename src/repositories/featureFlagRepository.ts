import { and, asc, eq, inArray } from 'drizzle-orm';
import { getDb } from '../infrastructure/db';
import { featureFlags, type FeatureFlag } from '../infrastructure/schema';

export const featureFlagRepository = {
  async listForTenant(tenantId: number): Promise<FeatureFlag[]> {
    return getDb()
      .select()
      .from(featureFlags)
      .where(eq(featureFlags.tenantId, tenantId))
      .orderBy(asc(featureFlags.id))
      .all();
  },

  async findOne(tenantId: number, flagKey: string): Promise<FeatureFlag | null> {
    return (
      getDb()
        .select()
        .from(featureFlags)
        .where(and(eq(featureFlags.tenantId, tenantId), eq(featureFlags.flagKey, flagKey)))
        .get() ?? null
    );
  },

  async upsert(tenantId: number, flagKey: string, enabled: boolean): Promise<FeatureFlag> {
    return getDb()
      .insert(featureFlags)
      .values({ tenantId, flagKey, enabled })
      .onConflictDoUpdate({
        target: [featureFlags.tenantId, featureFlags.flagKey],
        set: { enabled },
      })
      .returning()
      .get();
  },

  // Existing rows win; only absent keys are written.
  async insertMissing(tenantId: number, values: Record<string, boolean>): Promise<number> {
    const rows = Object.entries(values).map(([flagKey, enabled]) => ({ tenantId, flagKey, enabled }));
    if (rows.length === 0) return 0;
    const inserted = getDb()
      .insert(featureFlags)
      .values(rows)
      .onConflictDoNothing()
      .returning({ id: featureFlags.id })
      .all();
    return inserted.length;
  },

  // Single statement, so a pass is all-or-nothing.
  async disableMany(tenantId: number, flagKeys: string[]): Promise<number> {
    if (flagKeys.length === 0) return 0;
    const disabled = getDb()
      .update(featureFlags)
      .set({ enabled: false })
      .where(and(eq(featureFlags.tenantId, tenantId), inArray(featureFlags.flagKey, flagKeys)))
      .returning({ id: featureFlags.id })
      .all();
    return disabled.length;
  },
};
