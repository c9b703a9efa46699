import { DEFAULT_FLAGS } from '../../config/plans';
import { featureFlagRepository } from '../../repositories/featureFlagRepository';
import type { FlagMap } from './types';

/**
 * Per-tenant flag persistence. Every call goes to the database: there is no
 * in-process cache, so a write is visible to the next read from any request.
 */
export const flagStore = {
  async get(tenantId: number): Promise<FlagMap> {
    const rows = await featureFlagRepository.listForTenant(tenantId);
    const flags: FlagMap = {};
    for (const row of rows) {
      flags[row.flagKey] = row.enabled;
    }
    return flags;
  },

  async set(tenantId: number, flagKey: string, enabled: boolean): Promise<void> {
    await featureFlagRepository.upsert(tenantId, flagKey, enabled);
  },

  async isEnabled(tenantId: number, flagKey: string): Promise<boolean> {
    const row = await featureFlagRepository.findOne(tenantId, flagKey);
    return row?.enabled ?? false;
  },

  async seedDefaults(tenantId: number): Promise<number> {
    return featureFlagRepository.insertMissing(tenantId, DEFAULT_FLAGS);
  },
};

export function isFlagOn(flags: FlagMap, flagKey: string): boolean {
  return flags[flagKey] === true;
}
