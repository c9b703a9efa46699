import { featureFlagRepository } from '../../repositories/featureFlagRepository';
import { tenantRepository } from '../../repositories/tenantRepository';
import { isAllowedOnPlan, normalizePlan } from './planFeatures';
import type { EnforcementResult, FlagMap } from './types';

/**
 * Switches off every enabled flag the tenant's plan does not allow.
 *
 * Only ever disables: a flag the plan would allow but that is currently off
 * stays off. Nothing is written when nothing changes, so back-to-back passes
 * are idempotent. An unknown tenant yields an empty map and no writes.
 */
export async function enforcePlan(tenantId: number): Promise<EnforcementResult> {
  const tenant = await tenantRepository.findById(tenantId);
  if (!tenant) {
    return { tenantId, plan: null, flags: {}, disabled: [] };
  }

  const plan = normalizePlan(tenant.plan);
  const rows = await featureFlagRepository.listForTenant(tenantId);

  const flags: FlagMap = {};
  const disabled: string[] = [];
  for (const row of rows) {
    if (row.enabled && !isAllowedOnPlan(plan, row.flagKey)) {
      disabled.push(row.flagKey);
      flags[row.flagKey] = false;
    } else {
      flags[row.flagKey] = row.enabled;
    }
  }

  if (disabled.length > 0) {
    await featureFlagRepository.disableMany(tenantId, disabled);
  }

  return { tenantId, plan, flags, disabled };
}
