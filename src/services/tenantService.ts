import { DEFAULT_PLAN } from '../config/plans';
import { tenantRepository } from '../repositories/tenantRepository';
import type { Tenant } from '../infrastructure/schema';
import { AppError } from '../utils/appError';
import { logger } from '../infrastructure/logger';
import { enforcePlan } from './entitlements/enforcementService';
import { flagStore } from './entitlements/flagStore';
import { normalizePlan } from './entitlements/planFeatures';
import type { EnforcementResult } from './entitlements/types';

export type CreateTenantParams = {
  name: string;
  plan?: string;
  whatsappNumber?: string | null;
};

// Admin form checkboxes and query strings all land here.
const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function parseEnabled(value: string | boolean | undefined): boolean {
  if (typeof value === 'boolean') return value;
  return TRUTHY.has((value ?? '').trim().toLowerCase());
}

async function requireTenant(tenantId: number): Promise<Tenant> {
  const tenant = await tenantRepository.findById(tenantId);
  if (!tenant) {
    throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found');
  }
  return tenant;
}

export const tenantService = {
  async createTenant(params: CreateTenantParams): Promise<{ tenant: Tenant; enforcement: EnforcementResult }> {
    const tenant = await tenantRepository.create({
      name: params.name,
      plan: normalizePlan(params.plan),
      whatsappNumber: params.whatsappNumber || null,
    });
    await flagStore.seedDefaults(tenant.id);
    const enforcement = await enforcePlan(tenant.id);
    logger.info({ event: 'tenant.created', tenantId: tenant.id, plan: tenant.plan }, 'Tenant created');
    return { tenant, enforcement };
  },

  /**
   * Returns the tenant, creating it (plan starter, default flags) when it has
   * never been seen. Used for the configured default tenant.
   */
  async ensureTenant(tenantId: number): Promise<Tenant> {
    const existing = await tenantRepository.findById(tenantId);
    if (existing) return existing;

    const tenant = await tenantRepository.create({ id: tenantId, name: 'Default Tenant', plan: DEFAULT_PLAN });
    await flagStore.seedDefaults(tenant.id);
    logger.info({ event: 'tenant.default_created', tenantId }, 'Default tenant created');
    return tenant;
  },

  async setPlan(tenantId: number, plan: string): Promise<EnforcementResult> {
    await requireTenant(tenantId);
    const normalized = normalizePlan(plan);
    await tenantRepository.updatePlan(tenantId, normalized);
    const enforcement = await enforcePlan(tenantId);
    logger.info(
      { event: 'tenant.plan_changed', tenantId, plan: normalized, disabled: enforcement.disabled },
      'Tenant plan changed'
    );
    return enforcement;
  },

  /**
   * Unknown tenants are not an error here: nothing is written (a flag row needs
   * its tenant) and the empty no-op enforcement result comes back.
   */
  async setFlag(tenantId: number, flagKey: string, enabled: boolean): Promise<EnforcementResult> {
    const tenant = await tenantRepository.findById(tenantId);
    if (!tenant) {
      logger.warn({ event: 'tenant.flag_skipped', tenantId, flagKey }, 'Flag change for unknown tenant ignored');
      return enforcePlan(tenantId);
    }
    await flagStore.set(tenantId, flagKey, enabled);
    const enforcement = await enforcePlan(tenantId);
    logger.info(
      { event: 'tenant.flag_changed', tenantId, flagKey, requested: enabled, effective: enforcement.flags[flagKey] },
      'Tenant flag changed'
    );
    return enforcement;
  },

  async listTenants(): Promise<Tenant[]> {
    return tenantRepository.list();
  },
};
