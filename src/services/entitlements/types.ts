import { z } from 'zod';

export const PLAN_KEYS = ['starter', 'pro', 'elite', 'enterprise'] as const;
export type PlanKey = (typeof PLAN_KEYS)[number];

export const FEATURE_KEYS = [
  'F_MARKET_BRIEF',
  'F_WHY_MARKET_MOVED',
  'F_RISK_RADAR',
  'F_CALL_PRIORITY',
  'F_SEBI_ADVISORY',
  'F_CLIENT_AI',
  'F_CALL_AI',
  'F_VOICE_REPLY',
  'F_COMPLIANCE_LOG',
] as const;
export type FeatureKey = (typeof FEATURE_KEYS)[number];

/**
 * Persisted flag state for one tenant, keyed by flag key.
 *
 * Keys never written for the tenant are absent; callers treat absence as
 * disabled. Rows with keys outside FEATURE_KEYS can exist (the admin API
 * stores whatever key it is given) and are always disabled by enforcement.
 */
export type FlagMap = Record<string, boolean>;

export interface PlanDefinition {
  label: string;
  features: readonly FeatureKey[];
}

export interface EnforcementResult {
  tenantId: number;
  plan: PlanKey | null; // null = tenant not found
  flags: FlagMap;
  disabled: string[];
}

export const PlanKeySchema = z.enum(PLAN_KEYS);
export const FeatureKeySchema = z.enum(FEATURE_KEYS);

export function isPlanKey(value: string): value is PlanKey {
  return PlanKeySchema.safeParse(value).success;
}

export function isFeatureKey(value: string): value is FeatureKey {
  return FeatureKeySchema.safeParse(value).success;
}
