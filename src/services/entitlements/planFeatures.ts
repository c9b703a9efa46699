import { DEFAULT_PLAN, PLAN_CATALOG, PLAN_ORDER } from '../../config/plans';
import { type FeatureKey, type PlanKey, isFeatureKey, isPlanKey } from './types';

const ALLOWED: Record<PlanKey, ReadonlySet<FeatureKey>> = {
  starter: new Set(PLAN_CATALOG.starter.features),
  pro: new Set(PLAN_CATALOG.pro.features),
  elite: new Set(PLAN_CATALOG.elite.features),
  enterprise: new Set(PLAN_CATALOG.enterprise.features),
};

/**
 * Maps any stored or submitted plan name onto the catalog.
 * Case and surrounding whitespace are ignored; anything unrecognised is starter.
 */
export function normalizePlan(plan: string | null | undefined): PlanKey {
  const key = (plan ?? '').trim().toLowerCase();
  return isPlanKey(key) ? key : DEFAULT_PLAN;
}

export function allowedFeatures(plan: string | null | undefined): ReadonlySet<FeatureKey> {
  return ALLOWED[normalizePlan(plan)];
}

export function isAllowedOnPlan(plan: string | null | undefined, flagKey: string): boolean {
  return isFeatureKey(flagKey) && allowedFeatures(plan).has(flagKey);
}

// Cheapest plan whose catalog entry contains the feature.
export function requiredTierFor(feature: FeatureKey): PlanKey {
  return PLAN_ORDER.find((plan) => ALLOWED[plan].has(feature)) ?? 'enterprise';
}
