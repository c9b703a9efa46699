import type { FeatureKey, PlanDefinition, PlanKey } from '../services/entitlements/types';

/**
 * PLAN CATALOG:
 *
 * A plan lists the feature keys a tenant on that plan MAY have enabled.
 * It never turns anything on by itself: flags are switched on by the default
 * template (tenant creation) or by an admin, and enforcement only ever
 * switches disallowed ones off.
 */
export const PLAN_CATALOG: Record<PlanKey, PlanDefinition> = {
  starter: {
    label: 'Starter',
    features: ['F_MARKET_BRIEF', 'F_WHY_MARKET_MOVED', 'F_SEBI_ADVISORY', 'F_CLIENT_AI', 'F_COMPLIANCE_LOG'],
  },
  pro: {
    label: 'Pro',
    features: [
      'F_MARKET_BRIEF',
      'F_WHY_MARKET_MOVED',
      'F_RISK_RADAR',
      'F_CALL_PRIORITY',
      'F_SEBI_ADVISORY',
      'F_CLIENT_AI',
      'F_COMPLIANCE_LOG',
    ],
  },
  elite: {
    label: 'Elite',
    features: [
      'F_MARKET_BRIEF',
      'F_WHY_MARKET_MOVED',
      'F_RISK_RADAR',
      'F_CALL_PRIORITY',
      'F_SEBI_ADVISORY',
      'F_CLIENT_AI',
      'F_CALL_AI',
      'F_VOICE_REPLY',
      'F_COMPLIANCE_LOG',
    ],
  },
  enterprise: {
    label: 'Enterprise',
    features: [
      'F_MARKET_BRIEF',
      'F_WHY_MARKET_MOVED',
      'F_RISK_RADAR',
      'F_CALL_PRIORITY',
      'F_SEBI_ADVISORY',
      'F_CLIENT_AI',
      'F_CALL_AI',
      'F_VOICE_REPLY',
      'F_COMPLIANCE_LOG',
    ],
  },
};

// Cheapest first; used to name the tier a locked feature needs.
export const PLAN_ORDER: readonly PlanKey[] = ['starter', 'pro', 'elite', 'enterprise'];

export const DEFAULT_PLAN: PlanKey = 'starter';

// Seeded for every new tenant (missing rows only).
export const DEFAULT_FLAGS: Record<FeatureKey, boolean> = {
  F_MARKET_BRIEF: true,
  F_WHY_MARKET_MOVED: true,
  F_SEBI_ADVISORY: true,
  F_CLIENT_AI: true,
  F_COMPLIANCE_LOG: true,
  F_RISK_RADAR: false,
  F_CALL_PRIORITY: false,
  F_CALL_AI: false,
  F_VOICE_REPLY: false,
};

export const FEATURE_LABELS: Record<FeatureKey, string> = {
  F_MARKET_BRIEF: 'Market Brief',
  F_WHY_MARKET_MOVED: 'Why Market Moved',
  F_RISK_RADAR: 'Risk Radar',
  F_CALL_PRIORITY: 'Call Priority',
  F_SEBI_ADVISORY: 'SEBI Advisory Generator',
  F_CLIENT_AI: 'Client Query Assistant',
  F_CALL_AI: 'Call AI summaries',
  F_VOICE_REPLY: 'Voice Replies',
  F_COMPLIANCE_LOG: 'Compliance Log',
};

// Freeze catalog objects to prevent accidental mutation (dev/test safety)
if (process.env.NODE_ENV !== 'production') {
  Object.values(PLAN_CATALOG).forEach((plan) => Object.freeze(plan));
  Object.freeze(PLAN_CATALOG);
  Object.freeze(DEFAULT_FLAGS);
}
