import { FEATURE_LABELS, PLAN_CATALOG } from '../../config/plans';
import { requiredTierFor } from '../entitlements/planFeatures';
import type { FeatureKey } from '../entitlements/types';

export type FeatureCommand = {
  feature: FeatureKey;
  body: string;
};

// List-row ids that serve a gated feature; matched exactly.
export const FEATURE_COMMANDS: ReadonlyMap<string, FeatureCommand> = new Map<string, FeatureCommand>([
  [
    'MARKET_BRIEF',
    {
      feature: 'F_MARKET_BRIEF',
      body: '📌 Market Brief (demo)\n• NIFTY: -0.42%\n• BANKNIFTY: Weak\n• FII: Net sellers\n\n(Connect live data feed next)',
    },
  ],
  [
    'WHY_MARKET_MOVED',
    {
      feature: 'F_WHY_MARKET_MOVED',
      body: '🧠 Why Market Moved (demo)\nOI unwinding + global yield move.\n(Connect news + derivatives feed next)',
    },
  ],
  [
    'RISK_ALERTS',
    {
      feature: 'F_RISK_RADAR',
      body: '🔴 Risk Alerts (demo)\n• Client A: high margin usage\n• Client B: panic pattern\n(Connect client trades next)',
    },
  ],
  [
    'CALL_PRIORITY',
    {
      feature: 'F_CALL_PRIORITY',
      body: '📞 Priority Calls (demo)\n1) Client X — drawdown\n2) Client Y — expiry risk\n3) Client Z — panic history',
    },
  ],
  [
    'SEBI_ADVISORY',
    {
      feature: 'F_SEBI_ADVISORY',
      body: '✅ Paste the message you want to rewrite in SEBI-safe language (demo).',
    },
  ],
  [
    'CLIENT_AI',
    {
      feature: 'F_CLIENT_AI',
      body: "🤖 Client Query Assistant (demo)\nAsk like: 'Reliance ka kya karu?'\n(Connect portfolio + risk profile next)",
    },
  ],
  [
    'CALL_SUMMARY',
    {
      feature: 'F_CALL_AI',
      body: '📞 Call Summary (demo)\nEmotion: anxious\nRisky promises: none\nFollow-up: suggested',
    },
  ],
]);

// Compared lower-cased, so the SETTINGS row id matches too.
export const SETTINGS_COMMANDS: ReadonlySet<string> = new Set(['settings', 'upgrade']);

// Literal, case-insensitive substring match; not a classifier.
export const RISK_PHRASES: readonly string[] = ['guarantee', 'guaranteed returns', 'sure', '100%', 'fixed return'];
export const RISK_MIN_LENGTH = 15;

export const COMPLIANCE_REWRITE =
  '✅ SEBI-safe version:\n“This is market-linked and subject to risk. Please consider your risk profile before investing.”\n\n(Connect your exact templates next)';

export const FALLBACK_REPLY = "Reply 'Menu' to see options.";

// Labels that read as plurals ("Call AI summaries are ...").
const PLURAL_LABELS: ReadonlySet<FeatureKey> = new Set(['F_CALL_AI', 'F_VOICE_REPLY']);

export function lockedReply(feature: FeatureKey): string {
  const tier = requiredTierFor(feature);
  const label = FEATURE_LABELS[feature];
  const verb = PLURAL_LABELS.has(feature) ? 'are' : 'is';
  if (tier === 'starter') {
    return `🔒 ${label} ${verb} not enabled on your plan.`;
  }
  const tierLabel = PLAN_CATALOG[tier].label;
  const article = /^[aeiou]/i.test(tierLabel) ? 'an' : 'a';
  return `🔒 ${label} ${verb} ${article} ${tierLabel} feature. Reply 'Upgrade' to enable.`;
}

export function settingsReply(plan: string, enabledKeys: string[]): string {
  const enabled = enabledKeys.map((key) => key.replace(/^F_/, ''));
  return `⚙️ Current Plan: ${plan}\nEnabled: ${enabled.length > 0 ? enabled.join(', ') : '(none)'}\n\nAdmin can upgrade from dashboard.`;
}
