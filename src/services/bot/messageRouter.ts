import { isFlagOn } from '../entitlements/flagStore';
import type { FeatureKey, FlagMap, PlanKey } from '../entitlements/types';
import type { InteractiveListMessage } from '../whatsapp/types';
import { MENU_KEYWORDS, MENU_MESSAGE } from './menu';
import {
  COMPLIANCE_REWRITE,
  FALLBACK_REPLY,
  FEATURE_COMMANDS,
  RISK_MIN_LENGTH,
  RISK_PHRASES,
  SETTINGS_COMMANDS,
  lockedReply,
  settingsReply,
} from './replies';

// 'ai_answer' is produced downstream of the router, by the completion step.
export type TextReplyKind = 'feature' | 'locked' | 'settings' | 'compliance_rewrite' | 'fallback' | 'ai_answer';

export type OutboundReply =
  | { type: 'menu'; message: InteractiveListMessage }
  | { type: 'text'; kind: TextReplyKind; body: string; feature?: FeatureKey };

export type RouteError = { code: 'EMPTY_COMMAND'; message: string };

export type RouteResult = { ok: true; reply: OutboundReply } | { ok: false; error: RouteError };

export type RouteContext = {
  plan: PlanKey;
  // Already enforced; the router never reads the store itself.
  flags: FlagMap;
};

export function containsRiskLanguage(body: string): boolean {
  const lower = body.toLowerCase();
  return RISK_PHRASES.some((phrase) => lower.includes(phrase));
}

/**
 * Maps a normalized command (list-row id, keyword or free text) to a reply.
 * Pure: same context and command always give the same result.
 */
export function routeCommand(ctx: RouteContext, command: string): RouteResult {
  const body = command.trim();
  if (!body) {
    return { ok: false, error: { code: 'EMPTY_COMMAND', message: 'Inbound message has no routable text' } };
  }

  if (MENU_KEYWORDS.has(body.toLowerCase())) {
    return { ok: true, reply: { type: 'menu', message: MENU_MESSAGE } };
  }

  const featureCommand = FEATURE_COMMANDS.get(body);
  if (featureCommand) {
    const { feature } = featureCommand;
    if (!isFlagOn(ctx.flags, feature)) {
      return { ok: true, reply: { type: 'text', kind: 'locked', body: lockedReply(feature), feature } };
    }
    return { ok: true, reply: { type: 'text', kind: 'feature', body: featureCommand.body, feature } };
  }

  if (SETTINGS_COMMANDS.has(body.toLowerCase())) {
    const enabled = Object.keys(ctx.flags).filter((key) => isFlagOn(ctx.flags, key));
    return { ok: true, reply: { type: 'text', kind: 'settings', body: settingsReply(ctx.plan, enabled) } };
  }

  if (isFlagOn(ctx.flags, 'F_SEBI_ADVISORY') && body.length > RISK_MIN_LENGTH && containsRiskLanguage(body)) {
    return {
      ok: true,
      reply: { type: 'text', kind: 'compliance_rewrite', body: COMPLIANCE_REWRITE, feature: 'F_SEBI_ADVISORY' },
    };
  }

  return { ok: true, reply: { type: 'text', kind: 'fallback', body: FALLBACK_REPLY } };
}
