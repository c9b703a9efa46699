import { describe, it, expect } from 'vitest';
import { containsRiskLanguage, routeCommand, type RouteContext } from '../../../../src/services/bot/messageRouter';
import { MENU_MESSAGE } from '../../../../src/services/bot/menu';
import { COMPLIANCE_REWRITE, FALLBACK_REPLY } from '../../../../src/services/bot/replies';

const starterDefaults: RouteContext = {
  plan: 'starter',
  flags: {
    F_MARKET_BRIEF: true,
    F_WHY_MARKET_MOVED: true,
    F_SEBI_ADVISORY: true,
    F_CLIENT_AI: true,
    F_COMPLIANCE_LOG: true,
    F_RISK_RADAR: false,
    F_CALL_PRIORITY: false,
    F_CALL_AI: false,
    F_VOICE_REPLY: false,
  },
};

function replyFor(ctx: RouteContext, command: string) {
  const result = routeCommand(ctx, command);
  if (!result.ok) throw new Error(`expected a reply, got ${result.error.code}`);
  return result.reply;
}

describe('Message router', () => {
  it.each(['hi', 'Hello', ' MENU ', 'start'])('answers %j with the interactive menu', (command) => {
    expect(replyFor(starterDefaults, command)).toEqual({ type: 'menu', message: MENU_MESSAGE });
  });

  it('serves an enabled feature', () => {
    const reply = replyFor(starterDefaults, 'MARKET_BRIEF');
    expect(reply).toMatchObject({ type: 'text', kind: 'feature', feature: 'F_MARKET_BRIEF' });
  });

  it('names the Pro tier when risk alerts are locked', () => {
    expect(replyFor(starterDefaults, 'RISK_ALERTS')).toEqual({
      type: 'text',
      kind: 'locked',
      feature: 'F_RISK_RADAR',
      body: "🔒 Risk Radar is a Pro feature. Reply 'Upgrade' to enable.",
    });
  });

  it('names the Elite tier when call summaries are locked', () => {
    const ctx: RouteContext = { plan: 'pro', flags: { ...starterDefaults.flags, F_RISK_RADAR: true } };
    const reply = replyFor(ctx, 'CALL_SUMMARY');
    expect(reply).toMatchObject({
      kind: 'locked',
      body: "🔒 Call AI summaries are an Elite feature. Reply 'Upgrade' to enable.",
    });
  });

  it('says "not enabled" for a starter feature that was switched off', () => {
    const ctx: RouteContext = { plan: 'starter', flags: { ...starterDefaults.flags, F_MARKET_BRIEF: false } };
    expect(replyFor(ctx, 'MARKET_BRIEF')).toMatchObject({
      kind: 'locked',
      body: '🔒 Market Brief is not enabled on your plan.',
    });
  });

  it('treats an absent flag as locked', () => {
    expect(replyFor({ plan: 'starter', flags: {} }, 'CLIENT_AI')).toMatchObject({ kind: 'locked', feature: 'F_CLIENT_AI' });
  });

  it('matches feature commands exactly', () => {
    expect(replyFor(starterDefaults, 'market_brief')).toMatchObject({ kind: 'fallback' });
  });

  it('lists the plan and enabled features for settings', () => {
    const ctx: RouteContext = { plan: 'pro', flags: { F_MARKET_BRIEF: true, F_RISK_RADAR: true, F_CALL_AI: false } };
    for (const command of ['SETTINGS', 'settings', 'Upgrade']) {
      expect(replyFor(ctx, command)).toEqual({
        type: 'text',
        kind: 'settings',
        body: '⚙️ Current Plan: pro\nEnabled: MARKET_BRIEF, RISK_RADAR\n\nAdmin can upgrade from dashboard.',
      });
    }
  });

  it('shows (none) when nothing is enabled', () => {
    expect(replyFor({ plan: 'starter', flags: {} }, 'settings')).toMatchObject({
      body: '⚙️ Current Plan: starter\nEnabled: (none)\n\nAdmin can upgrade from dashboard.',
    });
  });

  it('rewrites risky advice while the advisory feature is on', () => {
    expect(replyFor(starterDefaults, 'This is a guaranteed 100% return')).toEqual({
      type: 'text',
      kind: 'compliance_rewrite',
      feature: 'F_SEBI_ADVISORY',
      body: COMPLIANCE_REWRITE,
    });
  });

  it('leaves risky advice alone while the advisory feature is off', () => {
    const ctx: RouteContext = { plan: 'starter', flags: { ...starterDefaults.flags, F_SEBI_ADVISORY: false } };
    expect(replyFor(ctx, 'This is a guaranteed 100% return')).toMatchObject({ kind: 'fallback', body: FALLBACK_REPLY });
  });

  it('needs more than 15 characters before scanning for risk words', () => {
    // 15 characters exactly
    expect(replyFor(starterDefaults, 'i am sure of it')).toMatchObject({ kind: 'fallback' });
    expect(replyFor(starterDefaults, 'i am very sure of it')).toMatchObject({ kind: 'compliance_rewrite' });
  });

  it('matches risk words as plain substrings', () => {
    expect(containsRiskLanguage('Make sure you read the factsheet')).toBe(true);
    expect(containsRiskLanguage('FIXED RETURN scheme')).toBe(true);
    expect(containsRiskLanguage('markets are volatile today')).toBe(false);
  });

  it('falls back for anything else', () => {
    expect(replyFor(starterDefaults, 'what is the weather')).toEqual({
      type: 'text',
      kind: 'fallback',
      body: "Reply 'Menu' to see options.",
    });
  });

  it('rejects an empty command', () => {
    expect(routeCommand(starterDefaults, '   ')).toEqual({
      ok: false,
      error: { code: 'EMPTY_COMMAND', message: 'Inbound message has no routable text' },
    });
  });

  it('gives the same answer for the same input', () => {
    expect(routeCommand(starterDefaults, 'RISK_ALERTS')).toEqual(routeCommand(starterDefaults, 'RISK_ALERTS'));
  });
});
