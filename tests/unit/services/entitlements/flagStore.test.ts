import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import { migrateTestDb, resetDb } from '../../../integration/testApp';
import { flagStore, isFlagOn } from '../../../../src/services/entitlements/flagStore';
import { tenantRepository } from '../../../../src/repositories/tenantRepository';

describe('Flag store', () => {
  let tenantId: number;

  beforeAll(async () => {
    await migrateTestDb();
  });

  beforeEach(async () => {
    resetDb();
    tenantId = (await tenantRepository.create({ name: 'Flags Co', plan: 'starter' })).id;
  });

  it('returns only persisted rows', async () => {
    expect(await flagStore.get(tenantId)).toEqual({});

    await flagStore.set(tenantId, 'F_MARKET_BRIEF', true);

    expect(await flagStore.get(tenantId)).toEqual({ F_MARKET_BRIEF: true });
  });

  it('reads back the last value written', async () => {
    await flagStore.set(tenantId, 'F_CLIENT_AI', true);
    await flagStore.set(tenantId, 'F_CLIENT_AI', false);
    await flagStore.set(tenantId, 'F_CLIENT_AI', false);

    expect(await flagStore.isEnabled(tenantId, 'F_CLIENT_AI')).toBe(false);
    expect(await flagStore.get(tenantId)).toEqual({ F_CLIENT_AI: false });
  });

  it('treats an absent key as disabled', async () => {
    expect(await flagStore.isEnabled(tenantId, 'F_VOICE_REPLY')).toBe(false);
    expect(isFlagOn({}, 'F_VOICE_REPLY')).toBe(false);
  });

  it('keeps tenants apart', async () => {
    const other = await tenantRepository.create({ name: 'Other Co', plan: 'starter' });
    await flagStore.set(tenantId, 'F_MARKET_BRIEF', true);

    expect(await flagStore.isEnabled(other.id, 'F_MARKET_BRIEF')).toBe(false);
  });

  it('seeds the default template without overwriting existing rows', async () => {
    await flagStore.set(tenantId, 'F_MARKET_BRIEF', false);

    const inserted = await flagStore.seedDefaults(tenantId);

    expect(inserted).toBe(8);
    const flags = await flagStore.get(tenantId);
    expect(flags).toEqual({
      F_MARKET_BRIEF: false,
      F_WHY_MARKET_MOVED: true,
      F_SEBI_ADVISORY: true,
      F_CLIENT_AI: true,
      F_COMPLIANCE_LOG: true,
      F_RISK_RADAR: false,
      F_CALL_PRIORITY: false,
      F_CALL_AI: false,
      F_VOICE_REPLY: false,
    });
    expect(await flagStore.seedDefaults(tenantId)).toBe(0);
  });
});
