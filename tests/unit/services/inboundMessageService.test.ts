import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { migrateTestDb, resetDb } from '../../integration/testApp';
import { InboundMessageService, type MessageSender } from '../../../src/services/inboundMessageService';
import { ConversationHistoryStore } from '../../../src/services/ai/conversationHistory';
import type { CompletionProvider } from '../../../src/services/ai/completionClient';
import { MENU_MESSAGE } from '../../../src/services/bot/menu';
import { flagStore } from '../../../src/services/entitlements/flagStore';
import { conversationRepository } from '../../../src/repositories/conversationRepository';
import { messageLogRepository } from '../../../src/repositories/messageLogRepository';
import { tenantRepository } from '../../../src/repositories/tenantRepository';
import { tenantService } from '../../../src/services/tenantService';
import type { SendResult } from '../../../src/services/whatsapp/types';
import { listReplyPayload, statusPayload, textPayload } from '../../fixtures/whatsappPayloads';

const TENANT_ID = 1;
const CUSTOMER = '919800000001';
const SENT: SendResult = { ok: true, skipped: false, messageId: 'wamid.out' };

function fakeSender() {
  return {
    sendText: vi.fn<MessageSender['sendText']>().mockResolvedValue(SENT),
    sendMenu: vi.fn<MessageSender['sendMenu']>().mockResolvedValue(SENT),
  };
}

function fakeCompletion(answer: string | Error) {
  return {
    name: 'fake',
    complete: vi.fn<CompletionProvider['complete']>(async () => {
      if (answer instanceof Error) throw answer;
      return answer;
    }),
  };
}

describe('InboundMessageService', () => {
  let sender: ReturnType<typeof fakeSender>;
  let history: ConversationHistoryStore;

  const service = (completion: CompletionProvider | null = null) =>
    new InboundMessageService({ tenantId: TENANT_ID, sender, completion, history });

  beforeAll(async () => {
    await migrateTestDb();
  });

  beforeEach(() => {
    resetDb();
    sender = fakeSender();
    history = new ConversationHistoryStore({ maxUsers: 10, maxTurns: 4 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('ignores status callbacks without touching the store', async () => {
    const findSpy = vi.spyOn(tenantRepository, 'findById');

    const outcome = await service().handle(statusPayload());

    expect(outcome).toEqual({ status: 'ignored', reason: 'NO_MESSAGE' });
    expect(findSpy).not.toHaveBeenCalled();
    expect(await tenantRepository.findById(TENANT_ID)).toBeNull();
    expect(sender.sendText).not.toHaveBeenCalled();
  });

  it('creates the default tenant on first contact and sends the menu', async () => {
    const outcome = await service().handle(textPayload(CUSTOMER, 'hi'));

    expect(outcome.status).toBe('replied');
    expect(sender.sendMenu).toHaveBeenCalledWith(CUSTOMER, MENU_MESSAGE);
    const tenant = await tenantRepository.findById(TENANT_ID);
    expect(tenant).toMatchObject({ name: 'Default Tenant', plan: 'starter' });
  });

  it('answers a locked premium command with the required tier', async () => {
    await service().handle(listReplyPayload(CUSTOMER, 'RISK_ALERTS'));

    expect(sender.sendText).toHaveBeenCalledWith(CUSTOMER, "🔒 Risk Radar is a Pro feature. Reply 'Upgrade' to enable.");
  });

  it('enforces the plan before routing even without an admin mutation', async () => {
    await tenantService.ensureTenant(TENANT_ID);
    // Written behind the admin surface's back.
    await flagStore.set(TENANT_ID, 'F_CALL_AI', true);

    await service().handle(listReplyPayload(CUSTOMER, 'CALL_SUMMARY'));

    expect(sender.sendText).toHaveBeenCalledWith(
      CUSTOMER,
      "🔒 Call AI summaries are an Elite feature. Reply 'Upgrade' to enable."
    );
    expect(await flagStore.isEnabled(TENANT_ID, 'F_CALL_AI')).toBe(false);
  });

  it('writes the compliance log in both directions while the flag is on', async () => {
    await service().handle(textPayload(CUSTOMER, 'menu'));

    const logs = await messageLogRepository.listForTenant(TENANT_ID);
    expect(logs.map((l) => [l.direction, l.message, l.waFrom, l.waTo])).toEqual([
      ['inbound', 'menu', CUSTOMER, '15550001111'],
      ['outbound', 'MENU_SENT', CUSTOMER, '15550001111'],
    ]);
  });

  it('skips the compliance log while the flag is off', async () => {
    await tenantService.ensureTenant(TENANT_ID);
    await flagStore.set(TENANT_ID, 'F_COMPLIANCE_LOG', false);

    await service().handle(textPayload(CUSTOMER, 'menu'));

    expect(await messageLogRepository.listForTenant(TENANT_ID)).toEqual([]);
  });

  it('records the exchange in the inbox', async () => {
    const outcome = await service().handle(listReplyPayload(CUSTOMER, 'MARKET_BRIEF'));
    if (outcome.status !== 'replied') throw new Error(`unexpected outcome ${outcome.status}`);

    const messages = await conversationRepository.listMessages(outcome.conversationId);
    expect(messages.map((m) => [m.direction, m.author, m.delivery])).toEqual([
      ['inbound', 'customer', null],
      ['outbound', 'bot', 'sent'],
    ]);
    expect(messages[1]?.body).toContain('Market Brief (demo)');
  });

  it('marks a failed send in the inbox and keeps it out of the compliance log', async () => {
    sender.sendMenu.mockResolvedValue({ ok: false, status: 500, error: 'upstream down' });

    const outcome = await service().handle(textPayload(CUSTOMER, 'menu'));
    if (outcome.status !== 'replied') throw new Error(`unexpected outcome ${outcome.status}`);

    expect(outcome.send).toEqual({ ok: false, status: 500, error: 'upstream down' });
    const messages = await conversationRepository.listMessages(outcome.conversationId);
    expect(messages.map((m) => [m.author, m.body, m.delivery])).toEqual([
      ['customer', 'menu', null],
      ['bot', 'MENU_SENT', 'failed'],
    ]);
    const logs = await messageLogRepository.listForTenant(TENANT_ID);
    expect(logs.map((l) => [l.direction, l.message])).toEqual([['inbound', 'menu']]);
  });

  it('keeps a skipped send in the compliance log and marks it in the inbox', async () => {
    sender.sendMenu.mockResolvedValue({ ok: true, skipped: true, reason: 'NOT_CONFIGURED' });

    const outcome = await service().handle(textPayload(CUSTOMER, 'menu'));
    if (outcome.status !== 'replied') throw new Error(`unexpected outcome ${outcome.status}`);

    const messages = await conversationRepository.listMessages(outcome.conversationId);
    expect(messages.at(-1)?.delivery).toBe('skipped');
    const logs = await messageLogRepository.listForTenant(TENANT_ID);
    expect(logs.map((l) => [l.direction, l.message])).toEqual([
      ['inbound', 'menu'],
      ['outbound', 'MENU_SENT'],
    ]);
  });

  it('stays silent while a conversation is in human mode', async () => {
    const first = await service().handle(textPayload(CUSTOMER, 'hi'));
    if (first.status !== 'replied') throw new Error(`unexpected outcome ${first.status}`);
    await conversationRepository.updateMode(first.conversationId, { mode: 'human' });
    sender.sendMenu.mockClear();

    const outcome = await service().handle(textPayload(CUSTOMER, 'hi again'));

    expect(outcome).toEqual({ status: 'handed_off', conversationId: first.conversationId });
    expect(sender.sendText).not.toHaveBeenCalled();
    expect(sender.sendMenu).not.toHaveBeenCalled();
    const messages = await conversationRepository.listMessages(first.conversationId);
    expect(messages.at(-1)).toMatchObject({ author: 'customer', body: 'hi again' });
  });

  it('hands free text to the completion client while the assistant is enabled', async () => {
    const completion = fakeCompletion('Markets are volatile; review your risk profile.');

    await service(completion).handle(textPayload(CUSTOMER, 'what about reliance'));

    expect(sender.sendText).toHaveBeenCalledWith(CUSTOMER, 'Markets are volatile; review your risk profile.');
    expect(history.get(`${TENANT_ID}:${CUSTOMER}`)).toEqual([
      { role: 'user', content: 'what about reliance' },
      { role: 'assistant', content: 'Markets are volatile; review your risk profile.' },
    ]);
  });

  it('passes earlier turns to the completion client', async () => {
    const completion = fakeCompletion('second answer');
    history.append(`${TENANT_ID}:${CUSTOMER}`, { role: 'user', content: 'earlier' }, { role: 'assistant', content: 'reply' });

    await service(completion).handle(textPayload(CUSTOMER, 'follow up'));

    expect(completion.complete.mock.calls[0]?.[1]).toEqual([
      { role: 'user', content: 'earlier' },
      { role: 'assistant', content: 'reply' },
      { role: 'user', content: 'follow up' },
    ]);
  });

  it('keeps the fallback while the assistant is disabled', async () => {
    await tenantService.ensureTenant(TENANT_ID);
    await flagStore.set(TENANT_ID, 'F_CLIENT_AI', false);
    const completion = fakeCompletion('unused');

    await service(completion).handle(textPayload(CUSTOMER, 'what about reliance'));

    expect(completion.complete).not.toHaveBeenCalled();
    expect(sender.sendText).toHaveBeenCalledWith(CUSTOMER, "Reply 'Menu' to see options.");
  });

  it('keeps the fallback when the completion call fails', async () => {
    const completion = fakeCompletion(new Error('timeout'));

    await service(completion).handle(textPayload(CUSTOMER, 'what about reliance'));

    expect(sender.sendText).toHaveBeenCalledWith(CUSTOMER, "Reply 'Menu' to see options.");
    expect(history.size).toBe(0);
  });

  it('does not send menu commands to the completion client', async () => {
    const completion = fakeCompletion('unused');

    await service(completion).handle(listReplyPayload(CUSTOMER, 'SETTINGS'));

    expect(completion.complete).not.toHaveBeenCalled();
    expect(sender.sendText.mock.calls[0]?.[1]).toMatch(/^⚙️ Current Plan: starter\n/);
  });

  it('reports a processing failure instead of throwing', async () => {
    sender.sendText.mockRejectedValue(new Error('boom'));

    const outcome = await service().handle(textPayload(CUSTOMER, 'anything at all'));

    expect(outcome).toMatchObject({ status: 'failed', error: { code: 'PROCESSING_ERROR', message: 'boom' } });
  });
});
