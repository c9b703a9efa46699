import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildTestApp, resetDb } from './testApp';
import { agentService } from '../../src/services/agentService';
import { tenantService } from '../../src/services/tenantService';
import { conversationRepository } from '../../src/repositories/conversationRepository';
import { messageLogRepository } from '../../src/repositories/messageLogRepository';
import { whatsappClient } from '../../src/services/whatsapp/whatsappClient';
import { SESSION_COOKIE } from '../../src/utils/jwt';
import { textPayload } from '../fixtures/whatsappPayloads';

const CUSTOMER = '919800000001';
const FORM = { 'content-type': 'application/x-www-form-urlencoded' };

describe('Inbox', () => {
  let app: FastifyInstance;

  async function login(email: string, password = 'test-password') {
    const res = await app.inject({
      method: 'POST',
      url: '/inbox/login',
      headers: FORM,
      payload: `email=${encodeURIComponent(email)}&password=${password}`,
    });
    const cookie = res.cookies.find((c) => c.name === SESSION_COOKIE);
    if (!cookie) throw new Error(`login failed with ${res.statusCode}`);
    return { [SESSION_COOKIE]: cookie.value };
  }

  async function inbound(body: string) {
    await app.inject({ method: 'POST', url: '/webhook/whatsapp', payload: textPayload(CUSTOMER, body) });
    const [conversation] = await conversationRepository.listForTenant(1);
    if (!conversation) throw new Error('no conversation recorded');
    return conversation;
  }

  beforeAll(async () => {
    app = await buildTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  beforeEach(async () => {
    resetDb();
    await tenantService.ensureTenant(1);
    await agentService.createAgent({ tenantId: 1, email: 'priya@example.com', displayName: 'Priya', password: 'test-password' });
    await agentService.createAgent({ tenantId: 1, email: 'dev@example.com', displayName: 'Dev', password: 'test-password' });
  });

  it('redirects to the login page without a session', async () => {
    const res = await app.inject({ method: 'GET', url: '/inbox' });

    expect(res.statusCode).toBe(303);
    expect(res.headers.location).toBe('/inbox/login');
  });

  it('ignores a forged session cookie', async () => {
    const res = await app.inject({ method: 'GET', url: '/inbox', cookies: { [SESSION_COOKIE]: 'forged' } });
    expect(res.statusCode).toBe(303);
  });

  it('rejects a wrong password', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/inbox/login',
      headers: FORM,
      payload: 'email=priya%40example.com&password=wrong-password',
    });

    expect(res.statusCode).toBe(401);
    expect(res.body).toContain('Invalid email or password');
    expect(res.cookies.find((c) => c.name === SESSION_COOKIE)).toBeUndefined();
  });

  it('logs in and lists conversations', async () => {
    await inbound('hi');
    const cookies = await login('Priya@Example.com');

    const res = await app.inject({ method: 'GET', url: '/inbox', cookies });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('Priya');
    expect(res.body).toContain(`<div class="muted">${CUSTOMER}</div>`);
  });

  it('hands a conversation to an agent and stops auto-replies', async () => {
    const conversation = await inbound('hi');
    const cookies = await login('priya@example.com');

    const assign = await app.inject({ method: 'POST', url: `/inbox/conversations/${conversation.id}/assign`, cookies });
    expect(assign.statusCode).toBe(303);

    await inbound('need a human');
    const messages = await conversationRepository.listMessages(conversation.id);
    expect(messages.map((m) => m.author)).toEqual(['customer', 'bot', 'customer']);

    const reply = await app.inject({
      method: 'POST',
      url: `/inbox/conversations/${conversation.id}/reply`,
      headers: FORM,
      cookies,
      payload: 'body=Calling+you+now',
    });
    expect(reply.statusCode).toBe(303);

    const thread = await app.inject({ method: 'GET', url: `/inbox/conversations/${conversation.id}`, cookies });
    expect(thread.body).toContain('Calling you now');
    expect((await conversationRepository.listMessages(conversation.id)).at(-1)).toMatchObject({
      author: 'agent',
      direction: 'outbound',
      body: 'Calling you now',
      delivery: 'skipped',
    });
  });

  it('marks a reply the provider rejected and keeps it out of the compliance log', async () => {
    const conversation = await inbound('hi');
    const cookies = await login('priya@example.com');
    await app.inject({ method: 'POST', url: `/inbox/conversations/${conversation.id}/assign`, cookies });
    vi.spyOn(whatsappClient, 'sendText').mockResolvedValue({ ok: false, status: 500, error: 'upstream down' });

    const reply = await app.inject({
      method: 'POST',
      url: `/inbox/conversations/${conversation.id}/reply`,
      headers: FORM,
      cookies,
      payload: 'body=Are+you+there',
    });
    expect(reply.statusCode).toBe(303);

    expect((await conversationRepository.listMessages(conversation.id)).at(-1)).toMatchObject({
      author: 'agent',
      body: 'Are you there',
      delivery: 'failed',
    });
    const logs = await messageLogRepository.listForTenant(1);
    expect(logs.map((l) => [l.direction, l.message])).toEqual([
      ['inbound', 'hi'],
      ['outbound', 'MENU_SENT'],
    ]);

    const thread = await app.inject({ method: 'GET', url: `/inbox/conversations/${conversation.id}`, cookies });
    expect(thread.body).toContain('Are you there <span class="muted">(not delivered)</span>');
  });

  it('returns the conversation to the bot', async () => {
    const conversation = await inbound('hi');
    const cookies = await login('priya@example.com');
    await app.inject({ method: 'POST', url: `/inbox/conversations/${conversation.id}/assign`, cookies });

    await app.inject({
      method: 'POST',
      url: `/inbox/conversations/${conversation.id}/mode`,
      headers: FORM,
      cookies,
      payload: 'mode=ai',
    });

    expect(await conversationRepository.findById(conversation.id)).toMatchObject({ mode: 'ai', assignedAgentId: null });
    await inbound('menu');
    const messages = await conversationRepository.listMessages(conversation.id);
    expect(messages.at(-1)?.author).toBe('bot');
  });

  it("refuses to change another agent's conversation", async () => {
    const conversation = await inbound('hi');
    const priya = await login('priya@example.com');
    const dev = await login('dev@example.com');
    await app.inject({ method: 'POST', url: `/inbox/conversations/${conversation.id}/assign`, cookies: priya });

    const mode = await app.inject({
      method: 'POST',
      url: `/inbox/conversations/${conversation.id}/mode`,
      headers: FORM,
      cookies: dev,
      payload: 'mode=ai',
    });
    const reply = await app.inject({
      method: 'POST',
      url: `/inbox/conversations/${conversation.id}/reply`,
      headers: FORM,
      cookies: dev,
      payload: 'body=hello',
    });

    expect(mode.statusCode).toBe(403);
    expect(mode.json().error.code).toBe('CONVERSATION_OWNED');
    expect(reply.statusCode).toBe(409);
    expect(reply.json().error.code).toBe('NOT_ASSIGNED');
  });

  it('refuses a reply while the bot owns the conversation', async () => {
    const conversation = await inbound('hi');
    const cookies = await login('priya@example.com');

    const res = await app.inject({
      method: 'POST',
      url: `/inbox/conversations/${conversation.id}/reply`,
      headers: FORM,
      cookies,
      payload: 'body=hello',
    });

    expect(res.statusCode).toBe(409);
  });

  it('returns 404 for a conversation of another tenant', async () => {
    const { tenant } = await tenantService.createTenant({ name: 'Other Co' });
    const other = await conversationRepository.upsertForCustomer(tenant.id, CUSTOMER, null);
    const cookies = await login('priya@example.com');

    const res = await app.inject({ method: 'GET', url: `/inbox/conversations/${other.id}`, cookies });

    expect(res.statusCode).toBe(404);
  });

  it('logs out', async () => {
    const cookies = await login('priya@example.com');

    const res = await app.inject({ method: 'POST', url: '/inbox/logout', cookies });

    expect(res.statusCode).toBe(303);
    const cleared = res.cookies.find((c) => c.name === SESSION_COOKIE);
    expect(cleared?.value).toBe('');
  });
});
