import type { Agent, ConversationMessage } from '../../infrastructure/schema';
import type { ConversationListItem } from '../../repositories/conversationRepository';
import type { ConversationThread } from '../inboxService';
import { escapeHtml, formatTimestamp, renderPage } from './layout';

const AUTHOR_LABELS: Record<ConversationMessage['author'], string> = {
  customer: 'Customer',
  bot: 'Bot',
  ai: 'AI',
  agent: 'Agent',
};

const deliveryNote = (m: ConversationMessage): string => {
  if (m.delivery === 'failed') return ' <span class="muted">(not delivered)</span>';
  if (m.delivery === 'skipped') return ' <span class="muted">(send skipped)</span>';
  return '';
};

const header = (agent: Agent) => `
  <div class="card">
    <strong>Inbox</strong> · ${escapeHtml(agent.displayName)} (${agent.role})
    <form method="post" action="/inbox/logout" style="display:inline"><button type="submit">Log out</button></form>
  </div>`;

export const renderLogin = (error: string | null): string =>
  renderPage(
    'Inbox login',
    `
  <form method="post" action="/inbox/login" class="card" style="max-width:360px">
    <h2>Agent login</h2>
    ${error ? `<p class="off">${escapeHtml(error)}</p>` : ''}
    <p><input type="email" name="email" placeholder="Email" required></p>
    <p><input type="password" name="password" placeholder="Password" required></p>
    <button type="submit">Log in</button>
  </form>`
  );

export const renderConversationList = (agent: Agent, conversations: ConversationListItem[]): string => {
  const rows = conversations
    .map(
      (c) => `<tr>
      <td><a href="/inbox/conversations/${c.id}">${escapeHtml(c.customerName ?? c.waId)}</a><div class="muted">${escapeHtml(c.waId)}</div></td>
      <td>${c.mode === 'human' ? 'Human' : 'AI'}</td>
      <td>${c.assignedAgentName ? escapeHtml(c.assignedAgentName) : '<span class="muted">unassigned</span>'}</td>
      <td>${formatTimestamp(c.lastMessageAt)}</td>
    </tr>`
    )
    .join('');

  const body =
    conversations.length > 0
      ? `<table><tr><th>Customer</th><th>Mode</th><th>Assignee</th><th>Last message</th></tr>${rows}</table>`
      : '<p class="muted">No conversations yet.</p>';

  return renderPage('Inbox', `${header(agent)}\n  <div class="card">${body}</div>`);
};

export const renderConversation = (agent: Agent, thread: ConversationThread): string => {
  const { conversation, messages } = thread;
  const base = `/inbox/conversations/${conversation.id}`;

  const items = messages
    .map(
      (m) => `<tr class="msg-${m.author === 'customer' ? 'customer' : 'agent'}">
      <td>${AUTHOR_LABELS[m.author]}</td>
      <td>${escapeHtml(m.body)}${deliveryNote(m)}</td>
      <td class="muted">${formatTimestamp(m.createdAt)}</td>
    </tr>`
    )
    .join('');

  const mine = conversation.assignedAgentId === agent.id;
  const canReply = conversation.mode === 'human' && (mine || agent.role === 'admin');
  const nextMode = conversation.mode === 'human' ? 'ai' : 'human';

  const controls = `
  <div class="card">
    <form method="post" action="${base}/assign" style="display:inline"><button type="submit"${mine ? ' disabled' : ''}>Assign to me</button></form>
    <form method="post" action="${base}/mode" style="display:inline">
      <input type="hidden" name="mode" value="${nextMode}">
      <button type="submit">Switch to ${nextMode === 'ai' ? 'AI' : 'human'}</button>
    </form>
  </div>`;

  const replyForm = canReply
    ? `
  <form method="post" action="${base}/reply" class="card">
    <textarea name="body" rows="3" cols="60" required></textarea>
    <button type="submit">Send</button>
  </form>`
    : '';

  return renderPage(
    `Conversation ${conversation.waId}`,
    `${header(agent)}
  <div class="card">
    <a href="/inbox">← All conversations</a>
    <h2>${escapeHtml(conversation.customerName ?? conversation.waId)}</h2>
    <div class="muted">${escapeHtml(conversation.waId)} · mode: ${conversation.mode}</div>
    <table>${items}</table>
  </div>${controls}${replyForm}`
  );
};
