import { FEATURE_LABELS, PLAN_CATALOG, PLAN_ORDER } from '../../config/plans';
import type { Tenant } from '../../infrastructure/schema';
import { isAllowedOnPlan, normalizePlan } from '../entitlements/planFeatures';
import { FEATURE_KEYS, type FlagMap } from '../entitlements/types';
import { escapeHtml, formatTimestamp, renderPage } from './layout';

export type DashboardView = {
  token: string;
  tenants: Tenant[];
  selected: Tenant | null;
  flags: FlagMap;
  messageCount: number;
  lastMessageAt: Date | null;
};

const withToken = (path: string, token: string) => `${path}?token=${encodeURIComponent(token)}`;

function tenantSelector(view: DashboardView): string {
  const options = view.tenants
    .map((t) => {
      const selected = view.selected?.id === t.id ? ' selected' : '';
      return `<option value="${t.id}"${selected}>#${t.id} ${escapeHtml(t.name)} (${escapeHtml(t.plan)})</option>`;
    })
    .join('');
  return `
  <form method="get" action="/dashboard" class="card">
    <input type="hidden" name="token" value="${escapeHtml(view.token)}">
    <label>Tenant <select name="tenant_id" onchange="this.form.submit()">${options}</select></label>
    <noscript><button type="submit">Open</button></noscript>
  </form>`;
}

function planForm(view: DashboardView, tenant: Tenant): string {
  const current = normalizePlan(tenant.plan);
  const options = PLAN_ORDER.map((plan) => {
    const selected = plan === current ? ' selected' : '';
    return `<option value="${plan}"${selected}>${PLAN_CATALOG[plan].label}</option>`;
  }).join('');
  return `
  <form method="post" action="${withToken(`/admin/tenants/${tenant.id}/plan`, view.token)}" class="card">
    <h3>Plan</h3>
    <select name="plan">${options}</select>
    <button type="submit">Update plan</button>
  </form>`;
}

function flagTable(view: DashboardView, tenant: Tenant): string {
  const plan = normalizePlan(tenant.plan);
  const rows = FEATURE_KEYS.map((key) => {
    const enabled = view.flags[key] === true;
    const allowed = isAllowedOnPlan(plan, key);
    const action = withToken(`/admin/tenants/${tenant.id}/flags/${key}`, view.token);
    const control = allowed
      ? `<form method="post" action="${action}">
          <input type="hidden" name="enabled" value="${enabled ? '0' : '1'}">
          <button type="submit">${enabled ? 'Disable' : 'Enable'}</button>
        </form>`
      : '<span class="muted">not on plan</span>';
    return `<tr>
      <td>${FEATURE_LABELS[key]}<div class="muted">${key}</div></td>
      <td class="${enabled ? 'on' : 'off'}">${enabled ? 'ON' : 'OFF'}</td>
      <td>${control}</td>
    </tr>`;
  }).join('');
  return `
  <div class="card">
    <h3>Features</h3>
    <table><tr><th>Feature</th><th>Status</th><th></th></tr>${rows}</table>
  </div>`;
}

function createTenantForm(token: string): string {
  const options = PLAN_ORDER.map((plan) => `<option value="${plan}">${PLAN_CATALOG[plan].label}</option>`).join('');
  return `
  <form method="post" action="${withToken('/admin/tenants', token)}" class="card">
    <h3>New tenant</h3>
    <input name="name" placeholder="Name" required>
    <input name="whatsapp_number" placeholder="WhatsApp number">
    <select name="plan">${options}</select>
    <button type="submit">Create</button>
  </form>`;
}

export const renderDashboard = (view: DashboardView): string => {
  const sections: string[] = ['<h1>Control Room</h1>'];

  if (view.tenants.length > 0) sections.push(tenantSelector(view));

  if (view.selected) {
    const tenant = view.selected;
    sections.push(`
  <div class="card">
    <h2>${escapeHtml(tenant.name)}</h2>
    <div class="muted">Tenant #${tenant.id}${tenant.whatsappNumber ? ` · ${escapeHtml(tenant.whatsappNumber)}` : ''}</div>
    <p>Messages logged: <strong>${view.messageCount}</strong> · Last message: ${formatTimestamp(view.lastMessageAt)}</p>
  </div>`);
    sections.push(planForm(view, tenant));
    sections.push(flagTable(view, tenant));
  } else {
    sections.push('<div class="card">No tenants yet.</div>');
  }

  sections.push(createTenantForm(view.token));
  return renderPage('Control Room', sections.join('\n'));
};
