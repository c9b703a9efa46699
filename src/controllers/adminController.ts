import type { FastifyReply, FastifyRequest } from 'fastify';
import { config } from '../config/env';
import type { Tenant } from '../infrastructure/schema';
import { messageLogRepository } from '../repositories/messageLogRepository';
import { MENU_MESSAGE } from '../services/bot/menu';
import { enforcePlan } from '../services/entitlements/enforcementService';
import { flagStore, isFlagOn } from '../services/entitlements/flagStore';
import type { FlagMap } from '../services/entitlements/types';
import { renderDashboard } from '../services/htmlTemplates/dashboardTemplates';
import { parseEnabled, tenantService } from '../services/tenantService';
import { readAdminToken } from '../plugins/adminAuth';
import type {
  CreateTenantBody,
  DashboardQuery,
  SetFlagBody,
  SetFlagParams,
  SetPlanBody,
  TenantParams,
} from '../dtos/adminDtos';

// Dashboard forms post urlencoded bodies and expect to land back on the page.
function isFormPost(request: FastifyRequest): boolean {
  return (request.headers['content-type'] ?? '').startsWith('application/x-www-form-urlencoded');
}

function dashboardUrl(request: FastifyRequest, tenantId: number): string {
  const token = encodeURIComponent(readAdminToken(request) ?? '');
  return `/dashboard?token=${token}&tenant_id=${tenantId}`;
}

export class AdminController {
  createTenant = async (request: FastifyRequest<{ Body: CreateTenantBody }>, reply: FastifyReply) => {
    const body = request.body ?? {};
    const { tenant, enforcement } = await tenantService.createTenant({
      name: body.name?.trim() || 'Unnamed Tenant',
      plan: body.plan,
      whatsappNumber: body.whatsapp_number?.trim() || null,
    });

    if (isFormPost(request)) {
      return reply.redirect(dashboardUrl(request, tenant.id), 303);
    }
    return reply.status(201).send({
      tenant: { id: tenant.id, name: tenant.name, plan: tenant.plan, whatsapp_number: tenant.whatsappNumber },
      flags: enforcement.flags,
    });
  };

  setPlan = async (request: FastifyRequest<{ Params: TenantParams; Body: SetPlanBody }>, reply: FastifyReply) => {
    const { tenantId } = request.params;
    const enforcement = await tenantService.setPlan(tenantId, request.body?.plan ?? '');

    if (isFormPost(request)) {
      return reply.redirect(dashboardUrl(request, tenantId), 303);
    }
    return reply.send({
      tenant_id: tenantId,
      plan: enforcement.plan,
      flags: enforcement.flags,
      disabled: enforcement.disabled,
    });
  };

  setFlag = async (request: FastifyRequest<{ Params: SetFlagParams; Body: SetFlagBody }>, reply: FastifyReply) => {
    const { tenantId, flagKey } = request.params;
    const enforcement = await tenantService.setFlag(tenantId, flagKey, parseEnabled(request.body?.enabled));

    if (isFormPost(request)) {
      return reply.redirect(dashboardUrl(request, tenantId), 303);
    }
    return reply.send({
      tenant_id: tenantId,
      flag_key: flagKey,
      enabled: isFlagOn(enforcement.flags, flagKey),
      flags: enforcement.flags,
    });
  };

  listFlags = async (request: FastifyRequest<{ Params: TenantParams }>, reply: FastifyReply) => {
    const { tenantId } = request.params;
    return reply.send({ tenant_id: tenantId, flags: await flagStore.get(tenantId) });
  };

  dashboard = async (request: FastifyRequest<{ Querystring: DashboardQuery }>, reply: FastifyReply) => {
    let tenants = await tenantService.listTenants();
    if (tenants.length === 0) {
      await tenantService.ensureTenant(config.DEFAULT_TENANT_ID);
      tenants = await tenantService.listTenants();
    }

    const requested = request.query.tenant_id;
    let selected: Tenant | null = tenants[0] ?? null;
    if (requested) {
      selected = tenants.find((t) => t.id === requested) ?? selected;
    }

    let flags: FlagMap = {};
    let stats: { count: number; lastAt: Date | null } = { count: 0, lastAt: null };
    if (selected) {
      flags = (await enforcePlan(selected.id)).flags;
      stats = await messageLogRepository.statsForTenant(selected.id);
    }

    const html = renderDashboard({
      token: readAdminToken(request) ?? '',
      tenants,
      selected,
      flags,
      messageCount: stats.count,
      lastMessageAt: stats.lastAt,
    });
    return reply.type('text/html; charset=utf-8').send(html);
  };

  debugMenu = async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send(MENU_MESSAGE);
  };
}
