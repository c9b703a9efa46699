import type { FastifyInstance } from 'fastify';
import { AdminController } from '../controllers/adminController';
import {
  CreateTenantBodySchema,
  SetFlagBodySchema,
  SetFlagParamsSchema,
  SetPlanBodySchema,
  TenantParamsSchema,
  type CreateTenantBody,
  type SetFlagBody,
  type SetFlagParams,
  type SetPlanBody,
  type TenantParams,
} from '../dtos/adminDtos';
import adminAuthPlugin from '../plugins/adminAuth';

const adminController = new AdminController();

export default async function adminRoutes(fastify: FastifyInstance) {
  fastify.register(async (protectedApp) => {
    protectedApp.register(adminAuthPlugin);

    protectedApp.post<{ Body: CreateTenantBody }>(
      '/tenants',
      { schema: { body: CreateTenantBodySchema } },
      adminController.createTenant
    );

    protectedApp.post<{ Params: TenantParams; Body: SetPlanBody }>(
      '/tenants/:tenantId/plan',
      { schema: { params: TenantParamsSchema, body: SetPlanBodySchema } },
      adminController.setPlan
    );

    protectedApp.post<{ Params: SetFlagParams; Body: SetFlagBody }>(
      '/tenants/:tenantId/flags/:flagKey',
      { schema: { params: SetFlagParamsSchema, body: SetFlagBodySchema } },
      adminController.setFlag
    );

    protectedApp.get<{ Params: TenantParams }>(
      '/tenants/:tenantId/flags',
      { schema: { params: TenantParamsSchema } },
      adminController.listFlags
    );
  });
}
