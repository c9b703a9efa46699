import type { FastifyInstance } from 'fastify';
import { AdminController } from '../controllers/adminController';
import { DashboardQuerySchema, type DashboardQuery } from '../dtos/adminDtos';
import adminAuthPlugin from '../plugins/adminAuth';

const adminController = new AdminController();

export default async function dashboardRoutes(fastify: FastifyInstance) {
  fastify.register(async (protectedApp) => {
    protectedApp.register(adminAuthPlugin);

    protectedApp.get<{ Querystring: DashboardQuery }>(
      '/dashboard',
      { schema: { querystring: DashboardQuerySchema } },
      adminController.dashboard
    );
  });

  // Unauthenticated: static menu payload for checking the interactive message shape.
  fastify.get('/debug/menu', adminController.debugMenu);
}
