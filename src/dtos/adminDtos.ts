import z from 'zod';

export const TenantParamsSchema = z.object({
  tenantId: z.coerce.number().int().positive(),
});
export type TenantParams = z.infer<typeof TenantParamsSchema>;

export const SetFlagParamsSchema = TenantParamsSchema.extend({
  flagKey: z.string().min(1).max(64),
});
export type SetFlagParams = z.infer<typeof SetFlagParamsSchema>;

export const CreateTenantBodySchema = z
  .object({
    name: z.string().max(200).optional(),
    plan: z.string().max(32).optional(),
    whatsapp_number: z.string().max(32).optional(),
  })
  .optional();
export type CreateTenantBody = z.infer<typeof CreateTenantBodySchema>;

export const SetPlanBodySchema = z.object({
  plan: z.string().min(1).max(32),
});
export type SetPlanBody = z.infer<typeof SetPlanBodySchema>;

// Form checkboxes send strings; JSON callers may send a boolean. Missing means off.
export const SetFlagBodySchema = z
  .object({
    enabled: z.union([z.string(), z.boolean()]).optional(),
  })
  .optional();
export type SetFlagBody = z.infer<typeof SetFlagBodySchema>;

export const DashboardQuerySchema = z.object({
  token: z.string().optional(),
  tenant_id: z.coerce.number().int().nonnegative().optional(),
});
export type DashboardQuery = z.infer<typeof DashboardQuerySchema>;
