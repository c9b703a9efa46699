import z from 'zod';

export const LoginBodySchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});
export type LoginBody = z.infer<typeof LoginBodySchema>;

export const ConversationParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});
export type ConversationParams = z.infer<typeof ConversationParamsSchema>;

export const SetModeBodySchema = z.object({
  mode: z.enum(['ai', 'human']),
});
export type SetModeBody = z.infer<typeof SetModeBodySchema>;

export const AgentReplyBodySchema = z.object({
  body: z.string().trim().min(1).max(4096),
});
export type AgentReplyBody = z.infer<typeof AgentReplyBodySchema>;
