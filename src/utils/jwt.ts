import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config/env';

// Inbox session: 12 hours, then the agent logs in again.
export const SESSION_TTL_SECONDS = 60 * 60 * 12;

export const SESSION_COOKIE = 'inbox_session';

const SessionPayloadSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  tenantId: z.number().int(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type SessionPayload = z.infer<typeof SessionPayloadSchema>;

export function signSessionToken(agentId: number, tenantId: number): string {
  return jwt.sign({ sub: String(agentId), tenantId }, config.SESSION_SECRET, { expiresIn: SESSION_TTL_SECONDS });
}

/**
 * Returns the decoded session, or null when the token is missing, expired,
 * tampered with or not shaped like one of ours.
 */
export function verifySessionToken(token: string | undefined): SessionPayload | null {
  if (!token) return null;
  try {
    const parsed = SessionPayloadSchema.safeParse(jwt.verify(token, config.SESSION_SECRET));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
