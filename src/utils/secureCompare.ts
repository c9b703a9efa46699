import crypto from 'node:crypto';

// Constant-time comparison for shared secrets (verify token, admin token).
export function safeEqual(provided: string | undefined, expected: string): boolean {
  if (!provided || !expected) return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}
