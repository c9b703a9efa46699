import { describe, it, expect } from 'vitest';
import crypto from 'node:crypto';
import { verifyHubSignature } from '../../../../src/services/whatsapp/signature';

const SECRET = 'test-secret';
const body = JSON.stringify({ object: 'whatsapp_business_account', entry: [] });
const sign = (raw: string, secret = SECRET) => `sha256=${crypto.createHmac('sha256', secret).update(raw).digest('hex')}`;

describe('verifyHubSignature', () => {
  it('accepts a matching signature for string and buffer bodies', () => {
    expect(verifyHubSignature(body, sign(body), SECRET)).toBe(true);
    expect(verifyHubSignature(Buffer.from(body), sign(body), SECRET)).toBe(true);
  });

  it('rejects a signature made with another secret', () => {
    expect(verifyHubSignature(body, sign(body, 'other-secret'), SECRET)).toBe(false);
  });

  it('rejects a body that changed after signing', () => {
    expect(verifyHubSignature(`${body} `, sign(body), SECRET)).toBe(false);
  });

  it('rejects missing or malformed headers', () => {
    expect(verifyHubSignature(body, undefined, SECRET)).toBe(false);
    expect(verifyHubSignature(body, sign(body).replace('sha256=', 'sha1='), SECRET)).toBe(false);
    expect(verifyHubSignature(body, 'sha256=abc', SECRET)).toBe(false);
  });
});
