import crypto from 'node:crypto';

/**
 * Verifies the X-Hub-Signature-256 header Meta attaches to webhook deliveries.
 *
 * @param rawBody - The raw request body (not re-serialized JSON).
 * @param header - Header value, formatted `sha256=<hex digest>`.
 * @param appSecret - The app secret from the Meta developer console.
 */
export function verifyHubSignature(rawBody: string | Buffer, header: string | undefined, appSecret: string): boolean {
  if (!rawBody || !header || !appSecret || !header.startsWith('sha256=')) {
    return false;
  }

  const digest = crypto.createHmac('sha256', appSecret).update(rawBody).digest('hex');

  const signatureBuffer = Buffer.from(header.slice('sha256='.length));
  const digestBuffer = Buffer.from(digest);

  // timingSafeEqual requires equal lengths
  if (signatureBuffer.length !== digestBuffer.length) {
    return false;
  }

  return crypto.timingSafeEqual(signatureBuffer, digestBuffer);
}
