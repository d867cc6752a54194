import { createHmac, timingSafeEqual } from 'node:crypto';
import type { RoomConfigurationRef, RoomResolver } from './rooms.js';

const PREFIX = 'sha256=';

/** `sha256=<hex>` HMAC of `body`, as sent in the X-Hub-Signature-256 header. */
export function signPayload(secret: string, body: string | Buffer): string {
  return PREFIX + createHmac('sha256', secret).update(body).digest('hex');
}

/** Whether `header` is the signature of `body` under `secret`. False for absent or malformed headers. */
export function verifySignature(secret: string, body: string | Buffer, header: string | undefined): boolean {
  if (header === undefined || !header.startsWith(PREFIX)) return false;
  const expected = Buffer.from(signPayload(secret, body));
  const actual = Buffer.from(header);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

/**
 * Resolve the project's routing and check the webhook against its secret.
 * Returns the routing only when the signature holds.
 */
export function authorizeEvent(
  resolver: Pick<RoomResolver, 'resolve'>,
  projectName: string,
  body: string | Buffer,
  header: string | undefined,
): RoomConfigurationRef | undefined {
  const config = resolver.resolve(projectName);
  return verifySignature(config.secret, body, header) ? config : undefined;
}
