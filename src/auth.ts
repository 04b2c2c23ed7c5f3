/**
 * Master-key bearer check run before any routing.
 *
 * @packageDocumentation
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { ProxyError } from './errors.js';

const BEARER_PREFIX = 'Bearer ';

export type AuthResult = { ok: true } | { ok: false; error: ProxyError };

/**
 * Validate the raw `Authorization` header against the master key.
 *
 * The scheme prefix is case-sensitive with exactly one space. Both sides are
 * hashed first so the comparison runs over equal-length buffers and its time
 * does not depend on how much of the token matches.
 */
export function authenticate(header: string | undefined, masterKey: string): AuthResult {
  if (!header || !header.startsWith(BEARER_PREFIX)) {
    return { ok: false, error: new ProxyError('Unauthenticated', 'Missing Authorization header') };
  }

  const token = header.slice(BEARER_PREFIX.length);
  if (!constantTimeEquals(token, masterKey)) {
    return { ok: false, error: new ProxyError('InvalidCredential', 'Invalid API key') };
  }

  return { ok: true };
}

function constantTimeEquals(a: string, b: string): boolean {
  const left = createHash('sha256').update(a, 'utf8').digest();
  const right = createHash('sha256').update(b, 'utf8').digest();
  return timingSafeEqual(left, right);
}
