import { createHash } from 'crypto';

/**
 * Derive the session id from the caller's network identity.
 * There is no login: the same IP always maps to the same cart, memory and orders.
 */
export function sessionIdFromIp(ip: string): string {
  const digest = createHash('md5').update(ip).digest('hex');
  return `session_${digest.substring(0, 16)}`;
}
