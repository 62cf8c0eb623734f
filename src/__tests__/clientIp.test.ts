import { describe, it, expect } from 'vitest';
import type { IncomingMessage } from 'http';
import type { Socket } from 'net';
import { getClientIp, getClientIpWithFallback } from '../http/clientIp.js';
import { sessionIdFromIp } from '../http/session.js';

function createMockRequest(options: {
  xForwardedFor?: string | string[];
  xRealIp?: string;
  remoteAddress?: string;
}): IncomingMessage {
  const headers: Record<string, string | string[] | undefined> = {};
  if (options.xForwardedFor !== undefined) {
    headers['x-forwarded-for'] = options.xForwardedFor;
  }
  if (options.xRealIp !== undefined) {
    headers['x-real-ip'] = options.xRealIp;
  }

  const socket = options.remoteAddress
    ? { remoteAddress: options.remoteAddress } as Socket
    : undefined;

  return { headers, socket } as IncomingMessage;
}

describe('getClientIp', () => {
  it('takes the first X-Forwarded-For entry, trimmed', () => {
    expect(getClientIp(createMockRequest({ xForwardedFor: '  10.0.0.1  ,  10.0.0.2  ' }))).toBe('10.0.0.1');
  });

  it('prefers X-Forwarded-For over X-Real-IP and the socket', () => {
    const req = createMockRequest({ xForwardedFor: '1.1.1.1', xRealIp: '2.2.2.2', remoteAddress: '3.3.3.3' });
    expect(getClientIp(req)).toBe('1.1.1.1');
  });

  it('falls back to X-Real-IP, then the socket address', () => {
    expect(getClientIp(createMockRequest({ xRealIp: '2.2.2.2', remoteAddress: '3.3.3.3' }))).toBe('2.2.2.2');
    expect(getClientIp(createMockRequest({ remoteAddress: '3.3.3.3' }))).toBe('3.3.3.3');
  });

  it('normalizes IPv6-mapped IPv4 addresses', () => {
    expect(getClientIp(createMockRequest({ remoteAddress: '::ffff:127.0.0.1' }))).toBe('127.0.0.1');
  });

  it('returns null when nothing identifies the client', () => {
    expect(getClientIp(createMockRequest({}))).toBeNull();
    expect(getClientIpWithFallback(createMockRequest({}))).toBe('127.0.0.1');
  });
});

describe('sessionIdFromIp', () => {
  it('derives a stable session id from the md5 of the ip', () => {
    // md5("127.0.0.1") = f528764d624db129b32c21fbca0cb8d6
    expect(sessionIdFromIp('127.0.0.1')).toBe('session_f528764d624db129');
  });

  it('maps different addresses to different sessions', () => {
    expect(sessionIdFromIp('10.0.0.1')).not.toBe(sessionIdFromIp('10.0.0.2'));
    expect(sessionIdFromIp('10.0.0.1')).toMatch(/^session_[0-9a-f]{16}$/);
  });
});
