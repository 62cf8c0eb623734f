import type { IncomingMessage } from 'http';

/**
 * Extracts the client IP address from an HTTP request.
 *
 * Priority order:
 * 1. X-Forwarded-For header (first IP before comma, trimmed)
 * 2. X-Real-IP header
 * 3. req.socket.remoteAddress
 *
 * IPv6-mapped IPv4 addresses (e.g., "::ffff:127.0.0.1") are normalized to IPv4.
 */
export function getClientIp(req: IncomingMessage): string | null {
  let ip: string | null = null;

  const xForwardedFor = req.headers['x-forwarded-for'];
  if (xForwardedFor) {
    const forwardedValue = Array.isArray(xForwardedFor) ? xForwardedFor[0] : xForwardedFor;
    const firstIp = forwardedValue?.split(',')[0]?.trim();
    if (firstIp) {
      ip = firstIp;
    }
  }

  if (!ip) {
    const xRealIp = req.headers['x-real-ip'];
    if (xRealIp) {
      const realIpValue = Array.isArray(xRealIp) ? xRealIp[0] : xRealIp;
      if (realIpValue?.trim()) {
        ip = realIpValue.trim();
      }
    }
  }

  if (!ip && req.socket?.remoteAddress) {
    ip = req.socket.remoteAddress;
  }

  if (ip) {
    ip = normalizeIpv6MappedIpv4(ip);
  }

  return ip || null;
}

function normalizeIpv6MappedIpv4(ip: string): string {
  const ipv6MappedPrefix = '::ffff:';
  if (ip.toLowerCase().startsWith(ipv6MappedPrefix)) {
    return ip.substring(ipv6MappedPrefix.length);
  }
  return ip;
}

/**
 * Gets the client IP, falling back to localhost when it cannot be determined.
 */
export function getClientIpWithFallback(req: IncomingMessage): string {
  return getClientIp(req) ?? '127.0.0.1';
}
