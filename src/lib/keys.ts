import type { Request } from 'express';

export type KeyGenerator = (req: Request) => string;

// Proxy headers win over the socket address.
export function clientIp(req: Request): string {
  const forwarded = req.header('x-forwarded-for');
  if (forwarded) {
    const first = forwarded.split(',')[0].trim();
    if (first) return first;
  }
  const realIp = req.header('x-real-ip');
  if (realIp) return realIp;
  return req.ip ?? 'unknown';
}

export function keyByClientIp(options?: { prefix?: string }): KeyGenerator {
  const prefix = options?.prefix ?? 'ip';
  return (req: Request) => `${prefix}:${clientIp(req)}`;
}

export function keyByHeader(
  headerName: string = 'x-api-key',
  options?: { fallbackToIp?: boolean; prefix?: string },
): KeyGenerator {
  const normalized = headerName.toLowerCase();
  const prefix = options?.prefix ?? 'token';
  return (req: Request) => {
    const value = req.header(normalized);
    if (value) return `${prefix}:${value}`;
    if (options?.fallbackToIp) return `${prefix}-ip:${clientIp(req)}`;
    return `${prefix}:anonymous`;
  };
}
