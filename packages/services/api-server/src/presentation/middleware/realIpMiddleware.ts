import type { Request, Response, NextFunction } from 'express';

const TRUE_CLIENT_IP = 'True-Client-IP';
const X_REAL_IP = 'X-Real-IP';
const X_FORWARDED_FOR = 'X-Forwarded-For';

export function resolveClientIp(req: Request): string | undefined {
  const trueClientIp = req.get(TRUE_CLIENT_IP)?.trim();
  if (trueClientIp) return trueClientIp;

  const realIp = req.get(X_REAL_IP)?.trim();
  if (realIp) return realIp;

  const forwardedFor = req.get(X_FORWARDED_FOR);
  if (forwardedFor) {
    const [first] = forwardedFor.split(',');
    const candidate = first?.trim();
    if (candidate) return candidate;
  }

  return req.socket.remoteAddress;
}

export function realIpMiddleware(req: Request, _res: Response, next: NextFunction): void {
  req.clientIp = resolveClientIp(req);
  next();
}
