import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';

const claimsSchema = z.object({
  sub: z.string(),
  role: z.string().min(1),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type JwtClaims = z.infer<typeof claimsSchema>;

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: JwtClaims;
    }
  }
}

export function requireJwt(req: Request, res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;

  if (!authHeader?.startsWith('Bearer ')) {
    res.status(401).json({ status: 'error', message: 'Missing or malformed Authorization header' });
    return;
  }

  const token = authHeader.slice(7);

  let payload: unknown;
  try {
    payload = jwt.verify(token, env.JWT_SECRET);
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      res.status(401).json({ status: 'error', message: 'Token expired' });
    } else {
      res.status(401).json({ status: 'error', message: 'Invalid token' });
    }
    return;
  }

  const claims = claimsSchema.safeParse(payload);
  if (!claims.success) {
    res.status(401).json({ status: 'error', message: 'Invalid token claims' });
    return;
  }
  req.user = claims.data;
  next();
}

export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  if (!req.user) {
    res.status(401).json({ status: 'error', message: 'Unauthenticated' });
    return;
  }
  if (req.user.role !== 'admin') {
    res.status(403).json({ status: 'error', message: 'Insufficient permissions' });
    return;
  }
  next();
}
