import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import { config } from '../config.js';

export const TOKEN_TTL = '7d';

const operatorClaimsSchema = z.object({
  role: z.literal('operator'),
  sub: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type OperatorClaims = z.infer<typeof operatorClaimsSchema>;

const loginSchema = z.object({
  password: z.string().min(1),
});

export function issueOperatorToken(secret: string = config.jwtSecret): string {
  return jwt.sign({ role: 'operator', sub: config.operatorName }, secret, { expiresIn: TOKEN_TTL });
}

/** Claims of a valid, unexpired operator token; null for anything else. */
export function verifyOperatorToken(token: string, secret: string = config.jwtSecret): OperatorClaims | null {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    return null;
  }
  const claims = operatorClaimsSchema.safeParse(decoded);
  return claims.success ? claims.data : null;
}

function bearerToken(header: string | undefined): string | null {
  const match = header ? /^Bearer (.+)$/.exec(header) : null;
  return match ? match[1] : null;
}

/** Mounted after the public routes; everything behind it needs an operator token. */
export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  const token = bearerToken(req.headers.authorization);
  if (!token) {
    res.status(401).json({ error: 'Authentication required' });
    return;
  }

  const claims = verifyOperatorToken(token);
  if (!claims) {
    res.status(401).json({ error: 'Invalid or expired token' });
    return;
  }

  res.locals.operator = claims;
  next();
}

/** POST /api/auth/login { password } */
export function handleLogin(req: Request, res: Response): void {
  const body = loginSchema.safeParse(req.body);
  if (!body.success || body.data.password !== config.operatorPassword) {
    res.status(401).json({ error: 'Invalid password' });
    return;
  }

  console.log('[Auth] Operator logged in');
  res.json({ token: issueOperatorToken(), expiresIn: TOKEN_TTL });
}
