import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';

import { env } from '../env';

export interface AuthenticatedUser {
  id: string;
  email: string | null;
  role: string;
}

// Extend Express Request to include user
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

export interface AccessTokenClaims {
  sub: string;
  email?: string;
  role?: string;
}

const ACCESS_TOKEN_TTL = '1h';

export function signAccessToken(claims: AccessTokenClaims, secret: string = env.JWT_SECRET): string {
  return jwt.sign({ email: claims.email, role: claims.role }, secret, {
    subject: claims.sub,
    expiresIn: ACCESS_TOKEN_TTL,
  });
}

export function verifyAccessToken(token: string, secret: string = env.JWT_SECRET): AuthenticatedUser | null {
  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === 'string' || !decoded.sub) {
      return null;
    }
    return {
      id: decoded.sub,
      email: typeof decoded.email === 'string' ? decoded.email : null,
      role: typeof decoded.role === 'string' ? decoded.role : 'user',
    };
  } catch {
    return null;
  }
}

const buildDevUser = (): AuthenticatedUser | null => {
  if (env.NODE_ENV !== 'development') {
    return null;
  }
  return {
    id: process.env.DEV_AUTO_USER_ID || 'dev-user',
    email: process.env.DEV_AUTO_USER_EMAIL || 'developer@local.test',
    role: 'developer',
  };
};

function readBearerToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  const token = authHeader && authHeader.startsWith('Bearer ') ? authHeader.slice('Bearer '.length).trim() : undefined;
  return token && token !== 'null' && token !== 'undefined' ? token : undefined;
}

export const authenticateToken = (req: Request, res: Response, next: NextFunction) => {
  const token = readBearerToken(req);

  if (!token) {
    const devUser = buildDevUser();
    if (devUser) {
      req.user = devUser;
      return next();
    }
    return res.status(401).json({ success: false, error: 'Access token required', code: 'UNAUTHENTICATED' });
  }

  const user = verifyAccessToken(token);
  if (!user) {
    return res.status(401).json({ success: false, error: 'Invalid or expired token', code: 'UNAUTHENTICATED' });
  }

  req.user = user;
  next();
};

/** Reads the authenticated user set by {@link authenticateToken}. */
export function requireUser(req: Request): AuthenticatedUser {
  if (!req.user) {
    throw new Error('authenticateToken must run before this handler');
  }
  return req.user;
}
