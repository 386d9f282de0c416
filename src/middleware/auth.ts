import type { Request, Response, NextFunction } from 'express';
import { UnauthenticatedError } from '../errors.js';
import type { User } from '../db/models/User.js';
import type { AppContext } from '../types/context.js';
import { verifyPassword } from '../services/passwords.js';
import { resolveToken } from '../services/tokens.js';

export interface AuthRequest extends Request {
  user?: User;
}

export interface BasicCredentials {
  email: string;
  password: string;
}

export function parseBasicCredentials(header: string | undefined): BasicCredentials | null {
  const match = header?.match(/^Basic\s+(\S+)\s*$/i);
  if (!match) {
    return null;
  }

  const decoded = Buffer.from(match[1], 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator < 0) {
    return null;
  }

  return {
    email: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

export function parseBearerToken(header: string | undefined): string | null {
  // Auth schemes are case-insensitive
  const match = header?.match(/^Bearer\s+(\S+)\s*$/i);
  return match ? match[1] : null;
}

function challenge(res: Response, scheme: 'Basic' | 'Bearer', message: string): void {
  res.setHeader('WWW-Authenticate', `${scheme} realm="Authentication Required"`);
  res.status(401).json({ error: message });
}

// Middleware: email/password over HTTP Basic (login only)
export function requirePassword(ctx: AppContext) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const credentials = parseBasicCredentials(req.headers.authorization);
    if (!credentials) {
      challenge(res, 'Basic', 'Authentication required');
      return;
    }

    ctx.store.findUserByEmail(credentials.email)
      .then(async (user) => {
        if (!user || !(await verifyPassword(credentials.password, user.password))) {
          challenge(res, 'Basic', 'Invalid email or password');
          return;
        }
        req.user = user;
        next();
      })
      .catch((error: unknown) => {
        console.error('Password authentication error:', error);
        res.status(500).json({ error: 'Authentication failed' });
      });
  };
}

// Middleware: opaque bearer token
export function requireToken(ctx: AppContext) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const token = parseBearerToken(req.headers.authorization);
    if (!token) {
      challenge(res, 'Bearer', 'Authentication required');
      return;
    }

    resolveToken(ctx.store, token)
      .then((user) => {
        if (!user) {
          challenge(res, 'Bearer', 'Invalid or expired token');
          return;
        }
        req.user = user;
        next();
      })
      .catch((error: unknown) => {
        console.error('Token authentication error:', error);
        res.status(500).json({ error: 'Authentication failed' });
      });
  };
}

// Identity bound by requireToken/requirePassword for this request
export function currentUser(req: AuthRequest): User {
  if (!req.user) {
    throw new UnauthenticatedError();
  }
  return req.user;
}

// Middleware: Require admin role
export function requireAdmin(req: AuthRequest, res: Response, next: NextFunction): void {
  if (!req.user) {
    res.status(401).json({ error: 'Authentication required' });
    return;
  }
  if (!req.user.is_admin) {
    res.status(403).json({ error: 'Admin access required' });
    return;
  }
  next();
}
