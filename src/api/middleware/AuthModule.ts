// API Middleware: Session authentication
// Every /api request names a sync session; the session carries the viewer role

import type { Request, Response, NextFunction } from 'express';
import { createError } from './errorHandler.js';
import type { SyncSession } from '@/domain/session/types.js';
import type { SessionSynchronizer } from '@/application/session/SessionSynchronizer.js';
import type { Requester } from '@/application/combat/FightService.js';

export const SESSION_COOKIE = 'syncSession';

/**
 * Extract the session token: Authorization header, then `?token=` (EventSource
 * cannot set headers), then the cookie
 */
export function extractSessionToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }

  const { token } = req.query;
  if (typeof token === 'string' && token) {
    return token;
  }

  const cookies: Record<string, unknown> = req.cookies ?? {};
  const cookie = cookies[SESSION_COOKIE];
  return typeof cookie === 'string' && cookie ? cookie : undefined;
}

/**
 * The session attached by `requireSession`
 */
export function sessionOf(req: Request): SyncSession {
  if (!req.syncSession) {
    throw createError('Authentication required', 401, 'AUTH_REQUIRED');
  }
  return req.syncSession;
}

export function requesterOf(req: Request): Requester {
  const session = sessionOf(req);
  return { role: session.role, sessionId: session.id };
}

export class AuthModule {
  constructor(private readonly sessions: SessionSynchronizer) {}

  /**
   * API middleware: resolve the session or fail with 401
   */
  requireSession = (req: Request, _res: Response, next: NextFunction): void => {
    const token = extractSessionToken(req);
    if (!token) {
      next(createError('Authentication required', 401, 'AUTH_REQUIRED'));
      return;
    }

    const session = this.sessions.getSession(token);
    if (!session) {
      next(createError('Invalid or expired session', 401, 'INVALID_SESSION'));
      return;
    }

    req.syncSession = session;
    next();
  };

  /**
   * DM-only middleware. Must be used AFTER requireSession
   */
  dmOnly = (req: Request, _res: Response, next: NextFunction): void => {
    if (req.syncSession?.role.kind !== 'dm') {
      next(createError('DM access required', 403, 'FORBIDDEN'));
      return;
    }
    next();
  };
}

export function createAuthModule(sessions: SessionSynchronizer): AuthModule {
  return new AuthModule(sessions);
}
