import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { ACTOR_ROLES } from '@parkalot/shared';
import type { ActorContext } from '../types/db.js';
import { UnauthorizedError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

/**
 * Users are authenticated upstream by the session gateway, which forwards
 * who is acting in headers and proves itself with a shared service token:
 *
 *   Authorization: Bearer <API_SERVICE_TOKEN>
 *   X-User-Id:     <uuid>
 *   X-User-Role:   customer | admin
 */
const actorHeadersSchema = z.object({
  'x-user-id': z.string().uuid(),
  'x-user-role': z.enum(ACTOR_ROLES).default('customer'),
});

function tokenMatches(token: string, expected: string): boolean {
  const a = Buffer.from(token);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function isActor(value: unknown): value is ActorContext {
  if (typeof value !== 'object' || value === null) return false;
  if (!('userId' in value) || typeof value.userId !== 'string' || !('role' in value)) return false;
  const role = value.role;
  return ACTOR_ROLES.some((r) => r === role);
}

/**
 * Resolve the acting user from gateway headers into `res.locals.actor`.
 * With `optional`, requests carrying no Authorization header pass through
 * anonymously; a header that is present must still be valid.
 */
export function requireActor(serviceToken: string, { optional = false } = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader && optional) {
      next();
      return;
    }

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      logger.warn({ ip: req.ip, path: req.path, reason: 'missing_token' }, 'Actor auth failed');
      res.status(401).json({ error: 'Missing or invalid Authorization header', code: 'UNAUTHORIZED' });
      return;
    }

    if (!tokenMatches(authHeader.slice(7), serviceToken)) {
      logger.warn({ ip: req.ip, path: req.path, reason: 'invalid_token' }, 'Actor auth failed');
      res.status(403).json({ error: 'Invalid service credentials', code: 'FORBIDDEN' });
      return;
    }

    const headers = actorHeadersSchema.safeParse(req.headers);
    if (!headers.success) {
      res.status(401).json({ error: 'Missing or invalid user context', code: 'UNAUTHORIZED' });
      return;
    }

    const actor: ActorContext = {
      userId: headers.data['x-user-id'],
      role: headers.data['x-user-role'],
    };
    res.locals.actor = actor;
    next();
  };
}

/** Required and optional variants of requireActor, built once per app. */
export interface ActorMiddleware {
  required: RequestHandler;
  optional: RequestHandler;
}

/** The actor resolved by requireActor. Throws when the route is not behind it. */
export function actorOf(res: Response): ActorContext {
  const actor: unknown = res.locals.actor;
  if (!isActor(actor)) throw new UnauthorizedError();
  return actor;
}

/** The actor when the request carried one (routes behind an optional requireActor). */
export function maybeActorOf(res: Response): ActorContext | undefined {
  const actor: unknown = res.locals.actor;
  return isActor(actor) ? actor : undefined;
}
