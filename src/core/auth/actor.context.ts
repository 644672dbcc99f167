/**
 * Caller identity
 *
 * The upstream gateway authenticates and forwards the caller as
 * x-tenant-id / x-user-id / x-role. Only owner and manager may mutate.
 */

import type { FastifyRequest } from 'fastify';
import { ForbiddenError, UnauthorizedError } from '../../common/errors.js';

export const ROLES = ['owner', 'manager', 'reviewer', 'viewer'] as const;
export type Role = (typeof ROLES)[number];

export const WRITE_ROLES: readonly Role[] = ['owner', 'manager'];

export interface Actor {
  tenantId: string;
  userId: string;
  role: Role;
}

function header(req: FastifyRequest, name: string): string | null {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() ? first.trim() : null;
}

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export function actorFrom(req: FastifyRequest): Actor {
  const tenantId = header(req, 'x-tenant-id');
  const userId = header(req, 'x-user-id');
  const role = header(req, 'x-role');

  if (!tenantId || !userId || !role) {
    throw new UnauthorizedError('x-tenant-id, x-user-id and x-role headers are required');
  }
  if (!isRole(role)) {
    throw new UnauthorizedError(`Unknown role: ${role}`);
  }
  return { tenantId, userId, role };
}

/** Fastify preHandler: identity required, role must be in `roles`. */
export function requireRoles(roles: readonly Role[]) {
  return async (req: FastifyRequest): Promise<void> => {
    const actor = actorFrom(req);
    if (!roles.includes(actor.role)) {
      throw new ForbiddenError(`Role ${actor.role} may not perform this action`);
    }
  };
}

export const requireReader = requireRoles(ROLES);
export const requireWriter = requireRoles(WRITE_ROLES);
