/**
 * Request-facing errors.
 *
 * Anything thrown from a route that extends AppError is rendered as
 * { ok: false, error: code, message } with its status code.
 * Run lifecycle failures are NOT here: they are recorded on the run.
 */

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Missing caller identity') {
    super(401, 'UNAUTHORIZED', message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Action not permitted for this role') {
    super(403, 'FORBIDDEN', message);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(404, 'NOT_FOUND', `${entity} not found: ${id}`);
  }
}

export class QuotaExceededError extends AppError {
  constructor(message: string) {
    super(429, 'QUOTA_EXCEEDED', message);
  }
}

export class InvalidStateTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(409, 'INVALID_STATE_TRANSITION', `Invalid transition from ${from} to ${to}`, { from, to });
  }
}

export class RunNotReadyError extends AppError {
  constructor(runId: string, state: string) {
    super(409, 'RUN_NOT_READY', `Training run ${runId} is ${state}, expected READY`, { runId, state });
  }
}

export class DuplicateVersionError extends AppError {
  constructor(projectId: string, versionLabel: string) {
    super(409, 'DUPLICATE_VERSION', `Version ${versionLabel} already exists for project ${projectId}`);
  }
}

export class NoActiveDeploymentError extends AppError {
  constructor(projectId: string) {
    super(404, 'NO_ACTIVE_DEPLOYMENT', `No active deployment for project ${projectId}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
