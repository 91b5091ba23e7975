/**
 * Error types shared by services, the session timer and the CLI.
 *
 * Every expected failure is an AppError with a `kind` the command layer
 * switches on; anything else reaching the CLI boundary is reported as
 * unexpected.
 */

import type { ZodIssue, ZodTypeAny, output } from 'zod';

export type ErrorKind =
  | 'state-conflict'
  | 'not-found'
  | 'validation'
  | 'persistence'
  | 'template';

export class AppError extends Error {
  readonly kind: ErrorKind;
  details?: unknown;

  constructor(kind: ErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.kind = kind;
    this.details = details;
  }
}

/** Operation not allowed in the current state (duplicate record, timer already running...) */
export class StateConflictError extends AppError {
  constructor(message: string) {
    super('state-conflict', message);
    this.name = 'StateConflictError';
  }
}

export class AlreadyRunningError extends StateConflictError {
  constructor() {
    super('A session is already running! Stop it first.');
    this.name = 'AlreadyRunningError';
  }
}

export class NotRunningError extends StateConflictError {
  constructor(action = 'stop') {
    super(`No active session to ${action}.`);
    this.name = 'NotRunningError';
  }
}

export class NotPausedError extends StateConflictError {
  constructor() {
    super('No paused session to resume.');
    this.name = 'NotPausedError';
  }
}

export class NotFoundError extends AppError {
  readonly entity: string;
  readonly id: number | string;

  constructor(entity: string, id: number | string) {
    super('not-found', `${entity} not found: ${id}`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

export class ValidationError extends AppError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super('validation', message, issues);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Storage unreachable, corrupt, or returned a row that does not decode */
export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('persistence', message, cause);
    this.name = 'PersistenceError';
  }
}

export class TemplateError extends AppError {
  constructor(message: string) {
    super('template', message);
    this.name = 'TemplateError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Parse command input with a zod schema; failures become a ValidationError
 * carrying every issue.
 */
export function validate<S extends ZodTypeAny>(schema: S, input: unknown, message = 'Invalid input'): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, result.error.issues);
  }
  return result.data;
}
