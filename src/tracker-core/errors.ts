import type { Location, RejectionReason } from '@shared/types';

export type ProcessErrorType =
  | 'validation'
  | 'conflict'
  | 'not_found'
  | 'illegal_transition';

export interface ProcessFailure {
  type: ProcessErrorType;
  reason: RejectionReason;
  message: string;
  departments: Location[];
}

/**
 * Base class for every rejection the engine reports as a typed result.
 * Anything thrown that is not a ProcessError is a storage fault.
 */
export abstract class ProcessError extends Error {
  abstract readonly type: ProcessErrorType;
  abstract readonly status: number;

  constructor(
    public readonly reason: RejectionReason,
    message: string,
    public readonly departments: Location[] = [],
  ) {
    super(message);
  }

  toFailure(): ProcessFailure {
    return {
      type: this.type,
      reason: this.reason,
      message: this.message,
      departments: [...this.departments],
    };
  }
}

export class ValidationError extends ProcessError {
  readonly type = 'validation';
  readonly status = 400;

  constructor(reason: RejectionReason, message: string, departments?: Location[]) {
    super(reason, message, departments);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends ProcessError {
  readonly type = 'conflict';
  readonly status = 409;

  constructor(reason: RejectionReason, message: string, departments?: Location[]) {
    super(reason, message, departments);
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends ProcessError {
  readonly type = 'not_found';
  readonly status = 404;

  constructor(reason: RejectionReason, message: string) {
    super(reason, message);
    this.name = 'NotFoundError';
  }
}

export class IllegalTransitionError extends ProcessError {
  readonly type = 'illegal_transition';
  readonly status = 422;

  constructor(reason: RejectionReason, message: string, departments?: Location[]) {
    super(reason, message, departments);
    this.name = 'IllegalTransitionError';
  }
}

export const ERROR_STATUS: Record<ProcessErrorType, number> = {
  validation: 400,
  conflict: 409,
  not_found: 404,
  illegal_transition: 422,
};

/** Picks the error class a rejection reason is reported under. */
export function errorForRejection(
  reason: RejectionReason,
  message: string,
  departments: Location[] = [],
): ProcessError {
  switch (reason) {
    case 'duplicate-active-department':
    case 'relational-key-conflict':
    case 'duplicate-field':
      return new ConflictError(reason, message, departments);
    case 'unknown-instance':
    case 'unknown-field':
      return new NotFoundError(reason, message);
    case 'already-closed':
    case 'illegal-transition':
      return new IllegalTransitionError(reason, message, departments);
    default:
      return new ValidationError(reason, message, departments);
  }
}
