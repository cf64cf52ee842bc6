import type { ErrorCode } from '@promptdeck/shared';

/**
 * Base application error with a typed error code and HTTP status.
 * All known application errors should extend this class.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    statusCode: number,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', 404, message, details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', 400, message, details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', 401, message, details);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden', details?: Record<string, unknown>) {
    super('FORBIDDEN', 403, message, details);
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Resource conflict', details?: Record<string, unknown>) {
    super('CONFLICT', 409, message, details);
    this.name = 'ConflictError';
  }
}

export class SelfAttachmentError extends AppError {
  constructor(message = 'A prompt cannot be attached to itself', details?: { promptId: number }) {
    super('SELF_ATTACHMENT', 400, message, details);
    this.name = 'SelfAttachmentError';
  }
}

export class InactivePromptError extends AppError {
  constructor(message = 'Inactive prompts cannot be attached', details?: { promptId: number }) {
    super('PROMPT_INACTIVE', 400, message, details);
    this.name = 'InactivePromptError';
  }
}

export class DuplicateAttachmentError extends AppError {
  constructor(
    message = 'Prompt is already attached',
    details?: { mainPromptId: number; attachedPromptId: number },
  ) {
    super('DUPLICATE_ATTACHMENT', 409, message, details);
    this.name = 'DuplicateAttachmentError';
  }
}

export class CircularAttachmentError extends AppError {
  constructor(
    message = 'Attaching this prompt would create a circular reference',
    details?: { path: number[] },
  ) {
    super('CIRCULAR_ATTACHMENT', 409, message, details);
    this.name = 'CircularAttachmentError';
  }
}

export class AttachmentLimitError extends AppError {
  constructor(message = 'Attachment limit reached', details?: { limit: number }) {
    super('ATTACHMENT_LIMIT_REACHED', 409, message, details);
    this.name = 'AttachmentLimitError';
  }
}

export class UnsupportedStrategyError extends AppError {
  constructor(strategy: string) {
    super('UNSUPPORTED_STRATEGY', 400, `Unknown merge strategy: ${strategy}`, { strategy });
    this.name = 'UnsupportedStrategyError';
  }
}

export class MergeValidationError extends AppError {
  constructor(errors: string[], warnings: string[] = []) {
    super('MERGE_VALIDATION_FAILED', 400, errors.join('; '), { errors, warnings });
    this.name = 'MergeValidationError';
  }
}

export class AccountPendingError extends AppError {
  constructor(message = 'Account is awaiting approval') {
    super('ACCOUNT_PENDING', 403, message);
    this.name = 'AccountPendingError';
  }
}

export class AccountDisabledError extends AppError {
  constructor(message = 'Account is disabled') {
    super('ACCOUNT_DISABLED', 403, message);
    this.name = 'AccountDisabledError';
  }
}

export class SelfDisableError extends AppError {
  constructor(message = 'You cannot disable your own account') {
    super('SELF_DISABLE', 400, message);
    this.name = 'SelfDisableError';
  }
}

export class OidcNotConfiguredError extends AppError {
  constructor(message = 'OIDC is not configured') {
    super('OIDC_NOT_CONFIGURED', 404, message);
    this.name = 'OidcNotConfiguredError';
  }
}
