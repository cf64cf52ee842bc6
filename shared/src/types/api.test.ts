import { describe, it, expect } from '@jest/globals';
import type { ApiError, ApiErrorResponse } from './api.js';
import type { ErrorCode } from './errors.js';

describe('API types', () => {
  it('should satisfy the ApiErrorResponse shape', () => {
    const response: ApiErrorResponse = {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'Test error message',
      },
    };

    expect(response.error.code).toBe('INTERNAL_ERROR');
    expect(response.error.message).toBe('Test error message');
  });

  it('should allow optional details', () => {
    const error: ApiError = {
      code: 'CIRCULAR_ATTACHMENT',
      message: 'Attaching would create a cycle',
      details: { path: [3, 2, 1] },
    };

    expect(error.details).toEqual({ path: [3, 2, 1] });
  });
});

describe('ErrorCode type', () => {
  it('should include the attachment graph codes', () => {
    const codes: ErrorCode[] = [
      'SELF_ATTACHMENT',
      'DUPLICATE_ATTACHMENT',
      'CIRCULAR_ATTACHMENT',
      'ATTACHMENT_LIMIT_REACHED',
      'PROMPT_INACTIVE',
    ];

    expect(codes).toHaveLength(5);
    expect(codes).toContain('CIRCULAR_ATTACHMENT');
  });

  it('should include the merge and access codes', () => {
    const codes: ErrorCode[] = [
      'UNSUPPORTED_STRATEGY',
      'MERGE_VALIDATION_FAILED',
      'ACCOUNT_PENDING',
      'ACCOUNT_DISABLED',
      'SELF_DISABLE',
      'OIDC_NOT_CONFIGURED',
    ];

    expect(codes).toHaveLength(6);
    expect(codes).toContain('UNSUPPORTED_STRATEGY');
  });
});
