/**
 * Machine-readable error codes used across all API error responses.
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'ROUTE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'CONFLICT'
  | 'INTERNAL_ERROR'
  // Attachment graph
  | 'SELF_ATTACHMENT'
  | 'DUPLICATE_ATTACHMENT'
  | 'CIRCULAR_ATTACHMENT'
  | 'ATTACHMENT_LIMIT_REACHED'
  | 'PROMPT_INACTIVE'
  // Merge engine
  | 'UNSUPPORTED_STRATEGY'
  | 'MERGE_VALIDATION_FAILED'
  // Access
  | 'ACCOUNT_PENDING'
  | 'ACCOUNT_DISABLED'
  | 'SELF_DISABLE'
  | 'OIDC_NOT_CONFIGURED';
