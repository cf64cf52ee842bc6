import type { ErrorCode } from './errors.js';

export interface ApiError {
  code: ErrorCode;
  message: string;
  /**
   * Context for the failure, e.g. `missingIds` for unknown prompts, `path` for a
   * rejected attachment, or `fields` for schema violations.
   */
  details?: Record<string, unknown>;
}

/**
 * Body of every non-2xx JSON response.
 */
export interface ApiErrorResponse {
  error: ApiError;
}

/** 1-based page selection. The server caps pageSize at 100. */
export interface PageQuery {
  page?: number;
  pageSize?: number;
}

export interface PaginationMeta {
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
}

export interface PaginatedResponse<T> {
  items: T[];
  pagination: PaginationMeta;
}
