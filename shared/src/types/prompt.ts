import type { PageQuery } from './api.js';
import type { TagResponse } from './tag.js';

/**
 * Compact prompt shape used inside other responses (attachments, favorite sets).
 */
export interface PromptSummary {
  id: number;
  title: string;
  description: string | null;
  isActive: boolean;
}

export interface PromptResponse {
  id: number;
  title: string;
  content: string;
  description: string | null;
  isActive: boolean;
  sortOrder: number;
  userId: string | null;
  tags: TagResponse[];
  attachedCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface CreatePromptRequest {
  title: string;
  content: string;
  description?: string | null;
  /** Tag names; normalized and created on demand. */
  tags?: string[];
}

/**
 * Request body for updating a prompt.
 * All fields are optional; `tags` replaces the full tag set when given.
 */
export interface UpdatePromptRequest {
  title?: string;
  content?: string;
  description?: string | null;
  isActive?: boolean;
  tags?: string[];
}

export type PromptSortBy = 'order' | 'created' | 'updated' | 'title';
export type SortDirection = 'asc' | 'desc';

export interface PromptListQuery extends PageQuery {
  q?: string;
  /** Comma-separated tag names. */
  tag?: string;
  tagMatch?: 'any' | 'all';
  /** 'true' (default), 'false', or 'all' */
  isActive?: 'true' | 'false' | 'all';
  createdAfter?: string;
  createdBefore?: string;
  sortBy?: PromptSortBy;
  sortOrder?: SortDirection;
}

export interface DuplicatePromptRequest {
  title?: string;
}

export interface BulkReorderRequest {
  promptIds: number[];
}

export interface BulkReorderResponse {
  updated: number;
}

export interface PromptStatistics {
  total: number;
  active: number;
  inactive: number;
  activePercentage: number;
}
