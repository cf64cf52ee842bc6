import type { PromptSummary } from './prompt.js';

/**
 * Favorite sets are user-owned, named, ordered bundles of prompts.
 */
export interface FavoriteSetResponse {
  id: number;
  name: string;
  description: string | null;
  isActive: boolean;
  prompts: PromptSummary[];
  createdAt: string;
  updatedAt: string;
}

export interface CreateFavoriteSetRequest {
  name: string;
  description?: string | null;
  promptIds?: number[];
}

/**
 * Request body for updating a favorite set.
 * `promptIds`, when given, replaces the whole item list.
 */
export interface UpdateFavoriteSetRequest {
  name?: string;
  description?: string | null;
  isActive?: boolean;
  promptIds?: number[];
}

export interface FavoriteSetListResponse {
  favoriteSets: FavoriteSetResponse[];
}
