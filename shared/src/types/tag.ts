/**
 * Tag-related types. Tag names are stored normalized (lowercase, hyphen-separated)
 * and are unique across the whole library.
 */

export interface TagResponse {
  id: number;
  name: string;
  color: string;
  createdAt: string;
}

/** Tag with the number of prompts it is applied to. */
export interface TagWithCountResponse extends TagResponse {
  promptCount: number;
}

export interface CreateTagRequest {
  name: string;
  color?: string;
}

/**
 * Request body for updating a tag.
 * All fields are optional; at least one must be provided.
 */
export interface UpdateTagRequest {
  name?: string;
  color?: string;
}

export interface MergeTagsRequest {
  sourceTagId: number;
  targetTagId: number;
}

export interface TagListResponse {
  tags: TagWithCountResponse[];
}
