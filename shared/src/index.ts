/**
 * @promptdeck/shared
 *
 * API request/response shapes shared by the server and any client.
 * Types only; nothing here is emitted at runtime.
 */

export type {
  ApiError,
  ApiErrorResponse,
  PageQuery,
  PaginationMeta,
  PaginatedResponse,
} from './types/api.js';
export type { ErrorCode } from './types/errors.js';

// Users & access
export type {
  UserRole,
  UserStatus,
  AccessPolicy,
  UserResponse,
  UpdateProfileRequest,
  AdminUserListQuery,
  ApproveUserRequest,
  AllowlistEntryResponse,
  CreateAllowlistEntryRequest,
  AuthMeResponse,
} from './types/user.js';

// Tags
export type {
  TagResponse,
  TagWithCountResponse,
  CreateTagRequest,
  UpdateTagRequest,
  MergeTagsRequest,
  TagListResponse,
} from './types/tag.js';

// Prompts
export type {
  PromptSummary,
  PromptResponse,
  CreatePromptRequest,
  UpdatePromptRequest,
  PromptSortBy,
  SortDirection,
  PromptListQuery,
  DuplicatePromptRequest,
  BulkReorderRequest,
  BulkReorderResponse,
  PromptStatistics,
} from './types/prompt.js';

// Attachments
export type {
  AttachmentResponse,
  AttachPromptRequest,
  AttachmentOrderEntry,
  ReorderAttachmentsRequest,
  AttachmentListResponse,
  AvailablePromptsResponse,
  AttachmentValidationResponse,
  PopularCombination,
  PopularCombinationsResponse,
} from './types/attachment.js';

// Merge
export type {
  MergeStrategy,
  MergeOptions,
  MergeRequest,
  MergeMetadata,
  MergeResponse,
  MergeValidationRequest,
  MergeValidationResponse,
  MergeHistoryEntry,
  MergeHistoryResponse,
} from './types/merge.js';

// Favorite sets
export type {
  FavoriteSetResponse,
  CreateFavoriteSetRequest,
  UpdateFavoriteSetRequest,
  FavoriteSetListResponse,
} from './types/favoriteSet.js';
