import type { PromptSummary } from './prompt.js';

/**
 * A directed attachment edge: `attachedPrompt` is bundled under the main prompt.
 */
export interface AttachmentResponse {
  id: number;
  mainPromptId: number;
  attachedPromptId: number;
  sortOrder: number;
  usageCount: number;
  createdAt: string;
  attachedPrompt: PromptSummary;
}

export interface AttachPromptRequest {
  attachedPromptId: number;
}

export interface AttachmentOrderEntry {
  attachedPromptId: number;
  order: number;
}

export interface ReorderAttachmentsRequest {
  orderData: AttachmentOrderEntry[];
}

export interface AttachmentListResponse {
  attachments: AttachmentResponse[];
}

export interface AvailablePromptsResponse {
  prompts: PromptSummary[];
}

export interface AttachmentValidationResponse {
  valid: boolean;
  errors: string[];
}

export interface PopularCombination {
  mainPromptId: number;
  mainPromptTitle: string;
  attachedPromptId: number;
  attachedPromptTitle: string;
  usageCount: number;
}

export interface PopularCombinationsResponse {
  combinations: PopularCombination[];
}
