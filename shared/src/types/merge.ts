/**
 * Prompt merge types.
 */

export type MergeStrategy = 'simple' | 'separator' | 'numbered' | 'bulleted' | 'template';

/**
 * Strategy options. Each strategy reads only the keys it understands.
 * - simple: includeTitle
 * - separator: includeTitle, includeDescription, separator
 * - numbered: includeTitle, numberFormat ("{}" is replaced by the position)
 * - bulleted: includeTitle, bullet
 * - template: template
 */
export interface MergeOptions {
  includeTitle?: boolean;
  includeDescription?: boolean;
  separator?: string;
  numberFormat?: string;
  bullet?: string;
  template?: string;
}

export interface MergeRequest {
  promptIds: number[];
  /** One of {@link MergeStrategy}; other names are answered with UNSUPPORTED_STRATEGY. Defaults to simple. */
  strategy?: string;
  options?: MergeOptions;
}

export interface MergeMetadata {
  strategy: MergeStrategy;
  promptCount: number;
  promptIds: number[];
  promptTitles: string[];
  mergedAt: string;
  options: MergeOptions;
}

export interface MergeResponse {
  mergedContent: string;
  metadata: MergeMetadata;
  warnings: string[];
}

export interface MergeValidationRequest {
  promptIds: number[];
}

export interface MergeValidationResponse {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** In-process record of a completed merge, kept for introspection only. */
export interface MergeHistoryEntry extends MergeMetadata {
  contentLength: number;
}

export interface MergeHistoryResponse {
  history: MergeHistoryEntry[];
}
