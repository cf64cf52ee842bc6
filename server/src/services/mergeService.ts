import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import type {
  MergeOptions,
  MergeResponse,
  MergeHistoryEntry,
  MergeValidationResponse,
} from '@promptdeck/shared';
import { MergeValidationError, NotFoundError, UnsupportedStrategyError } from '../errors/AppError.js';
import { LARGE_MERGE_WARNING_CHARS } from '../constants.js';
import { composeMerge, isMergeStrategy } from './mergeEngine.js';
import type { MergeablePrompt } from './mergeEngine.js';
import { getPromptsByIds } from './promptService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

const MIN_MERGE_PROMPTS = 2;

/**
 * Bounded in-memory log of completed merges. Oldest entries are evicted once
 * the capacity is reached; nothing is persisted.
 */
export class MergeHistory {
  private readonly entries: { userId: string | null; entry: MergeHistoryEntry }[] = [];

  constructor(readonly capacity = 100) {}

  record(entry: MergeHistoryEntry, userId: string | null = null): void {
    this.entries.push({ userId, entry });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /**
   * Most recent entries first. With `userId`, only that user's merges.
   */
  recent(limit = 10, userId?: string): MergeHistoryEntry[] {
    const result: MergeHistoryEntry[] = [];
    for (let i = this.entries.length - 1; i >= 0 && result.length < limit; i--) {
      const item = this.entries[i];
      if (userId === undefined || item.userId === userId) {
        result.push(item.entry);
      }
    }
    return result;
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries.length = 0;
  }
}

function findDuplicates(ids: number[]): number[] {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

function missingIdsMessage(missingIds: number[]): string {
  return `Prompts not found: ${missingIds.join(', ')}`;
}

/**
 * Load prompts and put them back into the caller's order.
 */
function loadInOrder(
  db: DbType,
  promptIds: number[],
): { prompts: MergeablePrompt[]; missingIds: number[] } {
  const byId = new Map(getPromptsByIds(db, promptIds).map((row) => [row.id, row]));
  const prompts: MergeablePrompt[] = [];
  const missingIds: number[] = [];

  for (const id of promptIds) {
    const row = byId.get(id);
    if (row) {
      prompts.push({
        id: row.id,
        title: row.title,
        content: row.content,
        description: row.description,
        isActive: row.isActive,
      });
    } else if (!missingIds.includes(id)) {
      missingIds.push(id);
    }
  }

  return { prompts, missingIds };
}

function collectWarnings(prompts: MergeablePrompt[], contentLength: number): string[] {
  const warnings: string[] = [];
  const inactive = prompts.filter((p) => !p.isActive).length;
  if (inactive > 0) {
    warnings.push(`${inactive} inactive prompt(s) included`);
  }
  if (contentLength > LARGE_MERGE_WARNING_CHARS) {
    warnings.push(`Large merged content size: ${contentLength} characters`);
  }
  return warnings;
}

/**
 * Check whether a list of prompt ids can be merged, without merging.
 * The size warning uses the summed raw content length.
 */
export function validateMerge(db: DbType, promptIds: number[]): MergeValidationResponse {
  const errors: string[] = [];

  if (promptIds.length < MIN_MERGE_PROMPTS) {
    errors.push('At least 2 prompts required for merging');
  }
  if (findDuplicates(promptIds).length > 0) {
    errors.push('Duplicate prompt IDs found');
  }

  const { prompts, missingIds } = loadInOrder(db, promptIds);
  if (missingIds.length > 0) {
    errors.push(missingIdsMessage(missingIds));
  }

  const totalLength = prompts.reduce((sum, p) => sum + p.content.length, 0);

  return {
    valid: errors.length === 0,
    errors,
    warnings: collectWarnings(prompts, totalLength),
  };
}

export interface MergeContext {
  history?: MergeHistory;
  userId?: string | null;
}

/**
 * Merge prompts in the order their ids are given.
 *
 * @throws UnsupportedStrategyError for an unknown strategy
 * @throws MergeValidationError if fewer than two ids or duplicate ids are given
 * @throws NotFoundError naming the ids that do not exist
 * @throws ValidationError from the engine (e.g. empty template)
 */
export function mergePrompts(
  db: DbType,
  promptIds: number[],
  strategy: string = 'simple',
  options: MergeOptions = {},
  context: MergeContext = {},
): MergeResponse {
  if (!isMergeStrategy(strategy)) {
    throw new UnsupportedStrategyError(strategy);
  }

  const errors: string[] = [];
  if (promptIds.length < MIN_MERGE_PROMPTS) {
    errors.push('At least 2 prompts required for merging');
  }
  if (findDuplicates(promptIds).length > 0) {
    errors.push('Duplicate prompt IDs found');
  }
  if (errors.length > 0) {
    throw new MergeValidationError(errors);
  }

  const { prompts, missingIds } = loadInOrder(db, promptIds);
  if (missingIds.length > 0) {
    throw new NotFoundError(missingIdsMessage(missingIds), { missingIds });
  }

  const mergedContent = composeMerge(strategy, prompts, options);
  const metadata = {
    strategy,
    promptCount: prompts.length,
    promptIds: prompts.map((p) => p.id),
    promptTitles: prompts.map((p) => p.title),
    mergedAt: new Date().toISOString(),
    options,
  };

  context.history?.record(
    { ...metadata, contentLength: mergedContent.length },
    context.userId ?? null,
  );

  return {
    mergedContent,
    metadata,
    warnings: collectWarnings(prompts, mergedContent.length),
  };
}
