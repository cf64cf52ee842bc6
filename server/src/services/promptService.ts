import { eq, and, or, gte, lte, asc, desc, inArray, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { prompts, tags, promptTags, attachedPrompts } from '../db/schema.js';
import type {
  CreatePromptRequest,
  UpdatePromptRequest,
  PromptResponse,
  PromptSummary,
  PromptListQuery,
  PromptSortBy,
  PromptStatistics,
  PageQuery,
  PaginatedResponse,
  SortDirection,
  TagResponse,
} from '@promptdeck/shared';
import { NotFoundError, ValidationError } from '../errors/AppError.js';
import { MAX_PROMPT_TITLE_LENGTH } from '../constants.js';
import { getOrCreateTags, parseTagString } from './tagService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;
type PromptRow = typeof prompts.$inferSelect;

const MAX_PAGE_SIZE = 100;

export function toPromptSummary(prompt: PromptRow): PromptSummary {
  return {
    id: prompt.id,
    title: prompt.title,
    description: prompt.description,
    isActive: prompt.isActive,
  };
}

function getPromptTags(db: DbType, promptId: number): TagResponse[] {
  return db
    .select({ id: tags.id, name: tags.name, color: tags.color, createdAt: tags.createdAt })
    .from(promptTags)
    .innerJoin(tags, eq(tags.id, promptTags.tagId))
    .where(eq(promptTags.promptId, promptId))
    .orderBy(asc(tags.name))
    .all();
}

function countAttached(db: DbType, promptId: number): number {
  const result = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(attachedPrompts)
    .where(eq(attachedPrompts.mainPromptId, promptId))
    .get();
  return result?.count ?? 0;
}

export function toPromptResponse(db: DbType, prompt: PromptRow): PromptResponse {
  return {
    id: prompt.id,
    title: prompt.title,
    content: prompt.content,
    description: prompt.description,
    isActive: prompt.isActive,
    sortOrder: prompt.sortOrder,
    userId: prompt.userId,
    tags: getPromptTags(db, prompt.id),
    attachedCount: countAttached(db, prompt.id),
    createdAt: prompt.createdAt,
    updatedAt: prompt.updatedAt,
  };
}

function validateTitle(raw: string): string {
  const title = raw.trim();
  if (title.length === 0) {
    throw new ValidationError('Title is required');
  }
  if (title.length > MAX_PROMPT_TITLE_LENGTH) {
    throw new ValidationError(`Title must be at most ${MAX_PROMPT_TITLE_LENGTH} characters`);
  }
  return title;
}

function validateContent(raw: string): string {
  const content = raw.trim();
  if (content.length === 0) {
    throw new ValidationError('Content is required');
  }
  return content;
}

function normalizeDescription(raw: string | null | undefined): string | null {
  const description = raw?.trim();
  return description ? description : null;
}

function getNextSortOrder(db: DbType): number {
  const result = db
    .select({ maxOrder: sql<number>`COALESCE(MAX(${prompts.sortOrder}), -1)` })
    .from(prompts)
    .get();

  return (result?.maxOrder ?? -1) + 1;
}

function replacePromptTags(db: DbType, promptId: number, tagNames: string[]): void {
  db.delete(promptTags).where(eq(promptTags.promptId, promptId)).run();
  const resolved = getOrCreateTags(db, tagNames);
  if (resolved.length > 0) {
    db.insert(promptTags)
      .values(resolved.map((tag) => ({ promptId, tagId: tag.id })))
      .run();
  }
}

/**
 * Look up a prompt row by id.
 */
export function getPromptById(db: DbType, id: number): PromptRow | undefined {
  return db.select().from(prompts).where(eq(prompts.id, id)).get();
}

/**
 * Look up several prompt rows. Missing ids are skipped and the result order is
 * unspecified; callers re-sort as needed.
 */
export function getPromptsByIds(db: DbType, ids: number[]): PromptRow[] {
  if (ids.length === 0) {
    return [];
  }
  return db.select().from(prompts).where(inArray(prompts.id, ids)).all();
}

/**
 * @throws NotFoundError if prompt does not exist
 */
export function requirePrompt(db: DbType, id: number): PromptRow {
  const prompt = getPromptById(db, id);
  if (!prompt) {
    throw new NotFoundError('Prompt not found', { promptId: id });
  }
  return prompt;
}

export function getPromptDetail(db: DbType, id: number): PromptResponse {
  return toPromptResponse(db, requirePrompt(db, id));
}

/**
 * Create a prompt at the end of the manual ordering.
 * @throws ValidationError if title or content is blank, or the title is too long
 */
export function createPrompt(
  db: DbType,
  userId: string | null,
  data: CreatePromptRequest,
): PromptResponse {
  const title = validateTitle(data.title);
  const content = validateContent(data.content);
  const now = new Date().toISOString();

  const row = db.transaction(() => {
    const inserted = db
      .insert(prompts)
      .values({
        title,
        content,
        description: normalizeDescription(data.description),
        isActive: true,
        sortOrder: getNextSortOrder(db),
        userId,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();

    if (data.tags) {
      replacePromptTags(db, inserted.id, data.tags);
    }
    return inserted;
  });

  return toPromptResponse(db, row);
}

/**
 * Partially update a prompt. `tags`, when present, replaces the tag set.
 * @throws NotFoundError if prompt does not exist
 * @throws ValidationError if no fields provided or a field is invalid
 */
export function updatePrompt(db: DbType, id: number, data: UpdatePromptRequest): PromptResponse {
  const existing = requirePrompt(db, id);

  if (
    data.title === undefined &&
    data.content === undefined &&
    data.description === undefined &&
    data.isActive === undefined &&
    data.tags === undefined
  ) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof prompts.$inferInsert> = { updatedAt: new Date().toISOString() };
  if (data.title !== undefined) updates.title = validateTitle(data.title);
  if (data.content !== undefined) updates.content = validateContent(data.content);
  if (data.description !== undefined) updates.description = normalizeDescription(data.description);
  if (data.isActive !== undefined) updates.isActive = data.isActive;

  const tagNames = data.tags;
  const row = db.transaction(() => {
    const updated = db.update(prompts).set(updates).where(eq(prompts.id, id)).returning().get();
    if (tagNames !== undefined) {
      replacePromptTags(db, id, tagNames);
    }
    return updated ?? existing;
  });

  return toPromptResponse(db, row);
}

/**
 * Soft delete: clear the active flag, keep the row and its edges.
 * @returns true when a prompt was updated
 */
export function markInactive(db: DbType, id: number): boolean {
  const result = db
    .update(prompts)
    .set({ isActive: false, updatedAt: new Date().toISOString() })
    .where(eq(prompts.id, id))
    .run();
  return result.changes > 0;
}

/**
 * Hard delete: remove the row; tags links, attachment edges and favorite-set
 * items referencing it cascade.
 * @returns true when a prompt was removed
 */
export function removePrompt(db: DbType, id: number): boolean {
  const result = db.delete(prompts).where(eq(prompts.id, id)).run();
  return result.changes > 0;
}

/**
 * Delete a prompt, softly unless `hard` is set.
 * @throws NotFoundError if prompt does not exist
 */
export function deletePrompt(db: DbType, id: number, options: { hard?: boolean } = {}): void {
  const removed = options.hard ? removePrompt(db, id) : markInactive(db, id);
  if (!removed) {
    throw new NotFoundError('Prompt not found', { promptId: id });
  }
}

/**
 * Reactivate a soft-deleted prompt.
 * @throws NotFoundError if prompt does not exist
 */
export function restorePrompt(db: DbType, id: number): PromptResponse {
  requirePrompt(db, id);
  const row = db
    .update(prompts)
    .set({ isActive: true, updatedAt: new Date().toISOString() })
    .where(eq(prompts.id, id))
    .returning()
    .get();
  return toPromptResponse(db, row ?? requirePrompt(db, id));
}

/**
 * Copy a prompt (content, description and tags) into a new active prompt
 * titled "Copy of <title>" unless a title is given.
 * @throws NotFoundError if prompt does not exist
 */
export function duplicatePrompt(
  db: DbType,
  userId: string | null,
  id: number,
  newTitle?: string,
): PromptResponse {
  const source = requirePrompt(db, id);
  const title =
    newTitle !== undefined
      ? newTitle
      : `Copy of ${source.title}`.slice(0, MAX_PROMPT_TITLE_LENGTH);

  return createPrompt(db, userId, {
    title,
    content: source.content,
    description: source.description,
    tags: getPromptTags(db, source.id).map((tag) => tag.name),
  });
}

function escapeLike(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

/**
 * Page number and size from a query, clamped to 1.. and 1..100.
 */
export function resolvePage(
  query: PageQuery,
  defaultPageSize = 20,
): { page: number; pageSize: number } {
  return {
    page: Math.max(1, query.page ?? 1),
    pageSize: Math.min(MAX_PAGE_SIZE, Math.max(1, query.pageSize ?? defaultPageSize)),
  };
}

/**
 * List prompts with filtering, sorting and pagination.
 * Defaults: active prompts only, manual order ascending.
 */
export function listPrompts(
  db: DbType,
  query: PromptListQuery,
  defaultPageSize = 20,
): PaginatedResponse<PromptResponse> {
  const { page, pageSize } = resolvePage(query, defaultPageSize);
  const sortBy: PromptSortBy = query.sortBy ?? 'order';
  const sortOrder: SortDirection =
    query.sortOrder ?? (sortBy === 'order' || sortBy === 'title' ? 'asc' : 'desc');

  const conditions: SQL[] = [];

  const isActive = query.isActive ?? 'true';
  if (isActive !== 'all') {
    conditions.push(eq(prompts.isActive, isActive === 'true'));
  }

  if (query.q) {
    const pattern = `%${escapeLike(query.q)}%`;
    const match = or(
      sql`LOWER(${prompts.title}) LIKE LOWER(${pattern}) ESCAPE '\\'`,
      sql`LOWER(${prompts.content}) LIKE LOWER(${pattern}) ESCAPE '\\'`,
      sql`LOWER(COALESCE(${prompts.description}, '')) LIKE LOWER(${pattern}) ESCAPE '\\'`,
    );
    if (match) conditions.push(match);
  }

  if (query.tag) {
    const tagNames = parseTagString(query.tag);
    if (tagNames.length > 0) {
      const tagged = sql`SELECT ${promptTags.promptId} FROM ${promptTags}
        INNER JOIN ${tags} ON ${tags.id} = ${promptTags.tagId}
        WHERE ${inArray(tags.name, tagNames)}`;
      conditions.push(
        query.tagMatch === 'all'
          ? sql`${prompts.id} IN (${tagged} GROUP BY ${promptTags.promptId} HAVING COUNT(DISTINCT ${promptTags.tagId}) = ${tagNames.length})`
          : sql`${prompts.id} IN (${tagged})`,
      );
    }
  }

  if (query.createdAfter) {
    conditions.push(gte(prompts.createdAt, query.createdAfter));
  }
  if (query.createdBefore) {
    conditions.push(lte(prompts.createdAt, query.createdBefore));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  const countResult = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(prompts)
    .where(whereClause)
    .get();
  const totalItems = countResult?.count ?? 0;
  const totalPages = Math.ceil(totalItems / pageSize);

  const sortColumn =
    sortBy === 'created'
      ? prompts.createdAt
      : sortBy === 'updated'
        ? prompts.updatedAt
        : sortBy === 'title'
          ? sql`LOWER(${prompts.title})`
          : prompts.sortOrder;
  const direction = sortOrder === 'asc' ? asc : desc;

  const rows = db
    .select()
    .from(prompts)
    .where(whereClause)
    .orderBy(direction(sortColumn), direction(prompts.id))
    .limit(pageSize)
    .offset((page - 1) * pageSize)
    .all();

  return {
    items: rows.map((row) => toPromptResponse(db, row)),
    pagination: { page, pageSize, totalItems, totalPages },
  };
}

/**
 * Assign `sortOrder = index` to each id in sequence, in one transaction.
 * Ids that do not exist are skipped.
 *
 * @returns Number of prompts updated
 */
export function bulkReorder(db: DbType, orderedIds: number[]): number {
  const now = new Date().toISOString();
  return db.transaction(() => {
    let updated = 0;
    orderedIds.forEach((id, index) => {
      const result = db
        .update(prompts)
        .set({ sortOrder: index, updatedAt: now })
        .where(eq(prompts.id, id))
        .run();
      updated += result.changes;
    });
    return updated;
  });
}

export function getPromptStatistics(db: DbType): PromptStatistics {
  const result = db
    .select({
      total: sql<number>`COUNT(*)`,
      active: sql<number>`COALESCE(SUM(CASE WHEN ${prompts.isActive} = 1 THEN 1 ELSE 0 END), 0)`,
    })
    .from(prompts)
    .get();

  const total = result?.total ?? 0;
  const active = result?.active ?? 0;

  return {
    total,
    active,
    inactive: total - active,
    activePercentage: total > 0 ? Math.round((active / total) * 1000) / 10 : 0,
  };
}
