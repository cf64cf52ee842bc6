import { eq, inArray, sql, desc, asc } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { tags, promptTags } from '../db/schema.js';
import type {
  CreateTagRequest,
  UpdateTagRequest,
  TagResponse,
  TagWithCountResponse,
} from '@promptdeck/shared';
import { NotFoundError, ValidationError, ConflictError } from '../errors/AppError.js';
import { DEFAULT_TAG_COLOR, MAX_TAG_NAME_LENGTH } from '../constants.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

/**
 * Normalize a tag name: lowercase, whitespace runs become a single hyphen,
 * anything outside [a-z0-9-] is dropped, hyphen runs collapse, and the result
 * is trimmed of hyphens and cut to the maximum length.
 *
 * @example normalizeTagName('  Code Review!! ') // 'code-review'
 */
export function normalizeTagName(name: string): string {
  return name
    .toLowerCase()
    .trim()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_TAG_NAME_LENGTH)
    .replace(/-+$/, '');
}

/**
 * Split a comma-separated tag string into unique normalized names, first occurrence wins.
 */
export function parseTagString(input: string): string[] {
  return uniqueNormalizedNames(input.split(','));
}

function uniqueNormalizedNames(names: string[]): string[] {
  const seen = new Set<string>();
  for (const raw of names) {
    const name = normalizeTagName(raw);
    if (name) seen.add(name);
  }
  return [...seen];
}

function toTagResponse(tag: typeof tags.$inferSelect): TagResponse {
  return {
    id: tag.id,
    name: tag.name,
    color: tag.color,
    createdAt: tag.createdAt,
  };
}

function isValidHexColor(color: string): boolean {
  return /^#[0-9A-Fa-f]{6}$/.test(color);
}

function requireTagName(raw: string): string {
  const name = normalizeTagName(raw);
  if (!name) {
    throw new ValidationError('Tag name must contain at least one letter or digit');
  }
  return name;
}

function findTagRow(db: DbType, id: number): typeof tags.$inferSelect {
  const tag = db.select().from(tags).where(eq(tags.id, id)).get();
  if (!tag) {
    throw new NotFoundError('Tag not found');
  }
  return tag;
}

const promptCount = sql<number>`(SELECT COUNT(*) FROM ${promptTags} WHERE ${promptTags.tagId} = ${tags.id})`;

/**
 * List all tags with their usage counts, sorted by name.
 */
export function listTags(db: DbType): TagWithCountResponse[] {
  return db
    .select({
      id: tags.id,
      name: tags.name,
      color: tags.color,
      createdAt: tags.createdAt,
      promptCount,
    })
    .from(tags)
    .orderBy(asc(tags.name))
    .all();
}

/**
 * @throws NotFoundError if tag does not exist
 */
export function getTagById(db: DbType, id: number): TagWithCountResponse {
  const row = db
    .select({
      id: tags.id,
      name: tags.name,
      color: tags.color,
      createdAt: tags.createdAt,
      promptCount,
    })
    .from(tags)
    .where(eq(tags.id, id))
    .get();
  if (!row) {
    throw new NotFoundError('Tag not found');
  }
  return row;
}

/**
 * Create a new tag. The stored name is the normalized form of the given name.
 * @throws ValidationError if the name normalizes to nothing or the color is malformed
 * @throws ConflictError if a tag with the same normalized name exists
 */
export function createTag(db: DbType, data: CreateTagRequest): TagResponse {
  const name = requireTagName(data.name);

  if (data.color !== undefined && !isValidHexColor(data.color)) {
    throw new ValidationError('Color must be a hex color code in format #RRGGBB');
  }

  const existing = db.select().from(tags).where(eq(tags.name, name)).get();
  if (existing) {
    throw new ConflictError('A tag with this name already exists', { name });
  }

  const row = db
    .insert(tags)
    .values({
      name,
      color: data.color ?? DEFAULT_TAG_COLOR,
      createdAt: new Date().toISOString(),
    })
    .returning()
    .get();

  return toTagResponse(row);
}

/**
 * Update a tag's name and/or color.
 * @throws NotFoundError if tag does not exist
 * @throws ValidationError if fields are invalid or no fields provided
 * @throws ConflictError if the new name belongs to another tag
 */
export function updateTag(db: DbType, id: number, data: UpdateTagRequest): TagResponse {
  const existing = findTagRow(db, id);

  if (data.name === undefined && data.color === undefined) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof tags.$inferInsert> = {};

  if (data.name !== undefined) {
    const name = requireTagName(data.name);
    const duplicate = db.select().from(tags).where(eq(tags.name, name)).get();
    if (duplicate && duplicate.id !== id) {
      throw new ConflictError('A tag with this name already exists', { name });
    }
    updates.name = name;
  }

  if (data.color !== undefined) {
    if (!isValidHexColor(data.color)) {
      throw new ValidationError('Color must be a hex color code in format #RRGGBB');
    }
    updates.color = data.color;
  }

  const row = db.update(tags).set(updates).where(eq(tags.id, existing.id)).returning().get();
  return toTagResponse(row ?? existing);
}

/**
 * Copy every prompt association of `sourceId` onto `targetId`, skipping prompts
 * that already carry the target.
 */
function moveAssociations(db: DbType, sourceId: number, targetId: number): void {
  db.run(
    sql`INSERT OR IGNORE INTO ${promptTags} (prompt_id, tag_id)
        SELECT ${promptTags.promptId}, ${targetId} FROM ${promptTags} WHERE ${promptTags.tagId} = ${sourceId}`,
  );
}

/**
 * Delete a tag. With `reassignTo`, its prompts are first tagged with the other tag.
 * @throws NotFoundError if either tag does not exist
 * @throws ValidationError if a tag would be reassigned to itself
 */
export function deleteTag(db: DbType, id: number, reassignTo?: number): void {
  findTagRow(db, id);

  if (reassignTo !== undefined) {
    if (reassignTo === id) {
      throw new ValidationError('Cannot reassign a tag to itself');
    }
    findTagRow(db, reassignTo);
  }

  db.transaction(() => {
    if (reassignTo !== undefined) {
      moveAssociations(db, id, reassignTo);
    }
    // prompt_tags rows of the deleted tag go with it (ON DELETE CASCADE)
    db.delete(tags).where(eq(tags.id, id)).run();
  });
}

/**
 * Merge `sourceId` into `targetId`: the target gains all of the source's prompts,
 * then the source is deleted.
 * @returns The target tag with its new usage count
 */
export function mergeTags(db: DbType, sourceId: number, targetId: number): TagWithCountResponse {
  if (sourceId === targetId) {
    throw new ValidationError('Cannot merge a tag into itself');
  }
  deleteTag(db, sourceId, targetId);
  return getTagById(db, targetId);
}

/**
 * Tags ordered by how many prompts use them. Unused tags are left out.
 */
export function getPopularTags(db: DbType, limit = 10): TagWithCountResponse[] {
  return db
    .select({
      id: tags.id,
      name: tags.name,
      color: tags.color,
      createdAt: tags.createdAt,
      promptCount: sql<number>`COUNT(${promptTags.promptId})`,
    })
    .from(tags)
    .innerJoin(promptTags, eq(promptTags.tagId, tags.id))
    .groupBy(tags.id)
    .orderBy(desc(sql`COUNT(${promptTags.promptId})`), asc(tags.name))
    .limit(limit)
    .all();
}

/**
 * Delete every tag that no prompt uses.
 * @returns Number of tags deleted
 */
export function cleanupUnusedTags(db: DbType): number {
  const result = db
    .delete(tags)
    .where(sql`${tags.id} NOT IN (SELECT DISTINCT ${promptTags.tagId} FROM ${promptTags})`)
    .run();
  return result.changes;
}

/**
 * Resolve tag names to tag rows, creating missing ones with the default color.
 * Names are normalized and de-duplicated; empty results are skipped.
 */
export function getOrCreateTags(db: DbType, names: string[]): TagResponse[] {
  const normalized = uniqueNormalizedNames(names);
  if (normalized.length === 0) {
    return [];
  }

  const now = new Date().toISOString();
  db.insert(tags)
    .values(normalized.map((name) => ({ name, color: DEFAULT_TAG_COLOR, createdAt: now })))
    .onConflictDoNothing({ target: tags.name })
    .run();

  const rows = db.select().from(tags).where(inArray(tags.name, normalized)).all();
  const byName = new Map(rows.map((row) => [row.name, row]));

  return normalized.flatMap((name) => {
    const row = byName.get(name);
    return row ? [toTagResponse(row)] : [];
  });
}
