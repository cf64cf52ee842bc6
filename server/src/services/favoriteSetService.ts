import { eq, and, asc, inArray } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { favoriteSets, favoriteSetItems, prompts } from '../db/schema.js';
import type {
  CreateFavoriteSetRequest,
  UpdateFavoriteSetRequest,
  FavoriteSetResponse,
} from '@promptdeck/shared';
import { NotFoundError, ValidationError, ConflictError } from '../errors/AppError.js';
import { MAX_FAVORITE_SET_NAME_LENGTH } from '../constants.js';
import { toPromptSummary } from './promptService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;
type FavoriteSetRow = typeof favoriteSets.$inferSelect;

function validateName(raw: string): string {
  const name = raw.trim();
  if (name.length === 0) {
    throw new ValidationError('Name is required');
  }
  if (name.length > MAX_FAVORITE_SET_NAME_LENGTH) {
    throw new ValidationError(`Name must be at most ${MAX_FAVORITE_SET_NAME_LENGTH} characters`);
  }
  return name;
}

function normalizeDescription(raw: string | null | undefined): string | null {
  const description = raw?.trim();
  return description ? description : null;
}

function ensureNameAvailable(db: DbType, userId: string, name: string, ownId?: number): void {
  const existing = db
    .select()
    .from(favoriteSets)
    .where(and(eq(favoriteSets.userId, userId), eq(favoriteSets.name, name)))
    .get();
  if (existing && existing.id !== ownId) {
    throw new ConflictError('A favorite set with this name already exists', { name });
  }
}

function findOwnedSet(db: DbType, userId: string, id: number): FavoriteSetRow {
  const set = db
    .select()
    .from(favoriteSets)
    .where(and(eq(favoriteSets.id, id), eq(favoriteSets.userId, userId)))
    .get();
  if (!set) {
    throw new NotFoundError('Favorite set not found');
  }
  return set;
}

/**
 * Replace the items of a set. Duplicate ids keep their first position and ids
 * that match no prompt are dropped; positions are 0..n-1.
 */
function replaceItems(db: DbType, setId: number, promptIds: number[]): void {
  const unique = [...new Set(promptIds)];
  const existing =
    unique.length > 0
      ? new Set(
          db
            .select({ id: prompts.id })
            .from(prompts)
            .where(inArray(prompts.id, unique))
            .all()
            .map((row) => row.id),
        )
      : new Set<number>();

  db.delete(favoriteSetItems).where(eq(favoriteSetItems.favoriteSetId, setId)).run();

  const now = new Date().toISOString();
  const values = unique
    .filter((id) => existing.has(id))
    .map((promptId, position) => ({ favoriteSetId: setId, promptId, position, createdAt: now }));

  if (values.length > 0) {
    db.insert(favoriteSetItems).values(values).run();
  }
}

/**
 * Prompt ids of a set in position order.
 * @throws NotFoundError if the set does not exist or belongs to another user
 */
export function getFavoriteSetPromptIds(db: DbType, userId: string, id: number): number[] {
  findOwnedSet(db, userId, id);
  return db
    .select({ promptId: favoriteSetItems.promptId })
    .from(favoriteSetItems)
    .where(eq(favoriteSetItems.favoriteSetId, id))
    .orderBy(asc(favoriteSetItems.position))
    .all()
    .map((row) => row.promptId);
}

function toFavoriteSetResponse(db: DbType, set: FavoriteSetRow): FavoriteSetResponse {
  const items = db
    .select({ prompt: prompts })
    .from(favoriteSetItems)
    .innerJoin(prompts, eq(prompts.id, favoriteSetItems.promptId))
    .where(eq(favoriteSetItems.favoriteSetId, set.id))
    .orderBy(asc(favoriteSetItems.position))
    .all();

  return {
    id: set.id,
    name: set.name,
    description: set.description,
    isActive: set.isActive,
    prompts: items.map((item) => toPromptSummary(item.prompt)),
    createdAt: set.createdAt,
    updatedAt: set.updatedAt,
  };
}

/**
 * List the sets owned by a user, sorted by name.
 */
export function listFavoriteSets(db: DbType, userId: string): FavoriteSetResponse[] {
  return db
    .select()
    .from(favoriteSets)
    .where(eq(favoriteSets.userId, userId))
    .orderBy(asc(favoriteSets.name))
    .all()
    .map((set) => toFavoriteSetResponse(db, set));
}

/**
 * @throws NotFoundError if the set does not exist or belongs to another user
 */
export function getFavoriteSet(db: DbType, userId: string, id: number): FavoriteSetResponse {
  return toFavoriteSetResponse(db, findOwnedSet(db, userId, id));
}

/**
 * @throws ValidationError if the name is blank or too long
 * @throws ConflictError if the user already has a set with this name
 */
export function createFavoriteSet(
  db: DbType,
  userId: string,
  data: CreateFavoriteSetRequest,
): FavoriteSetResponse {
  const name = validateName(data.name);
  ensureNameAvailable(db, userId, name);

  const now = new Date().toISOString();
  const set = db.transaction(() => {
    const row = db
      .insert(favoriteSets)
      .values({
        userId,
        name,
        description: normalizeDescription(data.description),
        isActive: true,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();
    replaceItems(db, row.id, data.promptIds ?? []);
    return row;
  });

  return toFavoriteSetResponse(db, set);
}

/**
 * Partially update a set; `promptIds` replaces the items.
 * @throws NotFoundError if the set does not exist or belongs to another user
 * @throws ValidationError if no fields provided or the name is invalid
 * @throws ConflictError if the new name is taken by another of the user's sets
 */
export function updateFavoriteSet(
  db: DbType,
  userId: string,
  id: number,
  data: UpdateFavoriteSetRequest,
): FavoriteSetResponse {
  const existing = findOwnedSet(db, userId, id);

  if (
    data.name === undefined &&
    data.description === undefined &&
    data.isActive === undefined &&
    data.promptIds === undefined
  ) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof favoriteSets.$inferInsert> = {
    updatedAt: new Date().toISOString(),
  };
  if (data.name !== undefined) {
    updates.name = validateName(data.name);
    ensureNameAvailable(db, userId, updates.name, id);
  }
  if (data.description !== undefined) updates.description = normalizeDescription(data.description);
  if (data.isActive !== undefined) updates.isActive = data.isActive;

  const promptIds = data.promptIds;
  const row = db.transaction(() => {
    const updated = db
      .update(favoriteSets)
      .set(updates)
      .where(eq(favoriteSets.id, id))
      .returning()
      .get();
    if (promptIds !== undefined) {
      replaceItems(db, id, promptIds);
    }
    return updated ?? existing;
  });

  return toFavoriteSetResponse(db, row);
}

/**
 * @throws NotFoundError if the set does not exist or belongs to another user
 */
export function deleteFavoriteSet(db: DbType, userId: string, id: number): void {
  findOwnedSet(db, userId, id);
  db.delete(favoriteSets).where(eq(favoriteSets.id, id)).run();
}
