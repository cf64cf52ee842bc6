import { eq, and, asc, desc, gt, notInArray, sql } from 'drizzle-orm';
import { alias } from 'drizzle-orm/sqlite-core';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { attachedPrompts, prompts } from '../db/schema.js';
import type {
  AttachmentResponse,
  AttachmentOrderEntry,
  PopularCombination,
  PromptSummary,
} from '@promptdeck/shared';
import {
  AppError,
  AttachmentLimitError,
  CircularAttachmentError,
  DuplicateAttachmentError,
  InactivePromptError,
  NotFoundError,
  SelfAttachmentError,
  ValidationError,
} from '../errors/AppError.js';
import { getPromptById, toPromptSummary } from './promptService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

export interface AttachmentLimits {
  maxAttachments: number;
}

const DEFAULT_LIMITS: AttachmentLimits = { maxAttachments: 10 };

function findEdge(db: DbType, mainId: number, attachedId: number) {
  return db
    .select()
    .from(attachedPrompts)
    .where(
      and(eq(attachedPrompts.mainPromptId, mainId), eq(attachedPrompts.attachedPromptId, attachedId)),
    )
    .get();
}

function countAttachments(db: DbType, mainId: number): number {
  const result = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(attachedPrompts)
    .where(eq(attachedPrompts.mainPromptId, mainId))
    .get();
  return result?.count ?? 0;
}

function getNextAttachmentOrder(db: DbType, mainId: number): number {
  const result = db
    .select({ maxOrder: sql<number>`COALESCE(MAX(${attachedPrompts.sortOrder}), -1)` })
    .from(attachedPrompts)
    .where(eq(attachedPrompts.mainPromptId, mainId))
    .get();
  return (result?.maxOrder ?? -1) + 1;
}

/**
 * Decide whether adding the edge `mainId -> attachedId` would close a cycle, i.e.
 * whether `mainId` is already reachable from `attachedId` by following existing
 * main -> attached edges. Edges are fetched per visited node.
 *
 * @returns The existing path from attachedId to mainId, or null
 */
export function wouldCreateCycle(db: DbType, mainId: number, attachedId: number): number[] | null {
  const visited = new Set<number>();
  const path: number[] = [attachedId];

  function dfs(currentId: number): boolean {
    if (currentId === mainId) {
      return true;
    }

    if (visited.has(currentId)) {
      return false;
    }

    visited.add(currentId);

    const children = db
      .select({ attachedPromptId: attachedPrompts.attachedPromptId })
      .from(attachedPrompts)
      .where(eq(attachedPrompts.mainPromptId, currentId))
      .all();

    for (const { attachedPromptId: childId } of children) {
      path.push(childId);
      if (dfs(childId)) {
        return true;
      }
      path.pop();
    }

    return false;
  }

  return dfs(attachedId) ? path : null;
}

/**
 * Run the attach rules in order and return every violation found. Missing
 * prompts short-circuit the remaining checks.
 */
function collectViolations(
  db: DbType,
  mainId: number,
  attachedId: number,
  limits: AttachmentLimits,
): AppError[] {
  const mainPrompt = getPromptById(db, mainId);
  const attachedPrompt = getPromptById(db, attachedId);

  const missing: AppError[] = [];
  if (!mainPrompt) {
    missing.push(new NotFoundError('Main prompt not found', { promptId: mainId }));
  }
  if (!attachedPrompt) {
    missing.push(new NotFoundError('Attached prompt not found', { promptId: attachedId }));
  }
  if (!mainPrompt || !attachedPrompt) {
    return missing;
  }

  const violations: AppError[] = [];

  if (!mainPrompt.isActive) {
    violations.push(new InactivePromptError('Main prompt is not active', { promptId: mainId }));
  }
  if (!attachedPrompt.isActive) {
    violations.push(
      new InactivePromptError('Attached prompt is not active', { promptId: attachedId }),
    );
  }

  if (mainId === attachedId) {
    violations.push(new SelfAttachmentError(undefined, { promptId: mainId }));
    return violations;
  }

  if (findEdge(db, mainId, attachedId)) {
    violations.push(
      new DuplicateAttachmentError(undefined, { mainPromptId: mainId, attachedPromptId: attachedId }),
    );
  } else {
    const cycle = wouldCreateCycle(db, mainId, attachedId);
    if (cycle) {
      violations.push(new CircularAttachmentError(undefined, { path: cycle }));
    }
  }

  if (countAttachments(db, mainId) >= limits.maxAttachments) {
    violations.push(
      new AttachmentLimitError(
        `Maximum number of attached prompts (${limits.maxAttachments}) reached`,
        { limit: limits.maxAttachments },
      ),
    );
  }

  return violations;
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

function toAttachmentResponse(
  edge: typeof attachedPrompts.$inferSelect,
  attachedPrompt: PromptSummary,
): AttachmentResponse {
  return {
    id: edge.id,
    mainPromptId: edge.mainPromptId,
    attachedPromptId: edge.attachedPromptId,
    sortOrder: edge.sortOrder,
    usageCount: edge.usageCount,
    createdAt: edge.createdAt,
    attachedPrompt,
  };
}

/**
 * Attach `attachedId` under `mainId`, appended after the existing attachments.
 * @throws NotFoundError if either prompt does not exist
 * @throws InactivePromptError if either prompt is inactive
 * @throws SelfAttachmentError if mainId === attachedId
 * @throws DuplicateAttachmentError if the edge exists (including a concurrent insert)
 * @throws CircularAttachmentError if mainId is reachable from attachedId
 * @throws AttachmentLimitError if mainId already has the maximum number of attachments
 */
export function attachPrompt(
  db: DbType,
  mainId: number,
  attachedId: number,
  limits: AttachmentLimits = DEFAULT_LIMITS,
): AttachmentResponse {
  const edge = db.transaction(() => {
    const [firstViolation] = collectViolations(db, mainId, attachedId, limits);
    if (firstViolation) {
      throw firstViolation;
    }

    try {
      return db
        .insert(attachedPrompts)
        .values({
          mainPromptId: mainId,
          attachedPromptId: attachedId,
          sortOrder: getNextAttachmentOrder(db, mainId),
          usageCount: 0,
          createdAt: new Date().toISOString(),
        })
        .returning()
        .get();
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateAttachmentError(undefined, {
          mainPromptId: mainId,
          attachedPromptId: attachedId,
        });
      }
      throw err;
    }
  });

  const attachedPrompt = getPromptById(db, attachedId);
  if (!attachedPrompt) {
    throw new NotFoundError('Attached prompt not found', { promptId: attachedId });
  }
  return toAttachmentResponse(edge, toPromptSummary(attachedPrompt));
}

/**
 * Pre-flight check for an attach; never throws for rule violations.
 * @returns Human-readable violation messages, empty when the attach would succeed
 */
export function validateAttachment(
  db: DbType,
  mainId: number,
  attachedId: number,
  limits: AttachmentLimits = DEFAULT_LIMITS,
): string[] {
  return collectViolations(db, mainId, attachedId, limits).map((violation) => violation.message);
}

/**
 * Remove an edge if it exists.
 * @returns true when an edge was removed
 */
export function detachPrompt(db: DbType, mainId: number, attachedId: number): boolean {
  const result = db
    .delete(attachedPrompts)
    .where(
      and(eq(attachedPrompts.mainPromptId, mainId), eq(attachedPrompts.attachedPromptId, attachedId)),
    )
    .run();
  return result.changes > 0;
}

/**
 * List the attachments of a prompt, ordered by sortOrder (ties by edge id).
 * @throws NotFoundError if the main prompt does not exist
 */
export function getAttachedPrompts(db: DbType, mainId: number): AttachmentResponse[] {
  if (!getPromptById(db, mainId)) {
    throw new NotFoundError('Prompt not found', { promptId: mainId });
  }

  return db
    .select({ edge: attachedPrompts, prompt: prompts })
    .from(attachedPrompts)
    .innerJoin(prompts, eq(prompts.id, attachedPrompts.attachedPromptId))
    .where(eq(attachedPrompts.mainPromptId, mainId))
    .orderBy(asc(attachedPrompts.sortOrder), asc(attachedPrompts.id))
    .all()
    .map((row) => toAttachmentResponse(row.edge, toPromptSummary(row.prompt)));
}

/**
 * Apply new orders to the edges of `mainId` in one transaction. Entries naming
 * a prompt that is not attached are ignored.
 * @throws NotFoundError if the main prompt does not exist
 * @throws ValidationError if an entry is missing attachedPromptId or order
 */
export function reorderAttachments(
  db: DbType,
  mainId: number,
  orderData: Partial<AttachmentOrderEntry>[],
): AttachmentResponse[] {
  if (!getPromptById(db, mainId)) {
    throw new NotFoundError('Prompt not found', { promptId: mainId });
  }

  const entries: AttachmentOrderEntry[] = orderData.map((entry) => {
    if (typeof entry.attachedPromptId !== 'number' || typeof entry.order !== 'number') {
      throw new ValidationError('Each entry needs attachedPromptId and order');
    }
    return { attachedPromptId: entry.attachedPromptId, order: entry.order };
  });

  db.transaction(() => {
    for (const { attachedPromptId, order } of entries) {
      db.update(attachedPrompts)
        .set({ sortOrder: order })
        .where(
          and(
            eq(attachedPrompts.mainPromptId, mainId),
            eq(attachedPrompts.attachedPromptId, attachedPromptId),
          ),
        )
        .run();
    }
  });

  return getAttachedPrompts(db, mainId);
}

/**
 * Count one more use of an attachment.
 * @returns false when the edge does not exist
 */
export function incrementUsage(db: DbType, mainId: number, attachedId: number): boolean {
  const result = db
    .update(attachedPrompts)
    .set({ usageCount: sql`${attachedPrompts.usageCount} + 1` })
    .where(
      and(eq(attachedPrompts.mainPromptId, mainId), eq(attachedPrompts.attachedPromptId, attachedId)),
    )
    .run();
  return result.changes > 0;
}

/**
 * Active prompts that could be attached to `mainId`: everything except the
 * prompt itself, its current attachments and `excludeIds`, ordered by title.
 */
export function getAvailableForAttachment(
  db: DbType,
  mainId: number,
  excludeIds: number[] = [],
): PromptSummary[] {
  const alreadyAttached = db
    .select({ id: attachedPrompts.attachedPromptId })
    .from(attachedPrompts)
    .where(eq(attachedPrompts.mainPromptId, mainId))
    .all()
    .map((row) => row.id);

  const excluded = [...new Set([mainId, ...alreadyAttached, ...excludeIds])];

  return db
    .select()
    .from(prompts)
    .where(and(eq(prompts.isActive, true), notInArray(prompts.id, excluded)))
    .orderBy(asc(prompts.title), asc(prompts.id))
    .all()
    .map(toPromptSummary);
}

/**
 * Most used attachments, with both prompt titles. Unused edges are left out.
 */
export function getPopularCombinations(db: DbType, limit = 10): PopularCombination[] {
  const mainPrompt = alias(prompts, 'main_prompt');
  const attachedPrompt = alias(prompts, 'attached_prompt');

  return db
    .select({
      mainPromptId: attachedPrompts.mainPromptId,
      mainPromptTitle: mainPrompt.title,
      attachedPromptId: attachedPrompts.attachedPromptId,
      attachedPromptTitle: attachedPrompt.title,
      usageCount: attachedPrompts.usageCount,
    })
    .from(attachedPrompts)
    .innerJoin(mainPrompt, eq(mainPrompt.id, attachedPrompts.mainPromptId))
    .innerJoin(attachedPrompt, eq(attachedPrompt.id, attachedPrompts.attachedPromptId))
    .where(gt(attachedPrompts.usageCount, 0))
    .orderBy(desc(attachedPrompts.usageCount), asc(attachedPrompts.id))
    .limit(limit)
    .all();
}
