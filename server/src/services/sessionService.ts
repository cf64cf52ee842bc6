import { randomBytes } from 'node:crypto';
import { eq, lt, gt, and } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { sessions, users } from '../db/schema.js';
import { AccountDisabledError, AccountPendingError, NotFoundError } from '../errors/AppError.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;
type UserRow = typeof users.$inferSelect;

/**
 * 256-bit random token, hex encoded (64 characters). Used as the session ID.
 */
export function generateSessionToken(): string {
  return randomBytes(32).toString('hex');
}

/**
 * Open a session for an active account and return its token.
 *
 * @throws NotFoundError if the user does not exist
 * @throws AccountPendingError if the account still awaits approval
 * @throws AccountDisabledError if an admin disabled the account
 */
export function createSession(db: DbType, userId: string, durationSeconds: number): string {
  const user = db.select({ status: users.status }).from(users).where(eq(users.id, userId)).get();
  if (!user) {
    throw new NotFoundError('User not found');
  }
  if (user.status === 'pending') {
    throw new AccountPendingError();
  }
  if (user.status === 'disabled') {
    throw new AccountDisabledError();
  }

  const id = generateSessionToken();
  const now = new Date();

  db.insert(sessions)
    .values({
      id,
      userId,
      expiresAt: new Date(now.getTime() + durationSeconds * 1000).toISOString(),
      createdAt: now.toISOString(),
    })
    .run();

  return id;
}

/**
 * Resolve a session token to its user. An account that became pending or
 * disabled after login no longer resolves, even while the session is live.
 */
export function validateSession(db: DbType, sessionId: string): UserRow | null {
  const result = db
    .select({ user: users })
    .from(sessions)
    .innerJoin(users, eq(sessions.userId, users.id))
    .where(
      and(
        eq(sessions.id, sessionId),
        gt(sessions.expiresAt, new Date().toISOString()),
        eq(users.status, 'active'),
      ),
    )
    .get();

  return result?.user ?? null;
}

export function destroySession(db: DbType, sessionId: string): void {
  db.delete(sessions).where(eq(sessions.id, sessionId)).run();
}

/** Ends every session of a user, e.g. when the account is disabled. */
export function destroyUserSessions(db: DbType, userId: string): void {
  db.delete(sessions).where(eq(sessions.userId, userId)).run();
}

/**
 * @returns Number of expired sessions deleted
 */
export function cleanupExpiredSessions(db: DbType): number {
  const result = db
    .delete(sessions)
    .where(lt(sessions.expiresAt, new Date().toISOString()))
    .run();
  return result.changes;
}
