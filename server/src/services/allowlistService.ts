import { eq, asc } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { emailAllowlist } from '../db/schema.js';
import type { AllowlistEntryResponse, CreateAllowlistEntryRequest } from '@promptdeck/shared';
import { ConflictError, NotFoundError, ValidationError } from '../errors/AppError.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;
type AllowlistRow = typeof emailAllowlist.$inferSelect;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function toAllowlistEntryResponse(row: AllowlistRow): AllowlistEntryResponse {
  return {
    id: row.id,
    email: row.email,
    defaultRole: row.defaultRole,
    note: row.note,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function findAllowlistEntry(db: DbType, email: string): AllowlistRow | undefined {
  return db
    .select()
    .from(emailAllowlist)
    .where(eq(emailAllowlist.email, email.trim().toLowerCase()))
    .get();
}

export function listAllowlist(db: DbType): AllowlistEntryResponse[] {
  return db
    .select()
    .from(emailAllowlist)
    .orderBy(asc(emailAllowlist.email))
    .all()
    .map(toAllowlistEntryResponse);
}

/**
 * Add an email to the allowlist. Emails are stored lowercased.
 * @throws ValidationError if the email is malformed
 * @throws ConflictError if the email is already listed
 */
export function addAllowlistEntry(
  db: DbType,
  adminId: string | null,
  data: CreateAllowlistEntryRequest,
): AllowlistEntryResponse {
  const email = data.email.trim().toLowerCase();
  if (!EMAIL_PATTERN.test(email)) {
    throw new ValidationError('Invalid email address');
  }
  if (findAllowlistEntry(db, email)) {
    throw new ConflictError('Email is already on the allowlist', { email });
  }

  const now = new Date().toISOString();
  const row = db
    .insert(emailAllowlist)
    .values({
      email,
      defaultRole: data.defaultRole ?? 'user',
      note: data.note?.trim() || null,
      createdBy: adminId,
      createdAt: now,
      updatedAt: now,
    })
    .returning()
    .get();

  return toAllowlistEntryResponse(row);
}

/**
 * @throws NotFoundError if the entry does not exist
 */
export function removeAllowlistEntry(db: DbType, id: number): void {
  const result = db.delete(emailAllowlist).where(eq(emailAllowlist.id, id)).run();
  if (result.changes === 0) {
    throw new NotFoundError('Allowlist entry not found');
  }
}
