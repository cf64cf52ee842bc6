import { randomUUID } from 'node:crypto';
import { eq, and, asc, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { users } from '../db/schema.js';
import type {
  AccessPolicy,
  AdminUserListQuery,
  UserResponse,
  UserRole,
} from '@promptdeck/shared';
import { ForbiddenError, NotFoundError, SelfDisableError, ValidationError } from '../errors/AppError.js';
import { findAllowlistEntry } from './allowlistService.js';
import { destroyUserSessions } from './sessionService.js';
import type { OidcProfile } from './oidcService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;
type UserRow = typeof users.$inferSelect;

const MAX_DISPLAY_NAME_LENGTH = 100;

/**
 * Settings that decide how a first login is admitted.
 */
export interface AccessSettings {
  accessPolicy: AccessPolicy;
  /** Lowercased emails that always become active admins. */
  adminEmails: string[];
  /** When set, only accounts from this hosted domain may sign in. */
  allowedDomain?: string;
}

/**
 * Convert DB row to UserResponse (never includes the OIDC subject).
 */
export function toUserResponse(row: UserRow): UserResponse {
  return {
    id: row.id,
    email: row.email,
    displayName: row.displayName,
    pictureUrl: row.pictureUrl,
    role: row.role,
    status: row.status,
    approvedAt: row.approvedAt,
    lastLoginAt: row.lastLoginAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function findById(db: DbType, id: string): UserRow | undefined {
  return db.select().from(users).where(eq(users.id, id)).get();
}

export function findByEmail(db: DbType, email: string): UserRow | undefined {
  return db.select().from(users).where(eq(users.email, email.toLowerCase())).get();
}

export function findByOidcSubject(db: DbType, sub: string): UserRow | undefined {
  return db.select().from(users).where(eq(users.oidcSubject, sub)).get();
}

function requireUser(db: DbType, id: string): UserRow {
  const user = findById(db, id);
  if (!user) {
    throw new NotFoundError('User not found');
  }
  return user;
}

/**
 * Reject logins from outside the allowed hosted domain. The `hd` claim is
 * preferred; the email domain is the fallback for providers that omit it.
 */
function checkDomain(profile: OidcProfile, allowedDomain: string | undefined): void {
  if (!allowedDomain) return;
  const domain = (profile.hostedDomain ?? profile.email.split('@')[1] ?? '').toLowerCase();
  if (domain !== allowedDomain.toLowerCase()) {
    throw new ForbiddenError('Sign-in is restricted to another domain', { domain });
  }
}

/**
 * Find the account for an OIDC login or create it, applying the access policy.
 *
 * Existing accounts are matched by subject, then by email (and linked to the
 * subject). Status rules:
 * - disabled accounts stay disabled
 * - admin emails become active admins
 * - allowlisted emails become active; new accounts take the entry's role
 * - other new accounts are active only under the `open` policy, else pending
 *
 * @throws ValidationError if the profile lacks a subject or email
 * @throws ForbiddenError if the hosted domain is not allowed
 */
export function findOrCreateOidcUser(
  db: DbType,
  profile: OidcProfile,
  settings: AccessSettings,
): UserRow {
  if (!profile.sub || !profile.email) {
    throw new ValidationError('Identity provider did not return a subject and email');
  }
  checkDomain(profile, settings.allowedDomain);

  const email = profile.email.toLowerCase();
  const now = new Date().toISOString();
  const isAdminEmail = settings.adminEmails.includes(email);
  const allowlisted = findAllowlistEntry(db, email);

  return db.transaction(() => {
    const existing = findByOidcSubject(db, profile.sub) ?? findByEmail(db, email);

    if (existing) {
      const updates: Partial<typeof users.$inferInsert> = {
        oidcSubject: profile.sub,
        lastLoginAt: now,
        updatedAt: now,
      };
      if (profile.picture) updates.pictureUrl = profile.picture;

      if (existing.status !== 'disabled') {
        if (isAdminEmail) {
          updates.role = 'admin';
          updates.status = 'active';
        } else if (allowlisted && existing.status === 'pending') {
          updates.status = 'active';
        }
        if (updates.status === 'active' && existing.status === 'pending') {
          updates.approvedAt = now;
        }
      }

      const updated = db.update(users).set(updates).where(eq(users.id, existing.id)).returning().get();
      return updated ?? existing;
    }

    let role: UserRole = 'user';
    let status: UserRow['status'] = 'pending';
    if (isAdminEmail) {
      role = 'admin';
      status = 'active';
    } else if (allowlisted) {
      role = allowlisted.defaultRole;
      status = 'active';
    } else if (settings.accessPolicy === 'open') {
      status = 'active';
    }

    return db
      .insert(users)
      .values({
        id: randomUUID(),
        oidcSubject: profile.sub,
        email,
        displayName: profile.name || email.split('@')[0],
        pictureUrl: profile.picture,
        role,
        status,
        approvedAt: status === 'active' ? now : null,
        lastLoginAt: now,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();
  });
}

/**
 * @throws NotFoundError if the user does not exist
 * @throws ValidationError if the name is blank or longer than 100 characters
 */
export function updateDisplayName(db: DbType, userId: string, displayName: string): UserRow {
  requireUser(db, userId);
  const name = displayName.trim();
  if (name.length === 0 || name.length > MAX_DISPLAY_NAME_LENGTH) {
    throw new ValidationError(
      `Display name must be between 1 and ${MAX_DISPLAY_NAME_LENGTH} characters`,
    );
  }

  const row = db
    .update(users)
    .set({ displayName: name, updatedAt: new Date().toISOString() })
    .where(eq(users.id, userId))
    .returning()
    .get();
  return row ?? requireUser(db, userId);
}

/**
 * List users, optionally filtered by status and a case-insensitive search on
 * email and display name. Sorted by email.
 */
export function listUsers(db: DbType, query: AdminUserListQuery = {}): UserRow[] {
  const conditions: SQL[] = [];
  if (query.status) {
    conditions.push(eq(users.status, query.status));
  }
  if (query.q) {
    const pattern = `%${query.q}%`;
    conditions.push(
      sql`(LOWER(${users.email}) LIKE LOWER(${pattern}) OR LOWER(${users.displayName}) LIKE LOWER(${pattern}))`,
    );
  }

  return db
    .select()
    .from(users)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(asc(users.email))
    .all();
}

/**
 * Activate an account, optionally changing its role.
 * @throws NotFoundError if the user does not exist
 */
export function approveUser(db: DbType, adminId: string, userId: string, role?: UserRole): UserRow {
  const user = requireUser(db, userId);
  const now = new Date().toISOString();

  const row = db
    .update(users)
    .set({
      status: 'active',
      role: role ?? user.role,
      approvedAt: now,
      approvedBy: adminId,
      updatedAt: now,
    })
    .where(eq(users.id, userId))
    .returning()
    .get();
  return row ?? user;
}

/**
 * Disable an account and end all of its sessions.
 * @throws NotFoundError if the user does not exist
 * @throws SelfDisableError if an admin targets their own account
 */
export function disableUser(db: DbType, adminId: string, userId: string): UserRow {
  if (adminId === userId) {
    throw new SelfDisableError();
  }
  const user = requireUser(db, userId);

  return db.transaction(() => {
    const row = db
      .update(users)
      .set({ status: 'disabled', updatedAt: new Date().toISOString() })
      .where(eq(users.id, userId))
      .returning()
      .get();
    destroyUserSessions(db, userId);
    return row ?? user;
  });
}
