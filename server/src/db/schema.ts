/**
 * Drizzle ORM schema definitions.
 *
 * Mirrors the SQL migrations in ./migrations; the migrations are the source of truth
 * for constraints (CHECKs, cascades), this file gives queries their types.
 */

import {
  sqliteTable,
  text,
  integer,
  index,
  uniqueIndex,
  primaryKey,
} from 'drizzle-orm/sqlite-core';

/**
 * Users table - accounts created on first OIDC login.
 */
export const users = sqliteTable(
  'users',
  {
    id: text('id').primaryKey(),
    oidcSubject: text('oidc_subject').unique(),
    email: text('email').unique().notNull(),
    displayName: text('display_name').notNull(),
    pictureUrl: text('picture_url'),
    role: text('role', { enum: ['user', 'admin'] })
      .notNull()
      .default('user'),
    status: text('status', { enum: ['pending', 'active', 'disabled'] })
      .notNull()
      .default('pending'),
    approvedAt: text('approved_at'),
    approvedBy: text('approved_by'),
    lastLoginAt: text('last_login_at'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    statusIdx: index('idx_users_status').on(table.status),
  }),
);

/**
 * Sessions table - stores active user sessions.
 * Sessions are ephemeral; expired sessions are garbage-collected.
 */
export const sessions = sqliteTable(
  'sessions',
  {
    id: text('id').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    expiresAt: text('expires_at').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => ({
    userIdIdx: index('idx_sessions_user_id').on(table.userId),
    expiresAtIdx: index('idx_sessions_expires_at').on(table.expiresAt),
  }),
);

/**
 * Email allowlist - emails that are activated on first login without approval.
 */
export const emailAllowlist = sqliteTable('email_allowlist', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  email: text('email').unique().notNull(),
  defaultRole: text('default_role', { enum: ['user', 'admin'] })
    .notNull()
    .default('user'),
  note: text('note'),
  createdBy: text('created_by').references(() => users.id, { onDelete: 'set null' }),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

/**
 * Prompts table - the reusable text units.
 * `isActive = false` is a soft delete; `sortOrder` is the manual ranking.
 */
export const prompts = sqliteTable(
  'prompts',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    title: text('title').notNull(),
    content: text('content').notNull(),
    description: text('description'),
    isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    sortOrder: integer('sort_order').notNull().default(0),
    userId: text('user_id').references(() => users.id, { onDelete: 'set null' }),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    sortOrderIdx: index('idx_prompts_sort_order').on(table.sortOrder),
    isActiveIdx: index('idx_prompts_is_active').on(table.isActive),
    userIdIdx: index('idx_prompts_user_id').on(table.userId),
  }),
);

/**
 * Tags table - names are stored normalized and are globally unique.
 */
export const tags = sqliteTable('tags', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').unique().notNull(),
  color: text('color').notNull().default('#3B82F6'),
  createdAt: text('created_at').notNull(),
});

/**
 * Prompt tags junction table - many-to-many relationship between prompts and tags.
 */
export const promptTags = sqliteTable(
  'prompt_tags',
  {
    promptId: integer('prompt_id')
      .notNull()
      .references(() => prompts.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.promptId, table.tagId] }),
    tagIdIdx: index('idx_prompt_tags_tag_id').on(table.tagId),
  }),
);

/**
 * Attachment edges (main -> attached). The graph is kept acyclic by the
 * attachment service; the unique pair serializes concurrent attaches.
 */
export const attachedPrompts = sqliteTable(
  'attached_prompts',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    mainPromptId: integer('main_prompt_id')
      .notNull()
      .references(() => prompts.id, { onDelete: 'cascade' }),
    attachedPromptId: integer('attached_prompt_id')
      .notNull()
      .references(() => prompts.id, { onDelete: 'cascade' }),
    sortOrder: integer('sort_order').notNull().default(0),
    usageCount: integer('usage_count').notNull().default(0),
    createdAt: text('created_at').notNull(),
  },
  (table) => ({
    pairIdx: uniqueIndex('attached_prompts_main_prompt_id_attached_prompt_id_unique').on(
      table.mainPromptId,
      table.attachedPromptId,
    ),
    attachedIdx: index('idx_attached_prompts_attached').on(table.attachedPromptId),
  }),
);

/**
 * Favorite sets - user-owned named collections of prompts.
 */
export const favoriteSets = sqliteTable(
  'favorite_sets',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    description: text('description'),
    isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    userNameIdx: uniqueIndex('favorite_sets_user_id_name_unique').on(table.userId, table.name),
  }),
);

/**
 * Favorite set items - ordered prompt references within a set.
 */
export const favoriteSetItems = sqliteTable(
  'favorite_set_items',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    favoriteSetId: integer('favorite_set_id')
      .notNull()
      .references(() => favoriteSets.id, { onDelete: 'cascade' }),
    promptId: integer('prompt_id')
      .notNull()
      .references(() => prompts.id, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => ({
    setPromptIdx: uniqueIndex('favorite_set_items_set_prompt_unique').on(
      table.favoriteSetId,
      table.promptId,
    ),
    setPositionIdx: uniqueIndex('favorite_set_items_set_position_unique').on(
      table.favoriteSetId,
      table.position,
    ),
  }),
);
