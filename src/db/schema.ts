/**
 * Corna Database Schema Definitions
 * Drizzle ORM schema for PostgreSQL
 *
 * Mirrors src/db/init.sql, which is the DDL applied by `npm run db:init`.
 * Foreign keys are declared with an explicit AnyPgColumn return type because
 * users -> media -> posts -> corna -> users forms a reference cycle.
 */

import {
  pgTable,
  uuid,
  boolean,
  timestamp,
  integer,
  text,
  bigint,
  primaryKey,
  unique,
  index,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';

/**
 * Login credentials, kept apart from the user row
 */
export const emails = pgTable('emails', {
  emailAddress: text('email_address').primaryKey(),
  passwordHash: text('password_hash').notNull(),
});

export const users = pgTable(
  'users',
  {
    uuid: uuid('uuid').primaryKey(),
    username: text('username').notNull().unique(),
    emailAddress: text('email_address')
      .notNull()
      .unique()
      .references((): AnyPgColumn => emails.emailAddress),
    dateCreated: timestamp('date_created', { withTimezone: true }).notNull().defaultNow(),
    avatar: uuid('avatar').references((): AnyPgColumn => media.uuid, { onDelete: 'set null' }),
  },
  (table) => ({
    usernameIdx: index('idx_users_username').on(table.username),
  })
);

/**
 * One live session per user; cookie_id is the signed cookie payload
 */
export const sessions = pgTable(
  'sessions',
  {
    sessionId: text('session_id').primaryKey(),
    cookieId: text('cookie_id').notNull().unique(),
    userUuid: uuid('user_uuid')
      .notNull()
      .unique()
      .references((): AnyPgColumn => users.uuid, { onDelete: 'cascade' }),
  },
  (table) => ({
    cookieIdx: index('idx_sessions_cookie_id').on(table.cookieId),
  })
);

export const corna = pgTable(
  'corna',
  {
    uuid: uuid('uuid').primaryKey(),
    domainName: text('domain_name').notNull().unique(),
    title: text('title').notNull(),
    dateCreated: timestamp('date_created', { withTimezone: true }).notNull().defaultNow(),
    userUuid: uuid('user_uuid')
      .notNull()
      .unique()
      .references((): AnyPgColumn => users.uuid),
    permissions: bigint('permissions', { mode: 'number' }).notNull(),
    about: uuid('about').references((): AnyPgColumn => textContent.uuid, { onDelete: 'set null' }),
    theme: uuid('theme').references((): AnyPgColumn => themes.uuid, { onDelete: 'set null' }),
  },
  (table) => ({
    domainIdx: index('idx_corna_domain_name').on(table.domainName),
  })
);

export const posts = pgTable(
  'posts',
  {
    uuid: uuid('uuid').primaryKey(),
    urlExtension: text('url_extension').notNull().unique(),
    created: timestamp('created', { withTimezone: true }).notNull().defaultNow(),
    type: text('type').notNull(),
    deleted: boolean('deleted').notNull().default(false),
    cornaUuid: uuid('corna_uuid')
      .notNull()
      .references((): AnyPgColumn => corna.uuid, { onDelete: 'cascade' }),
    userUuid: uuid('user_uuid')
      .notNull()
      .references((): AnyPgColumn => users.uuid),
  },
  (table) => ({
    cornaIdx: index('idx_posts_corna').on(table.cornaUuid),
  })
);

/**
 * Textual body of a post, or a Corna's "about" blurb when post_uuid is null
 */
export const textContent = pgTable('text_content', {
  uuid: uuid('uuid').primaryKey(),
  title: text('title'),
  content: text('content'),
  innerHtml: text('inner_html'),
  created: timestamp('created', { withTimezone: true }).notNull().defaultNow(),
  postUuid: uuid('post_uuid')
    .unique()
    .references((): AnyPgColumn => posts.uuid, { onDelete: 'cascade' }),
});

/**
 * Content fingerprints of uploaded images
 */
export const images = pgTable(
  'images',
  {
    uuid: uuid('uuid').primaryKey(),
    hash: text('hash').notNull(),
  },
  (table) => ({
    hashIdx: index('idx_images_hash').on(table.hash),
  })
);

export const media = pgTable(
  'media',
  {
    uuid: uuid('uuid').primaryKey(),
    urlExtension: text('url_extension').notNull().unique(),
    path: text('path').notNull(),
    size: integer('size').notNull(),
    type: text('type').notNull(),
    orphaned: boolean('orphaned').notNull().default(true),
    created: timestamp('created', { withTimezone: true }).notNull().defaultNow(),
    postUuid: uuid('post_uuid').references((): AnyPgColumn => posts.uuid, { onDelete: 'set null' }),
    imageUuid: uuid('image_uuid').references((): AnyPgColumn => images.uuid),
  },
  (table) => ({
    postIdx: index('idx_media_post').on(table.postUuid),
    typeIdx: index('idx_media_type').on(table.type),
  })
);

export const roles = pgTable(
  'roles',
  {
    uuid: uuid('uuid').primaryKey(),
    name: text('name').notNull(),
    created: timestamp('created', { withTimezone: true }).notNull().defaultNow(),
    permissions: bigint('permissions', { mode: 'number' }).notNull(),
    creatorUuid: uuid('creator_uuid')
      .notNull()
      .references((): AnyPgColumn => users.uuid),
    cornaUuid: uuid('corna_uuid')
      .notNull()
      .references((): AnyPgColumn => corna.uuid, { onDelete: 'cascade' }),
  },
  (table) => ({
    cornaNameUnique: unique('uq_roles_corna_name').on(table.cornaUuid, table.name),
  })
);

export const roleUserMap = pgTable(
  'role_user_map',
  {
    roleId: uuid('role_id')
      .notNull()
      .references((): AnyPgColumn => roles.uuid, { onDelete: 'cascade' }),
    userId: uuid('user_id')
      .notNull()
      .references((): AnyPgColumn => users.uuid, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.roleId, table.userId] }),
  })
);

export const themes = pgTable(
  'themes',
  {
    uuid: uuid('uuid').primaryKey(),
    name: text('name').notNull(),
    description: text('description'),
    created: timestamp('created', { withTimezone: true }).notNull().defaultNow(),
    path: text('path'),
    status: text('status').notNull(),
    creatorUserId: uuid('creator_user_id')
      .notNull()
      .references((): AnyPgColumn => users.uuid),
    thumbnail: uuid('thumbnail').references((): AnyPgColumn => media.uuid, { onDelete: 'set null' }),
  },
  (table) => ({
    creatorNameUnique: unique('uq_themes_creator_name').on(table.creatorUserId, table.name),
  })
);

export type User = typeof users.$inferSelect;
export type Corna = typeof corna.$inferSelect;
export type Post = typeof posts.$inferSelect;
export type TextContent = typeof textContent.$inferSelect;
export type Media = typeof media.$inferSelect;
export type Role = typeof roles.$inferSelect;
export type Theme = typeof themes.$inferSelect;
