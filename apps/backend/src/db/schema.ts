import { index, integer, jsonb, pgTable, primaryKey, text, timestamp, uniqueIndex, uuid } from 'drizzle-orm/pg-core';

export type StoredPermissionEntry = { permissionName: string; isDenied: boolean };

/** Channel-scoped permission groups; entries are kept in one jsonb column. */
export const permissionGroups = pgTable(
  'permission_groups',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    channelId: text('channel_id').notNull(),
    name: text('name').notNull(),
    nameNormalized: text('name_normalized').notNull(),
    entries: jsonb('entries').$type<StoredPermissionEntry[]>().notNull().default([]),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    channelName: uniqueIndex('permission_groups_channel_name_key').on(t.channelId, t.nameNormalized),
  })
);

export type PermissionGroupRow = typeof permissionGroups.$inferSelect;

export const chatUsers = pgTable('chat_users', {
  id: text('id').primaryKey(),
  login: text('login').notNull(),
  globalStanding: text('global_standing').notNull().default('none'), // "none" | "banned" | "super_admin"
  groupMemberships: text('group_memberships').array().notNull().default([]),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export type ChatUserRow = typeof chatUsers.$inferSelect;

/** Level mask last observed for a user in a channel. */
export const chatUserChannelLevels = pgTable(
  'chat_user_channel_levels',
  {
    userId: text('user_id')
      .notNull()
      .references(() => chatUsers.id, { onDelete: 'cascade' }),
    channelId: text('channel_id').notNull(),
    level: integer('level').notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.userId, t.channelId] }),
  })
);

export const moderationPolicies = pgTable('moderation_policies', {
  channelId: text('channel_id').primaryKey(),
  document: jsonb('document').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

/** One row per moderation action; the id is quoted in the timeout or ban reason. */
export const moderationLog = pgTable(
  'moderation_log',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    channelId: text('channel_id').notNull(),
    userId: text('user_id').notNull(),
    userLogin: text('user_login').notNull(),
    messageId: text('message_id'),
    messageText: text('message_text').notNull(),
    filterKind: text('filter_kind').notNull(),
    tier: text('tier').notNull(),
    punishment: text('punishment').notNull(),
    durationSeconds: integer('duration_seconds').notNull().default(0),
    reasonText: text('reason_text'),
    userFacingMessage: text('user_facing_message'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    channelCreated: index('moderation_log_channel_created_idx').on(t.channelId, t.createdAt),
  })
);

export type ModerationLogRow = typeof moderationLog.$inferSelect;
