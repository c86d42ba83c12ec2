import { and, eq, inArray, sql } from 'drizzle-orm';
import { UserLevel, normalizeLogin, type Actor, type GlobalStanding } from '@chatwarden/shared';
import { chatUserChannelLevels, chatUsers, permissionGroups } from '../db/schema.js';
import type { Database } from '../lib/db.js';
import { AppError, ERROR_CODES } from '../shared/errors.js';
import { isUuid } from './ids.js';
import type { ActorRepository } from './types.js';

function toStanding(raw: string): GlobalStanding {
  return raw === 'banned' || raw === 'super_admin' ? raw : 'none';
}

export function createActorRepository(db: Database): ActorRepository {
  return {
    findActor: async (userId, channelId) => {
      const rows = await db
        .select({
          id: chatUsers.id,
          login: chatUsers.login,
          globalStanding: chatUsers.globalStanding,
          groupMemberships: chatUsers.groupMemberships,
          level: chatUserChannelLevels.level,
        })
        .from(chatUsers)
        .leftJoin(
          chatUserChannelLevels,
          sql`${chatUserChannelLevels.userId} = ${chatUsers.id} and ${chatUserChannelLevels.channelId} = ${channelId}`
        )
        .where(eq(chatUsers.id, userId))
        .limit(1);
      const row = rows[0];
      if (!row) return null;

      // Memberships are stored per user; the actor only carries this channel's groups.
      const candidates = row.groupMemberships.filter(isUuid);
      const inChannel =
        candidates.length === 0
          ? []
          : await db
              .select({ id: permissionGroups.id })
              .from(permissionGroups)
              .where(and(inArray(permissionGroups.id, candidates), eq(permissionGroups.channelId, channelId)));
      const scoped = new Set(inChannel.map((g) => g.id));
      return {
        userId: row.id,
        login: row.login,
        globalStanding: toStanding(row.globalStanding),
        levelInChannel: row.level ?? UserLevel.Viewer,
        groupMemberships: candidates.filter((id) => scoped.has(id)),
      } satisfies Actor;
    },

    upsertSeen: async ({ userId, login, channelId, level }) => {
      await db.transaction(async (tx) => {
        await tx
          .insert(chatUsers)
          .values({ id: userId, login: normalizeLogin(login) })
          .onConflictDoUpdate({ target: chatUsers.id, set: { login: normalizeLogin(login), updatedAt: new Date() } });
        await tx
          .insert(chatUserChannelLevels)
          .values({ userId, channelId, level })
          .onConflictDoUpdate({ target: [chatUserChannelLevels.userId, chatUserChannelLevels.channelId], set: { level } });
      });
    },

    findUserIdByLogin: async (login) => {
      const rows = await db
        .select({ id: chatUsers.id })
        .from(chatUsers)
        .where(eq(chatUsers.login, normalizeLogin(login)))
        .limit(1);
      return rows[0]?.id ?? null;
    },

    addMembership: async (userId, groupId) =>
      db.transaction(async (tx) => {
        const rows = await tx
          .select({ groupMemberships: chatUsers.groupMemberships })
          .from(chatUsers)
          .where(eq(chatUsers.id, userId))
          .for('update');
        const row = rows[0];
        if (!row) throw new AppError({ errorCode: ERROR_CODES.USER_NOT_FOUND, details: { userId } });
        if (row.groupMemberships.includes(groupId)) return false;
        await tx
          .update(chatUsers)
          .set({ groupMemberships: sql`array_append(${chatUsers.groupMemberships}, ${groupId})` })
          .where(eq(chatUsers.id, userId));
        return true;
      }),

    removeMembership: async (userId, groupId) => {
      const rows = await db
        .update(chatUsers)
        .set({ groupMemberships: sql`array_remove(${chatUsers.groupMemberships}, ${groupId})` })
        .where(sql`${chatUsers.id} = ${userId} and ${groupId} = any(${chatUsers.groupMemberships})`)
        .returning({ id: chatUsers.id });
      return rows.length > 0;
    },

    removeMembershipFromAll: async (groupId) => {
      const rows = await db
        .update(chatUsers)
        .set({ groupMemberships: sql`array_remove(${chatUsers.groupMemberships}, ${groupId})` })
        .where(sql`${groupId} = any(${chatUsers.groupMemberships})`)
        .returning({ id: chatUsers.id });
      return rows.length;
    },

    setGlobalStanding: async (userId, standing) => {
      const rows = await db
        .update(chatUsers)
        .set({ globalStanding: standing })
        .where(eq(chatUsers.id, userId))
        .returning({ id: chatUsers.id });
      return rows.length > 0;
    },
  };
}
