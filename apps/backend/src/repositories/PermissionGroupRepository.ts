import { and, asc, eq, inArray, sql } from 'drizzle-orm';
import { normalizeGroupName, normalizePermissionName, type PermissionEntry, type PermissionGroup } from '@chatwarden/shared';
import { permissionGroups, type PermissionGroupRow } from '../db/schema.js';
import type { Database } from '../lib/db.js';
import { isUuid } from './ids.js';
import type { PermissionGroupRepository } from './types.js';

function toEntries(raw: unknown): PermissionEntry[] {
  if (!Array.isArray(raw)) return [];
  const items: unknown[] = raw;
  const out: PermissionEntry[] = [];
  for (const item of items) {
    if (!item || typeof item !== 'object') continue;
    const name = 'permissionName' in item ? normalizePermissionName(item.permissionName) : '';
    if (!name) continue;
    out.push({ permissionName: name, isDenied: 'isDenied' in item && item.isDenied === true });
  }
  return out;
}

function toGroup(row: PermissionGroupRow): PermissionGroup {
  return { id: row.id, channelId: row.channelId, name: row.name, entries: toEntries(row.entries) };
}

export function createPermissionGroupRepository(db: Database): PermissionGroupRepository {
  return {
    findById: async (groupId) => {
      if (!isUuid(groupId)) return null;
      const rows = await db.select().from(permissionGroups).where(eq(permissionGroups.id, groupId)).limit(1);
      return rows[0] ? toGroup(rows[0]) : null;
    },

    findByName: async (channelId, name) => {
      const rows = await db
        .select()
        .from(permissionGroups)
        .where(and(eq(permissionGroups.channelId, channelId), eq(permissionGroups.nameNormalized, normalizeGroupName(name))))
        .limit(1);
      return rows[0] ? toGroup(rows[0]) : null;
    },

    findManyByIds: async (groupIds) => {
      const ids = groupIds.filter(isUuid);
      if (ids.length === 0) return [];
      const rows = await db.select().from(permissionGroups).where(inArray(permissionGroups.id, ids));
      return rows.map(toGroup);
    },

    listByChannel: async (channelId) => {
      const rows = await db
        .select()
        .from(permissionGroups)
        .where(eq(permissionGroups.channelId, channelId))
        .orderBy(asc(permissionGroups.nameNormalized));
      return rows.map(toGroup);
    },

    create: async (channelId, name) => {
      const nameNormalized = normalizeGroupName(name);
      const inserted = await db
        .insert(permissionGroups)
        .values({ channelId, name: name.trim(), nameNormalized, entries: [] })
        .onConflictDoNothing({ target: [permissionGroups.channelId, permissionGroups.nameNormalized] })
        .returning();
      if (inserted[0]) return { group: toGroup(inserted[0]), created: true };

      const existing = await db
        .select()
        .from(permissionGroups)
        .where(and(eq(permissionGroups.channelId, channelId), eq(permissionGroups.nameNormalized, nameNormalized)))
        .limit(1);
      if (!existing[0]) throw new Error(`permission group insert conflicted but no row found for ${channelId}/${nameNormalized}`);
      return { group: toGroup(existing[0]), created: false };
    },

    updateEntries: async (groupId, mutate) => {
      if (!isUuid(groupId)) return null;
      return db.transaction(async (tx) => {
        const rows = await tx.select().from(permissionGroups).where(eq(permissionGroups.id, groupId)).for('update');
        const row = rows[0];
        if (!row) return null;
        const current = toGroup(row);
        const next = mutate(current.entries);
        if (!next) return current;
        await tx.update(permissionGroups).set({ entries: next }).where(eq(permissionGroups.id, groupId));
        return { ...current, entries: next };
      });
    },

    delete: async (groupId) => {
      if (!isUuid(groupId)) return false;
      const rows = await db.delete(permissionGroups).where(eq(permissionGroups.id, groupId)).returning({ id: permissionGroups.id });
      return rows.length > 0;
    },

    listIdsReferencingPermission: async (permissionName) => {
      const needle = JSON.stringify([{ permissionName: normalizePermissionName(permissionName) }]);
      const rows = await db
        .select({ id: permissionGroups.id })
        .from(permissionGroups)
        .where(sql`${permissionGroups.entries} @> ${needle}::jsonb`);
      return rows.map((r) => r.id);
    },
  };
}
