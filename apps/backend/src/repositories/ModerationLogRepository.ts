import { and, eq } from 'drizzle-orm';
import { moderationLog, type ModerationLogRow } from '../db/schema.js';
import type { Database } from '../lib/db.js';
import { isUuid } from './ids.js';
import type { ModerationLogEntry, ModerationLogRepository } from './types.js';

function toEntry(row: ModerationLogRow): ModerationLogEntry {
  return {
    id: row.id,
    channelId: row.channelId,
    userId: row.userId,
    userLogin: row.userLogin,
    messageId: row.messageId,
    messageText: row.messageText,
    filterKind: row.filterKind,
    tier: row.tier,
    punishment: row.punishment,
    durationSeconds: row.durationSeconds,
    reasonText: row.reasonText,
    userFacingMessage: row.userFacingMessage,
    createdAt: row.createdAt,
  };
}

export function createModerationLogRepository(db: Database): ModerationLogRepository {
  return {
    append: async (entry) => {
      const rows = await db.insert(moderationLog).values(entry).returning();
      const row = rows[0];
      if (!row) throw new Error(`moderation log insert returned no row for ${entry.channelId}/${entry.userId}`);
      return toEntry(row);
    },

    findById: async (channelId, id) => {
      if (!isUuid(id)) return null;
      const rows = await db
        .select()
        .from(moderationLog)
        .where(and(eq(moderationLog.id, id), eq(moderationLog.channelId, channelId)))
        .limit(1);
      return rows[0] ? toEntry(rows[0]) : null;
    },
  };
}
