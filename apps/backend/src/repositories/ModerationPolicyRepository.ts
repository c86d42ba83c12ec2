import { eq } from 'drizzle-orm';
import { moderationPolicies } from '../db/schema.js';
import type { Database } from '../lib/db.js';
import type { ModerationPolicyRepository } from './types.js';

export function createModerationPolicyRepository(db: Database): ModerationPolicyRepository {
  return {
    findRawByChannel: async (channelId) => {
      const rows = await db
        .select({ document: moderationPolicies.document })
        .from(moderationPolicies)
        .where(eq(moderationPolicies.channelId, channelId))
        .limit(1);
      return rows[0]?.document ?? null;
    },
    saveRaw: async (channelId, document) => {
      await db
        .insert(moderationPolicies)
        .values({ channelId, document })
        .onConflictDoUpdate({ target: moderationPolicies.channelId, set: { document, updatedAt: new Date() } });
    },
  };
}
