import { UserLevel, type EmotePosition, type UserLevelMask } from '@chatwarden/shared';

export type BadgeMap = Partial<Record<string, string | undefined>>;

function has(badges: BadgeMap | null | undefined, name: string): boolean {
  const v = badges?.[name];
  return typeof v === 'string' && v.length > 0;
}

/**
 * One level per chatter, first match wins:
 * Staff > Admin > Broadcaster > Moderator > Subscriber (founders included) > VIP.
 * No badge means Viewer.
 */
export function deriveUserLevel(badges: BadgeMap | null | undefined, userType?: string | null): UserLevelMask {
  const type = String(userType ?? '').trim().toLowerCase();
  if (has(badges, 'staff') || type === 'staff') return UserLevel.TwitchStaff;
  if (has(badges, 'admin') || type === 'admin') return UserLevel.TwitchAdmin;
  if (has(badges, 'broadcaster')) return UserLevel.Broadcaster;
  if (has(badges, 'moderator') || type === 'mod') return UserLevel.Moderator;
  if (has(badges, 'subscriber') || has(badges, 'founder')) return UserLevel.Subscriber;
  if (has(badges, 'vip')) return UserLevel.VIP;
  return UserLevel.Viewer;
}

/** The IRC `emotes` tag: emote id -> ["start-end", ...]. */
export function parseEmotePositions(emotes: Partial<Record<string, string[]>> | null | undefined): EmotePosition[] {
  if (!emotes) return [];
  const out: EmotePosition[] = [];
  for (const ranges of Object.values(emotes)) {
    for (const range of ranges ?? []) {
      const m = /^(\d+)-(\d+)$/.exec(range.trim());
      if (!m) continue;
      out.push({ start: Number(m[1]), end: Number(m[2]) });
    }
  }
  return out.sort((a, b) => a.start - b.start);
}
