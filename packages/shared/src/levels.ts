/**
 * Per-channel user levels.
 *
 * A level is a bit mask. Moderator, TwitchAdmin and TwitchStaff are ranked
 * (holding a higher rank implies the lower ones); VIP and Subscriber are plain
 * flags; Broadcaster is handled by the resolver as an unconditional allow;
 * Viewer means "anyone"; Custom asks the resolver to consult permission groups.
 */
export const UserLevel = {
  Broadcaster: 1,
  TwitchStaff: 2,
  TwitchAdmin: 4,
  Moderator: 8,
  VIP: 16,
  Subscriber: 32,
  Viewer: 64,
  Custom: 128,
} as const;

export type UserLevelName = keyof typeof UserLevel;
export type UserLevelBit = (typeof UserLevel)[UserLevelName];
export type UserLevelMask = number;

export const USER_LEVEL_NAMES: readonly UserLevelName[] = [
  'Broadcaster',
  'TwitchStaff',
  'TwitchAdmin',
  'Moderator',
  'VIP',
  'Subscriber',
  'Viewer',
  'Custom',
];

// Ascending: index + 1 is the rank.
const RANKS: readonly UserLevelBit[] = [UserLevel.Moderator, UserLevel.TwitchAdmin, UserLevel.TwitchStaff];

const FLAGS: readonly UserLevelBit[] = [UserLevel.VIP, UserLevel.Subscriber];

export const ALL_LEVELS_MASK: UserLevelMask = USER_LEVEL_NAMES.reduce((acc, name) => acc | UserLevel[name], 0);

export function hasLevel(mask: UserLevelMask, bit: UserLevelBit): boolean {
  return (mask & bit) === bit;
}

export function combineLevels(...bits: UserLevelMask[]): UserLevelMask {
  let out = 0;
  for (const b of bits) out |= b;
  return out & ALL_LEVELS_MASK;
}

/** 0 when the mask holds no ranked bit. */
export function rankOf(mask: UserLevelMask): number {
  for (let i = RANKS.length - 1; i >= 0; i -= 1) {
    if (hasLevel(mask, RANKS[i])) return i + 1;
  }
  return 0;
}

function requiredRankThreshold(required: UserLevelMask): number | null {
  for (let i = 0; i < RANKS.length; i += 1) {
    if (hasLevel(required, RANKS[i])) return i + 1;
  }
  // A flag-only requirement sits below Moderator, so any rank clears it.
  if (FLAGS.some((f) => hasLevel(required, f))) return 0;
  return null;
}

/**
 * True when the highest rank held is at or above the lowest rank tier the
 * requirement names.
 */
export function satisfiesRank(held: UserLevelMask, required: UserLevelMask): boolean {
  const rank = rankOf(held);
  if (rank === 0) return false;
  const threshold = requiredRankThreshold(required);
  return threshold !== null && rank >= threshold;
}

/** True when a VIP or Subscriber flag is present in both masks. */
export function hasFlag(held: UserLevelMask, required: UserLevelMask): boolean {
  return FLAGS.some((f) => hasLevel(held, f) && hasLevel(required, f));
}

function findLevelName(raw: string): UserLevelName | null {
  const wanted = raw.trim().toLowerCase();
  return USER_LEVEL_NAMES.find((n) => n.toLowerCase() === wanted) ?? null;
}

export type ParsedLevels = { ok: true; mask: UserLevelMask } | { ok: false; unknown: string[] };

export function parseUserLevels(names: readonly string[]): ParsedLevels {
  let mask = 0;
  const unknown: string[] = [];
  for (const raw of names) {
    if (!raw.trim()) continue;
    const name = findLevelName(raw);
    if (name) mask |= UserLevel[name];
    else unknown.push(raw);
  }
  return unknown.length > 0 ? { ok: false, unknown } : { ok: true, mask };
}

export function formatUserLevels(mask: UserLevelMask): string[] {
  return USER_LEVEL_NAMES.filter((n) => hasLevel(mask, UserLevel[n]));
}
