import type { UserLevelMask } from './levels.js';

export const GLOBAL_STANDINGS = ['none', 'banned', 'super_admin'] as const;
export type GlobalStanding = (typeof GLOBAL_STANDINGS)[number];

export interface Actor {
  userId: string;
  login: string;
  globalStanding: GlobalStanding;
  levelInChannel: UserLevelMask;
  groupMemberships: readonly string[];
}

export interface PermissionEntry {
  permissionName: string;
  isDenied: boolean;
}

export interface PermissionGroup {
  id: string;
  channelId: string;
  name: string;
  entries: PermissionEntry[];
}

export const PUNISHMENT_KINDS = ['none', 'delete', 'purge', 'timeout', 'ban'] as const;
export type PunishmentKind = (typeof PUNISHMENT_KINDS)[number];

export interface PunishmentSpec {
  kind: PunishmentKind;
  durationSeconds: number;
  reasonText: string | null;
  userFacingMessage: string | null;
}

export const FILTER_KINDS = [
  'caps',
  'symbols',
  'zalgo',
  'links',
  'lengthyMessage',
  'repetition',
  'emotes',
  'fakePurge',
  'actionMessage',
  'oneManSpam',
  'blacklist',
] as const;
export type FilterKind = (typeof FILTER_KINDS)[number];

export type DecisionTier = 'warning' | 'repeat' | 'blacklist';

export interface ModerationDecision {
  kind: FilterKind;
  tier: DecisionTier;
  punishment: PunishmentSpec;
}

/** Inclusive character range of one emote inside the raw message text. */
export interface EmotePosition {
  start: number;
  end: number;
}

export interface ChatMessage {
  id: string | null;
  channelId: string;
  userId: string;
  login: string;
  text: string;
  emotePositions: readonly EmotePosition[];
  isAction: boolean;
}
