import type { Actor, GlobalStanding, PermissionEntry, PermissionGroup, UserLevelMask } from '@chatwarden/shared';

/** Return null from the mutator to leave the group untouched. */
export type EntriesMutator = (entries: readonly PermissionEntry[]) => PermissionEntry[] | null;

export type PermissionGroupRepository = {
  findById: (groupId: string) => Promise<PermissionGroup | null>;
  /** Case-insensitive within the channel. */
  findByName: (channelId: string, name: string) => Promise<PermissionGroup | null>;
  findManyByIds: (groupIds: readonly string[]) => Promise<PermissionGroup[]>;
  listByChannel: (channelId: string) => Promise<PermissionGroup[]>;
  create: (channelId: string, name: string) => Promise<{ group: PermissionGroup; created: boolean }>;
  /** Row-locked read-modify-write; null when the group does not exist. */
  updateEntries: (groupId: string, mutate: EntriesMutator) => Promise<PermissionGroup | null>;
  delete: (groupId: string) => Promise<boolean>;
  listIdsReferencingPermission: (permissionName: string) => Promise<string[]>;
};

export type SeenActor = {
  userId: string;
  login: string;
  channelId: string;
  level: UserLevelMask;
};

export type ActorRepository = {
  findActor: (userId: string, channelId: string) => Promise<Actor | null>;
  upsertSeen: (seen: SeenActor) => Promise<void>;
  findUserIdByLogin: (login: string) => Promise<string | null>;
  /** False when the user already holds the membership. Throws USER_NOT_FOUND for unknown users. */
  addMembership: (userId: string, groupId: string) => Promise<boolean>;
  removeMembership: (userId: string, groupId: string) => Promise<boolean>;
  removeMembershipFromAll: (groupId: string) => Promise<number>;
  setGlobalStanding: (userId: string, standing: GlobalStanding) => Promise<boolean>;
};

export type ModerationPolicyRepository = {
  findRawByChannel: (channelId: string) => Promise<unknown | null>;
  saveRaw: (channelId: string, document: unknown) => Promise<void>;
};

export type ModerationLogEntry = {
  id: string;
  channelId: string;
  userId: string;
  userLogin: string;
  messageId: string | null;
  messageText: string;
  filterKind: string;
  tier: string;
  punishment: string;
  durationSeconds: number;
  reasonText: string | null;
  userFacingMessage: string | null;
  createdAt: Date;
};

export type NewModerationLogEntry = Omit<ModerationLogEntry, 'id' | 'createdAt'>;

export type ModerationLogRepository = {
  append: (entry: NewModerationLogEntry) => Promise<ModerationLogEntry>;
  /** Null for unknown ids and for entries of another channel. */
  findById: (channelId: string, id: string) => Promise<ModerationLogEntry | null>;
};

export type RepositoryContext = {
  groups: PermissionGroupRepository;
  actors: ActorRepository;
  policies: ModerationPolicyRepository;
  moderationLog: ModerationLogRepository;
};
