import { z } from 'zod';
import {
  normalizeGroupName,
  normalizePermissionName,
  paginate,
  type Page,
  type PermissionEntry,
  type PermissionGroup,
} from '@chatwarden/shared';
import type { ActorRepository, PermissionGroupRepository } from '../repositories/types.js';
import { AppError, ERROR_CODES } from '../shared/errors.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { PermissionRegistry } from './permissionRegistry.js';

export const PERMISSION_PAGE_SIZE = 10;

const idSchema = z.string().trim().min(1);
const nameSchema = z.string().trim().min(1).max(64);

function requireValue(schema: z.ZodString, value: unknown, field: string): string {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new AppError({
      errorCode: ERROR_CODES.INVALID_INPUT,
      message: typeof value === 'string' && value.trim() ? `${field} is too long` : `${field} is required`,
      details: { field, issues: parsed.error.issues.map((i) => i.message) },
    });
  }
  return parsed.data;
}

export type SetPermissionResult = 'added' | 'updated' | 'unchanged';

export type PermissionServiceDeps = {
  groups: PermissionGroupRepository;
  actors: ActorRepository;
  registry: PermissionRegistry;
  logger?: Logger;
};

/**
 * Mutation API over permission groups and memberships. Writes to one group
 * (or one user's memberships) are serialized in-process; the repository adds a
 * row lock for writers in other processes.
 */
export class PermissionService {
  private readonly groups: PermissionGroupRepository;
  private readonly actors: ActorRepository;
  private readonly registry: PermissionRegistry;
  private readonly logger: Logger;
  private readonly locks = new KeyedMutex();

  constructor(deps: PermissionServiceDeps) {
    this.groups = deps.groups;
    this.actors = deps.actors;
    this.registry = deps.registry;
    this.logger = deps.logger ?? defaultLogger;
  }

  async createGroup(channelId: string, name: string): Promise<{ group: PermissionGroup; created: boolean }> {
    const ch = requireValue(idSchema, channelId, 'channelId');
    const groupName = requireValue(nameSchema, name, 'name');
    return this.locks.use(`group-name:${ch}:${normalizeGroupName(groupName)}`, async () => {
      const existing = await this.groups.findByName(ch, groupName);
      if (existing) return { group: existing, created: false };
      const result = await this.groups.create(ch, groupName);
      if (result.created) this.logger.info('permissions.group_created', { channelId: ch, groupId: result.group.id });
      return result;
    });
  }

  /** Members lose the group before the group row goes away. */
  async deleteGroup(groupId: string): Promise<boolean> {
    const id = requireValue(idSchema, groupId, 'groupId');
    return this.locks.use(`group:${id}`, async () => {
      const group = await this.groups.findById(id);
      if (!group) return false;
      const members = await this.actors.removeMembershipFromAll(id);
      const deleted = await this.groups.delete(id);
      this.logger.info('permissions.group_deleted', { channelId: group.channelId, groupId: id, membersRemoved: members });
      return deleted;
    });
  }

  async deleteGroupByName(channelId: string, name: string): Promise<boolean> {
    const group = await this.getGroupByName(channelId, name);
    return group ? this.deleteGroup(group.id) : false;
  }

  async getGroupByName(channelId: string, name: string): Promise<PermissionGroup | null> {
    const ch = requireValue(idSchema, channelId, 'channelId');
    const groupName = requireValue(nameSchema, name, 'name');
    return this.groups.findByName(ch, groupName);
  }

  async addMembership(userId: string, groupId: string): Promise<boolean> {
    const uid = requireValue(idSchema, userId, 'userId');
    const gid = requireValue(idSchema, groupId, 'groupId');
    const group = await this.groups.findById(gid);
    if (!group) throw new AppError({ errorCode: ERROR_CODES.GROUP_NOT_FOUND, details: { groupId: gid } });
    return this.locks.use(`user:${uid}`, () => this.actors.addMembership(uid, gid));
  }

  async removeMembership(userId: string, groupId: string): Promise<boolean> {
    const uid = requireValue(idSchema, userId, 'userId');
    const gid = requireValue(idSchema, groupId, 'groupId');
    return this.locks.use(`user:${uid}`, () => this.actors.removeMembership(uid, gid));
  }

  /** Adds the entry, or flips `isDenied` in place when the name is already present. */
  async setGroupPermission(groupId: string, permissionName: string, isDenied: boolean): Promise<SetPermissionResult> {
    const gid = requireValue(idSchema, groupId, 'groupId');
    const name = normalizePermissionName(requireValue(nameSchema, permissionName, 'permissionName'));
    let result: SetPermissionResult = 'unchanged';
    const updated = await this.locks.use(`group:${gid}`, () =>
      this.groups.updateEntries(gid, (entries) => {
        const idx = entries.findIndex((e) => e.permissionName === name);
        if (idx === -1) {
          result = 'added';
          return [...entries, { permissionName: name, isDenied }];
        }
        if (entries[idx].isDenied === isDenied) return null;
        result = 'updated';
        return entries.map((e, i) => (i === idx ? { ...e, isDenied } : e));
      })
    );
    if (!updated) throw new AppError({ errorCode: ERROR_CODES.GROUP_NOT_FOUND, details: { groupId: gid } });
    return result;
  }

  /** No-op when the name is already on the group, whatever its current flag. */
  async addGroupPermission(groupId: string, permissionName: string, isDenied: boolean): Promise<boolean> {
    const gid = requireValue(idSchema, groupId, 'groupId');
    const name = normalizePermissionName(requireValue(nameSchema, permissionName, 'permissionName'));
    let added = false;
    const updated = await this.locks.use(`group:${gid}`, () =>
      this.groups.updateEntries(gid, (entries) => {
        if (entries.some((e) => e.permissionName === name)) return null;
        added = true;
        return [...entries, { permissionName: name, isDenied }];
      })
    );
    if (!updated) throw new AppError({ errorCode: ERROR_CODES.GROUP_NOT_FOUND, details: { groupId: gid } });
    return added;
  }

  /** Back to "inherit": the group neither allows nor denies the name. */
  async removePermissionFromGroup(groupId: string, permissionName: string): Promise<boolean> {
    const gid = requireValue(idSchema, groupId, 'groupId');
    const name = normalizePermissionName(requireValue(nameSchema, permissionName, 'permissionName'));
    let removed = false;
    await this.locks.use(`group:${gid}`, () =>
      this.groups.updateEntries(gid, (entries) => {
        const next = entries.filter((e) => e.permissionName !== name);
        if (next.length === entries.length) return null;
        removed = true;
        return next;
      })
    );
    return removed;
  }

  async removePermissionFromAllGroups(permissionName: string): Promise<number> {
    const name = normalizePermissionName(requireValue(nameSchema, permissionName, 'permissionName'));
    const ids = await this.groups.listIdsReferencingPermission(name);
    let count = 0;
    for (const id of ids) {
      if (await this.removePermissionFromGroup(id, name)) count += 1;
    }
    return count;
  }

  registerPermission(permissionName: string, description: string): boolean {
    const name = requireValue(nameSchema, permissionName, 'permissionName');
    return this.registry.register(name, description);
  }

  /** Unregistering also strips the name from every group that still references it. */
  async unregisterPermission(permissionName: string): Promise<{ unregistered: boolean; groupsUpdated: number }> {
    const name = requireValue(nameSchema, permissionName, 'permissionName');
    const unregistered = this.registry.unregister(name);
    const groupsUpdated = await this.removePermissionFromAllGroups(name);
    if (unregistered || groupsUpdated > 0) {
      this.logger.info('permissions.unregistered', { permissionName: normalizePermissionName(name), groupsUpdated });
    }
    return { unregistered, groupsUpdated };
  }

  async listGroups(channelId: string, page: number): Promise<Page<PermissionGroup>> {
    const ch = requireValue(idSchema, channelId, 'channelId');
    return paginate(await this.groups.listByChannel(ch), page, PERMISSION_PAGE_SIZE);
  }

  async listGroupPermissions(groupId: string, page: number): Promise<Page<PermissionEntry>> {
    const gid = requireValue(idSchema, groupId, 'groupId');
    const group = await this.groups.findById(gid);
    if (!group) throw new AppError({ errorCode: ERROR_CODES.GROUP_NOT_FOUND, details: { groupId: gid } });
    const sorted = [...group.entries].sort((a, b) => a.permissionName.localeCompare(b.permissionName));
    return paginate(sorted, page, PERMISSION_PAGE_SIZE);
  }
}
