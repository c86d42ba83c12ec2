import {
  UserLevel,
  commandPermissionName,
  hasFlag,
  hasLevel,
  normalizePermissionName,
  satisfiesRank,
  type Actor,
  type PermissionGroup,
  type UserLevelMask,
} from '@chatwarden/shared';
import type { PermissionGroupRepository } from '../repositories/types.js';

/** Resolves a group id against groups the caller has already loaded. */
export type GroupLookup = (groupId: string) => PermissionGroup | undefined;

export type ResolverOptions = {
  /** Called for membership ids that no longer resolve to a group. */
  onDanglingGroup?: (groupId: string) => void;
};

export const EMPTY_GROUP_LOOKUP: GroupLookup = () => undefined;

export function groupLookupFrom(groups: Iterable<PermissionGroup>): GroupLookup {
  const byId = new Map<string, PermissionGroup>();
  for (const g of groups) byId.set(g.id, g);
  return (groupId) => byId.get(groupId);
}

/**
 * Deny wins: the permission is granted only when some group allows it and no
 * group the actor belongs to denies it.
 */
export function hasCustomPermission(
  memberships: readonly string[],
  permissionName: string,
  groups: GroupLookup,
  options: ResolverOptions = {}
): boolean {
  const name = normalizePermissionName(permissionName);
  if (!name) return false;

  let allowed = false;
  let denied = false;
  for (const groupId of memberships) {
    const group = groups(groupId);
    if (!group) {
      options.onDanglingGroup?.(groupId);
      continue;
    }
    for (const entry of group.entries) {
      if (normalizePermissionName(entry.permissionName) !== name) continue;
      if (entry.isDenied) denied = true;
      else allowed = true;
    }
  }
  return allowed && !denied;
}

export function canAct(
  actor: Actor | null,
  requiredLevel: UserLevelMask,
  permissionName: string | null | undefined,
  groups: GroupLookup,
  options: ResolverOptions = {}
): boolean {
  const viewerAllowed = hasLevel(requiredLevel, UserLevel.Viewer);
  if (!actor) return viewerAllowed;

  if (actor.globalStanding === 'banned') return false;
  if (actor.globalStanding === 'super_admin' || hasLevel(actor.levelInChannel, UserLevel.Broadcaster) || viewerAllowed) {
    return true;
  }

  if (satisfiesRank(actor.levelInChannel, requiredLevel) || hasFlag(actor.levelInChannel, requiredLevel)) {
    return true;
  }

  const name = String(permissionName ?? '').trim();
  if (hasLevel(requiredLevel, UserLevel.Custom) && name) {
    return hasCustomPermission(actor.groupMemberships, name, groups, options);
  }
  return false;
}

/** Commands are gated by `can_<words>` when their level includes Custom. */
export function canRunCommand(
  actor: Actor | null,
  requiredLevel: UserLevelMask,
  commandWords: readonly string[],
  groups: GroupLookup,
  options: ResolverOptions = {}
): boolean {
  return canAct(actor, requiredLevel, commandPermissionName(commandWords), groups, options);
}

/** Groups owned by another channel never resolve, whatever the actor's membership list says. */
export async function loadGroupLookup(repo: PermissionGroupRepository, actor: Actor | null, channelId: string): Promise<GroupLookup> {
  if (!actor || actor.groupMemberships.length === 0) return EMPTY_GROUP_LOOKUP;
  const groups = await repo.findManyByIds(actor.groupMemberships);
  return groupLookupFrom(groups.filter((g) => g.channelId === channelId));
}
