import { normalizePermissionName } from '@chatwarden/shared';
import { AppError, ERROR_CODES } from '../shared/errors.js';

/** Names that plugins and commands gate features behind. Advisory only: the resolver never reads it. */
export interface PermissionRegistry {
  register(permissionName: string, description: string): boolean;
  unregister(permissionName: string): boolean;
  has(permissionName: string): boolean;
  describe(permissionName: string): string | undefined;
  list(): ReadonlyMap<string, string>;
}

function requireName(permissionName: string): string {
  const key = normalizePermissionName(permissionName);
  if (!key) {
    throw new AppError({ errorCode: ERROR_CODES.INVALID_INPUT, message: 'permissionName is required' });
  }
  return key;
}

/**
 * Readers always see an immutable snapshot; writers build a new map and swap
 * the reference, so a lookup never waits on a registration.
 */
export class CopyOnWritePermissionRegistry implements PermissionRegistry {
  private snapshot: ReadonlyMap<string, string> = new Map();

  register(permissionName: string, description: string): boolean {
    const key = requireName(permissionName);
    if (this.snapshot.has(key)) return false;
    const next = new Map(this.snapshot);
    next.set(key, String(description ?? ''));
    this.snapshot = next;
    return true;
  }

  unregister(permissionName: string): boolean {
    const key = requireName(permissionName);
    if (!this.snapshot.has(key)) return false;
    const next = new Map(this.snapshot);
    next.delete(key);
    this.snapshot = next;
    return true;
  }

  has(permissionName: string): boolean {
    return this.snapshot.has(normalizePermissionName(permissionName));
  }

  describe(permissionName: string): string | undefined {
    return this.snapshot.get(normalizePermissionName(permissionName));
  }

  list(): ReadonlyMap<string, string> {
    return this.snapshot;
  }
}

export const BUILTIN_PERMISSIONS: ReadonlyArray<{ name: string; description: string }> = [
  { name: 'can_permissions_group', description: 'Manage custom permission groups' },
  { name: 'can_permissions_user', description: 'Manage permission group membership' },
  { name: 'can_moderation', description: 'Toggle chat moderation filters' },
  { name: 'can_permit', description: 'Permit a user to post one link' },
  { name: 'can_purge', description: 'Clear recent messages containing a phrase' },
  { name: 'moderation_exempt', description: 'Skip filters whose excluded levels include Custom' },
];

export function initPermissionRegistry(registry: PermissionRegistry = new CopyOnWritePermissionRegistry()): PermissionRegistry {
  for (const p of BUILTIN_PERMISSIONS) registry.register(p.name, p.description);
  return registry;
}
