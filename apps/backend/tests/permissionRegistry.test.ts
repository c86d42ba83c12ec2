import { describe, expect, it } from 'vitest';

import { BUILTIN_PERMISSIONS, CopyOnWritePermissionRegistry, initPermissionRegistry } from '../src/permissions/permissionRegistry.js';

describe('permission registry', () => {
  it('creates a registry holding every command permission', () => {
    const registry = initPermissionRegistry();
    expect(registry.has('can_permit')).toBe(true);
    expect(registry.has('can_purge')).toBe(true);
  });

  it('registers the built-in names on init', () => {
    const registry = initPermissionRegistry(new CopyOnWritePermissionRegistry());
    expect([...registry.list().keys()].sort()).toEqual(BUILTIN_PERMISSIONS.map((p) => p.name).sort());
  });

  it('normalizes names and refuses duplicates', () => {
    const registry = new CopyOnWritePermissionRegistry();
    expect(registry.register('Can Song Skip', 'Skip the current song')).toBe(true);
    expect(registry.register('can_song_skip', 'again')).toBe(false);
    expect(registry.describe('CAN_SONG_SKIP')).toBe('Skip the current song');
    expect(registry.unregister('can song skip')).toBe(true);
    expect(registry.unregister('can song skip')).toBe(false);
    expect(registry.has('can_song_skip')).toBe(false);
  });

  it('never mutates a snapshot a reader already holds', () => {
    const registry = new CopyOnWritePermissionRegistry();
    registry.register('can_a', 'a');
    const before = registry.list();
    registry.register('can_b', 'b');
    registry.unregister('can_a');

    expect([...before.keys()]).toEqual(['can_a']);
    expect([...registry.list().keys()]).toEqual(['can_b']);
  });

  it('rejects blank names', () => {
    const registry = new CopyOnWritePermissionRegistry();
    expect(() => registry.register('   ', 'nothing')).toThrowError('permissionName is required');
  });
});
