import { beforeEach, describe, expect, it, vi } from 'vitest';
import { UserLevel } from '@chatwarden/shared';

vi.mock('../src/utils/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  getErrorMessage: (err: unknown) => (err instanceof Error ? err.message : String(err)),
}));

import { CopyOnWritePermissionRegistry } from '../src/permissions/permissionRegistry.js';
import { canAct, loadGroupLookup } from '../src/permissions/permissionResolver.js';
import { PermissionService } from '../src/permissions/permissionService.js';
import { createInMemoryRepositories } from './mocks/repositories.js';

function setup() {
  const repos = createInMemoryRepositories();
  const registry = new CopyOnWritePermissionRegistry();
  const service = new PermissionService({ groups: repos.groups, actors: repos.actors, registry });
  return { ...repos, registry, service };
}

describe('permission service', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(async () => {
    ctx = setup();
    await ctx.actors.upsertSeen({ userId: 'u1', login: 'alice', channelId: 'chan-1', level: UserLevel.Viewer });
    await ctx.actors.upsertSeen({ userId: 'u2', login: 'bob', channelId: 'chan-1', level: UserLevel.Viewer });
  });

  it('creates a group once per channel, ignoring case', async () => {
    const first = await ctx.service.createGroup('chan-1', 'Editors');
    const again = await ctx.service.createGroup('chan-1', 'EDITORS');
    const elsewhere = await ctx.service.createGroup('chan-2', 'editors');

    expect(first.created).toBe(true);
    expect(again).toEqual({ group: first.group, created: false });
    expect(elsewhere.created).toBe(true);
    expect(elsewhere.group.id).not.toBe(first.group.id);
  });

  it('rejects blank identifiers', async () => {
    await expect(ctx.service.createGroup('  ', 'Editors')).rejects.toMatchObject({ errorCode: 'INVALID_INPUT' });
    await expect(ctx.service.createGroup('chan-1', '')).rejects.toMatchObject({ errorCode: 'INVALID_INPUT' });
    await expect(ctx.service.addMembership('', 'g')).rejects.toMatchObject({ errorCode: 'INVALID_INPUT' });
    await expect(ctx.service.setGroupPermission('g', ' ', false)).rejects.toMatchObject({ errorCode: 'INVALID_INPUT' });
  });

  it('adds, flips and keeps permission entries', async () => {
    const { group } = await ctx.service.createGroup('chan-1', 'Editors');

    expect(await ctx.service.setGroupPermission(group.id, 'Can Song Skip', false)).toBe('added');
    expect(await ctx.service.setGroupPermission(group.id, 'can_song_skip', true)).toBe('updated');
    expect(await ctx.service.setGroupPermission(group.id, 'can_song_skip', true)).toBe('unchanged');

    expect(ctx.groups.rows.get(group.id)?.entries).toEqual([{ permissionName: 'can_song_skip', isDenied: true }]);
  });

  it('treats add as idempotent when the name already exists', async () => {
    const { group } = await ctx.service.createGroup('chan-1', 'Editors');
    expect(await ctx.service.addGroupPermission(group.id, 'can_song_skip', false)).toBe(true);
    expect(await ctx.service.addGroupPermission(group.id, 'can_song_skip', true)).toBe(false);
    expect(ctx.groups.rows.get(group.id)?.entries).toEqual([{ permissionName: 'can_song_skip', isDenied: false }]);
  });

  it('returns a group to inherit by removing its entry', async () => {
    const { group } = await ctx.service.createGroup('chan-1', 'Editors');
    await ctx.service.setGroupPermission(group.id, 'can_song_skip', true);
    expect(await ctx.service.removePermissionFromGroup(group.id, 'can_song_skip')).toBe(true);
    expect(await ctx.service.removePermissionFromGroup(group.id, 'can_song_skip')).toBe(false);
    expect(ctx.groups.rows.get(group.id)?.entries).toEqual([]);
  });

  it('reports unknown groups on entry updates', async () => {
    await expect(ctx.service.setGroupPermission('missing', 'can_song_skip', false)).rejects.toMatchObject({
      errorCode: 'GROUP_NOT_FOUND',
    });
    await expect(ctx.service.addMembership('u1', 'missing')).rejects.toMatchObject({ errorCode: 'GROUP_NOT_FOUND' });
  });

  it('reports unknown users on membership changes', async () => {
    const { group } = await ctx.service.createGroup('chan-1', 'Editors');
    await expect(ctx.service.addMembership('ghost', group.id)).rejects.toMatchObject({ errorCode: 'USER_NOT_FOUND' });
  });

  it('does not lose concurrent updates to one group', async () => {
    const { group } = await ctx.service.createGroup('chan-1', 'Editors');
    const names = Array.from({ length: 20 }, (_, i) => `can_perm_${i}`);

    await Promise.all(names.map((name) => ctx.service.setGroupPermission(group.id, name, false)));

    const stored = ctx.groups.rows.get(group.id)?.entries.map((e) => e.permissionName) ?? [];
    expect(stored.sort()).toEqual([...names].sort());
  });

  it('removes members before deleting a group', async () => {
    const { group } = await ctx.service.createGroup('chan-1', 'Editors');
    await ctx.service.setGroupPermission(group.id, 'can_song_skip', false);
    await ctx.service.addMembership('u1', group.id);
    await ctx.service.addMembership('u2', group.id);

    const before = await ctx.actors.findActor('u1', 'chan-1');
    expect(canAct(before, UserLevel.Custom, 'can_song_skip', await loadGroupLookup(ctx.groups, before, 'chan-1'))).toBe(true);

    expect(await ctx.service.deleteGroup(group.id)).toBe(true);

    expect(ctx.actors.users.get('u1')?.groupMemberships).toEqual([]);
    expect(ctx.actors.users.get('u2')?.groupMemberships).toEqual([]);
    expect(ctx.groups.rows.has(group.id)).toBe(false);

    const after = await ctx.actors.findActor('u1', 'chan-1');
    expect(canAct(after, UserLevel.Custom, 'can_song_skip', await loadGroupLookup(ctx.groups, after, 'chan-1'))).toBe(false);
  });

  it('only projects memberships of the channel being evaluated', async () => {
    const home = await ctx.service.createGroup('chan-1', 'Admins');
    const away = await ctx.service.createGroup('chan-2', 'Admins');
    await ctx.service.addMembership('u1', home.group.id);
    await ctx.service.addMembership('u1', away.group.id);

    expect((await ctx.actors.findActor('u1', 'chan-1'))?.groupMemberships).toEqual([home.group.id]);
    expect((await ctx.actors.findActor('u1', 'chan-2'))?.groupMemberships).toEqual([away.group.id]);
    expect((await ctx.actors.findActor('u1', 'chan-3'))?.groupMemberships).toEqual([]);
  });

  it('deletes by name and reports a missing group', async () => {
    await ctx.service.createGroup('chan-1', 'Editors');
    expect(await ctx.service.deleteGroupByName('chan-1', 'editors')).toBe(true);
    expect(await ctx.service.deleteGroupByName('chan-1', 'editors')).toBe(false);
  });

  it('strips an unregistered name from every group', async () => {
    ctx.service.registerPermission('can_song_skip', 'Skip songs');
    const a = await ctx.service.createGroup('chan-1', 'A');
    const b = await ctx.service.createGroup('chan-2', 'B');
    const c = await ctx.service.createGroup('chan-1', 'C');
    await ctx.service.setGroupPermission(a.group.id, 'can_song_skip', false);
    await ctx.service.setGroupPermission(b.group.id, 'can_song_skip', true);
    await ctx.service.setGroupPermission(c.group.id, 'can_other', false);

    const result = await ctx.service.unregisterPermission('can_song_skip');

    expect(result).toEqual({ unregistered: true, groupsUpdated: 2 });
    expect(ctx.registry.has('can_song_skip')).toBe(false);
    expect(ctx.groups.rows.get(a.group.id)?.entries).toEqual([]);
    expect(ctx.groups.rows.get(b.group.id)?.entries).toEqual([]);
    expect(ctx.groups.rows.get(c.group.id)?.entries).toEqual([{ permissionName: 'can_other', isDenied: false }]);
  });

  it('pages groups ten at a time and clamps the page', async () => {
    for (let i = 1; i <= 12; i += 1) {
      await ctx.service.createGroup('chan-1', `group-${String(i).padStart(2, '0')}`);
    }

    const second = await ctx.service.listGroups('chan-1', 2);
    expect(second.items.map((g) => g.name)).toEqual(['group-11', 'group-12']);
    expect(second).toMatchObject({ page: 2, pageCount: 2, total: 12 });

    expect((await ctx.service.listGroups('chan-1', 99)).page).toBe(2);
    expect((await ctx.service.listGroups('chan-1', 0)).page).toBe(1);
    expect((await ctx.service.listGroups('chan-9', 1)).pageCount).toBe(1);
  });

  it('lists group permissions sorted by name', async () => {
    const { group } = await ctx.service.createGroup('chan-1', 'Editors');
    await ctx.service.setGroupPermission(group.id, 'can_zeta', true);
    await ctx.service.setGroupPermission(group.id, 'can_alpha', false);

    const page = await ctx.service.listGroupPermissions(group.id, 1);
    expect(page.items).toEqual([
      { permissionName: 'can_alpha', isDenied: false },
      { permissionName: 'can_zeta', isDenied: true },
    ]);
  });
});
