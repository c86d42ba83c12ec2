import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ChatUserstate } from 'tmi.js';
import { UserLevel } from '@chatwarden/shared';

const tmiMocks = vi.hoisted(() => {
  type FakeHandler = (...args: unknown[]) => unknown;
  const clients: FakeClient[] = [];

  class FakeClient {
    handlers = new Map<string, FakeHandler>();
    say = vi.fn().mockResolvedValue(['#streamer', '']);
    deletemessage = vi.fn().mockResolvedValue(['#streamer']);
    timeout = vi.fn().mockResolvedValue(['#streamer', '', 0, '']);
    ban = vi.fn().mockResolvedValue(['#streamer', '', '']);
    connect = vi.fn().mockResolvedValue(['irc-ws.chat.twitch.tv', 443]);
    disconnect = vi.fn().mockResolvedValue(['irc-ws.chat.twitch.tv', 443]);
    constructor(public opts: unknown) {
      clients.push(this);
    }
    on(event: string, handler: FakeHandler) {
      this.handlers.set(event, handler);
    }
    emit(event: string, ...args: unknown[]) {
      const handler = this.handlers.get(event);
      return handler ? handler(...args) : undefined;
    }
  }

  return { clients, FakeClient };
});

const { loggerMock } = vi.hoisted(() => ({
  loggerMock: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock('tmi.js', () => ({
  default: { client: (opts: unknown) => new tmiMocks.FakeClient(opts) },
}));

vi.mock('../../src/utils/logger.js', () => ({
  logger: loggerMock,
  getErrorMessage: (err: unknown) => (err instanceof Error ? err.message : String(err)),
}));

import { createChatCommandRouter } from '../../src/bots/chatCommands.js';
import { ModerationExecutor } from '../../src/bots/moderationExecutor.js';
import { createChatMessageHandler, startTwitchChatBot } from '../../src/bots/twitchChatBot.js';
import { LinkPermitStore } from '../../src/moderation/linkPermits.js';
import { MessageCache } from '../../src/moderation/messageCache.js';
import { ModerationEngine } from '../../src/moderation/moderationEngine.js';
import { PolicyCache } from '../../src/moderation/policy.js';
import { WarningStateTracker } from '../../src/moderation/warningState.js';
import { CopyOnWritePermissionRegistry } from '../../src/permissions/permissionRegistry.js';
import { PermissionService } from '../../src/permissions/permissionService.js';
import { createInMemoryRepositories } from '../mocks/repositories.js';

const T0 = 1_700_000_000_000;

const CAPS_POLICY = {
  caps: {
    enabled: true,
    minimumMessageLength: 10,
    warningTier: { kind: 'timeout', durationSeconds: 30, userFacingMessage: '{user}, calm down' },
  },
};

function setup(options: { superAdmins?: string[] } = {}) {
  const repos = createInMemoryRepositories({ 'chan-1': CAPS_POLICY });
  const policies = new PolicyCache(repos.policies, { ttlMs: 60_000, now: () => T0 });
  const messages = new MessageCache();
  const permits = new LinkPermitStore();
  const engine = new ModerationEngine({ warnings: new WarningStateTracker(), messages, permits, clock: () => T0 });
  const permissions = new PermissionService({ groups: repos.groups, actors: repos.actors, registry: new CopyOnWritePermissionRegistry() });
  const commands = createChatCommandRouter({
    botLogin: 'chatbot',
    permissions,
    actors: repos.actors,
    policies,
    permits,
    messages,
    journal: repos.moderationLog,
    clock: () => T0,
  });
  const transport = { say: vi.fn(), deleteMessage: vi.fn(), timeout: vi.fn(), ban: vi.fn() };
  transport.say.mockResolvedValue(undefined);
  transport.timeout.mockResolvedValue(undefined);
  const executor = new ModerationExecutor({ transport, logger: loggerMock, clock: () => T0 });
  const base = { repos, policies, engine, messages, commands, clock: () => T0, logger: loggerMock };
  const handler = createChatMessageHandler({ ...base, executor, transport, superAdmins: options.superAdmins });
  return { ...repos, base, messages, transport, handler };
}

function tags(overrides: ChatUserstate = {}): ChatUserstate {
  return {
    'room-id': 'chan-1',
    'user-id': 'user-1',
    username: 'viewer_one',
    id: 'msg-1',
    'message-type': 'chat',
    ...overrides,
  };
}

describe('twitch chat message handler', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    vi.clearAllMocks();
    ctx = setup();
  });

  it('moderates a loud viewer and skips commands in that message', async () => {
    await ctx.handler({ channel: '#streamer', tags: tags(), text: '!CHATBOT PERMIT SOMEONE NOW', self: false });

    expect(ctx.transport.timeout).toHaveBeenCalledWith('streamer', 'viewer_one', 30, 'caps (warning)');
    expect(ctx.transport.say).toHaveBeenCalledTimes(1);
    expect(ctx.transport.say).toHaveBeenCalledWith('streamer', 'viewer_one, calm down');
    expect(loggerMock.info).toHaveBeenCalledWith('moderation.decision', {
      channelId: 'chan-1',
      userId: 'user-1',
      kind: 'caps',
      tier: 'warning',
      punishment: 'timeout',
      durationSeconds: 30,
    });
  });

  it('records the sender and runs bot commands', async () => {
    await ctx.handler({
      channel: '#streamer',
      tags: tags({ 'user-id': 'owner', username: 'Streamer', badges: { broadcaster: '1' } }),
      text: '!chatbot permissions group create Editors',
      self: false,
    });

    expect(ctx.transport.say).toHaveBeenCalledWith('streamer', '@streamer, Group "Editors" created.');
    expect(ctx.actors.users.get('owner')).toMatchObject({ login: 'streamer' });
    expect(ctx.messages.countFromUserSince('chan-1', 'owner', 0)).toBe(1);
  });

  it('grants group permissions only in the channel that owns the group', async () => {
    const { group } = await ctx.groups.create('chan-1', 'Admins');
    await ctx.groups.updateEntries(group.id, () => [{ permissionName: 'can_permissions_group', isDenied: false }]);
    await ctx.actors.upsertSeen({ userId: 'user-2', login: 'friend', channelId: 'chan-1', level: UserLevel.Viewer });
    await ctx.actors.addMembership('user-2', group.id);
    const friend = { 'user-id': 'user-2', username: 'friend' };

    await ctx.handler({
      channel: '#otherchan',
      tags: tags({ ...friend, 'room-id': 'chan-2' }),
      text: '!chatbot permissions group create pwned',
      self: false,
    });
    expect(ctx.transport.say).toHaveBeenLastCalledWith(
      'otherchan',
      '@friend, you do not have permission to use !chatbot permissions group create.'
    );
    expect(await ctx.groups.listByChannel('chan-2')).toEqual([]);

    await ctx.handler({ channel: '#streamer', tags: tags(friend), text: '!chatbot permissions group create pwned', self: false });
    expect(ctx.transport.say).toHaveBeenLastCalledWith('streamer', '@friend, Group "pwned" created.');
  });

  it('promotes configured super admins, who can then set standing', async () => {
    ctx = setup({ superAdmins: ['Admin_One'] });
    await ctx.handler({ channel: '#streamer', tags: tags({ 'user-id': 'user-3', username: 'troll' }), text: 'hello there', self: false });

    await ctx.handler({
      channel: '#streamer',
      tags: tags({ 'user-id': 'user-9', username: 'admin_one' }),
      text: '!chatbot standing troll banned',
      self: false,
    });

    expect(ctx.transport.say).toHaveBeenLastCalledWith('streamer', '@admin_one, troll now has standing banned.');
    expect(ctx.actors.users.get('user-9')?.globalStanding).toBe('super_admin');
    expect(ctx.actors.users.get('user-3')?.globalStanding).toBe('banned');
    expect(loggerMock.info).toHaveBeenCalledWith('chatbot.super_admin_promoted', { userId: 'user-9', login: 'admin_one' });
  });

  it('purges earlier messages through the connection the command came in on', async () => {
    await ctx.handler({ channel: '#streamer', tags: tags(), text: 'cheap followers at example dot com', self: false });

    await ctx.handler({
      channel: '#streamer',
      tags: tags({ 'user-id': 'mod-1', username: 'mod_one', badges: { moderator: '1' } }),
      text: '!chatbot purge cheap followers',
      self: false,
    });

    expect(ctx.transport.timeout).toHaveBeenCalledWith('streamer', 'viewer_one', 1, 'purge by mod_one');
    expect(ctx.transport.say).toHaveBeenLastCalledWith('streamer', '@mod_one, Purged 1 user for "cheap followers".');
  });

  it('ignores its own messages and messages without identity tags', async () => {
    await ctx.handler({ channel: '#streamer', tags: tags(), text: 'HELLO WORLD THIS IS LOUD', self: true });
    await ctx.handler({ channel: '#streamer', tags: tags({ 'room-id': undefined }), text: 'HELLO WORLD THIS IS LOUD', self: false });

    expect(ctx.transport.timeout).not.toHaveBeenCalled();
    expect(ctx.actors.users.size).toBe(0);
    expect(ctx.messages.size).toBe(0);
  });

  it('keeps moderating when the sender cannot be stored', async () => {
    vi.spyOn(ctx.actors, 'upsertSeen').mockRejectedValueOnce(new Error('db down'));

    await ctx.handler({ channel: '#streamer', tags: tags(), text: 'HELLO WORLD THIS IS LOUD', self: false });

    expect(loggerMock.error).toHaveBeenCalledWith('chatbot.actor_upsert_failed', {
      channelId: 'chan-1',
      userId: 'user-1',
      errorMessage: 'db down',
    });
    expect(ctx.transport.timeout).toHaveBeenCalledWith('streamer', 'viewer_one', 30, 'caps (warning)');
  });

  it('logs instead of rejecting when a reply cannot be sent', async () => {
    ctx.transport.say.mockRejectedValueOnce(new Error('not connected'));

    await expect(
      ctx.handler({
        channel: '#streamer',
        tags: tags({ badges: { moderator: '1' } }),
        text: '!chatbot permit someone',
        self: false,
      })
    ).resolves.toBeUndefined();

    expect(loggerMock.error).toHaveBeenCalledWith('chatbot.message_failed', { channel: '#streamer', errorMessage: 'not connected' });
  });
});

describe('twitch chat bot', () => {
  beforeEach(() => {
    tmiMocks.clients.length = 0;
    vi.clearAllMocks();
  });

  it('connects to the configured channels and handles chat', async () => {
    const { base } = setup();
    const bot = startTwitchChatBot({ ...base, botLogin: 'ChatBot', oauthToken: 'test-token', channels: ['#Streamer', 'streamer'] });
    expect(bot).not.toBeNull();

    const client = tmiMocks.clients[0];
    expect(client.opts).toMatchObject({
      identity: { username: 'chatbot', password: 'oauth:test-token' },
      channels: ['streamer'],
    });
    expect(client.connect).toHaveBeenCalledTimes(1);

    client.emit('message', '#streamer', tags(), 'HELLO WORLD THIS IS LOUD', false);
    await vi.waitFor(() => {
      expect(client.timeout).toHaveBeenCalledWith('streamer', 'viewer_one', 30, 'caps (warning)');
    });

    await bot?.stop();
    await bot?.stop();
    expect(client.disconnect).toHaveBeenCalledTimes(1);
  });

  it('tags timeouts with the moderation log entry', async () => {
    const { base, moderationLog } = setup();
    const bot = startTwitchChatBot({ ...base, journal: moderationLog, botLogin: 'chatbot', oauthToken: 'test-token', channels: ['streamer'] });
    const client = tmiMocks.clients[0];

    client.emit('message', '#streamer', tags(), 'HELLO WORLD THIS IS LOUD', false);
    await vi.waitFor(() => {
      expect(client.timeout).toHaveBeenCalledTimes(1);
    });

    expect(moderationLog.entries).toHaveLength(1);
    expect(moderationLog.entries[0]).toMatchObject({ channelId: 'chan-1', userLogin: 'viewer_one', filterKind: 'caps', messageText: 'HELLO WORLD THIS IS LOUD' });
    expect(client.timeout).toHaveBeenCalledWith('streamer', 'viewer_one', 30, `caps (warning) [${moderationLog.entries[0]?.id}]`);
    await bot?.stop();
  });

  it('does not start without channels', () => {
    const { base } = setup();
    expect(startTwitchChatBot({ ...base, botLogin: 'chatbot', oauthToken: 'test-token', channels: [] })).toBeNull();
    expect(loggerMock.warn).toHaveBeenCalledWith('chatbot.missing_channels', {});
    expect(tmiMocks.clients).toHaveLength(0);
  });
});
