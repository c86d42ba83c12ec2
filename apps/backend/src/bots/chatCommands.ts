import {
  GLOBAL_STANDINGS,
  UserLevel,
  combineLevels,
  normalizeLogin,
  parsePositiveInt,
  type Actor,
  type UserLevelMask,
} from '@chatwarden/shared';
import { canRunCommand, type GroupLookup } from '../permissions/permissionResolver.js';
import type { PermissionService } from '../permissions/permissionService.js';
import type { LinkPermitStore } from '../moderation/linkPermits.js';
import type { MessageCache } from '../moderation/messageCache.js';
import { escapeRegExp, type PolicyCache } from '../moderation/policy.js';
import type { ActorRepository, ModerationLogRepository } from '../repositories/types.js';
import { isAppError } from '../shared/errors.js';
import { getErrorMessage, logger as defaultLogger, type Logger } from '../utils/logger.js';
import { createModerationCommands } from './moderationCommands.js';
import type { ChatTransport } from './moderationExecutor.js';

export type CommandInvocation = {
  actor: Actor | null;
  groups: GroupLookup;
  channelId: string;
  channelLogin: string;
  senderLogin: string;
  text: string;
  /** Connection the message arrived on; commands that act on other users go through it. */
  transport: Pick<ChatTransport, 'timeout'>;
};

export type ChatCommandDeps = {
  botLogin: string;
  permissions: PermissionService;
  actors: ActorRepository;
  policies: PolicyCache;
  permits: LinkPermitStore;
  messages: MessageCache;
  journal: ModerationLogRepository;
  clock?: () => number;
  logger?: Logger;
};

export type CommandArgs = {
  inv: CommandInvocation;
  args: string[];
};

export type CommandDef = {
  /** Words after the bot prefix that select this command. */
  path: string[];
  /** Words the custom permission name is derived from (`can_<words>`). */
  permissionWords: string[];
  requiredLevel: UserLevelMask;
  /** Only super admins may run it; levels and groups are not consulted. */
  superAdminOnly?: boolean;
  usage: string;
  /** null means the arguments did not fit; the usage line is sent instead. */
  run: (c: CommandArgs) => Promise<string | null>;
};

const GROUP_ADMIN = combineLevels(UserLevel.Broadcaster, UserLevel.Custom);
const MOD_OR_CUSTOM = combineLevels(UserLevel.Moderator, UserLevel.Custom);

/** Optional leading page number followed by the rest of the arguments. */
function splitPage(args: string[]): { page: number; rest: string[] } {
  const page = args.length > 1 ? parsePositiveInt(args[0]) : null;
  return page === null ? { page: 1, rest: args } : { page, rest: args.slice(1) };
}

export function createChatCommandRouter(deps: ChatCommandDeps) {
  const log = deps.logger ?? defaultLogger;
  const clock = deps.clock ?? Date.now;
  const botLogin = normalizeLogin(deps.botLogin);
  const prefix = `!${botLogin}`;
  const svc = deps.permissions;

  const groupByName = async (channelId: string, name: string) => svc.getGroupByName(channelId, name);

  const commands: CommandDef[] = [
    {
      path: ['permissions', 'group', 'create'],
      permissionWords: ['permissions', 'group'],
      requiredLevel: GROUP_ADMIN,
      usage: 'permissions group create <group>',
      run: async ({ inv, args }) => {
        const name = args.join(' ');
        if (!name) return null;
        const { created } = await svc.createGroup(inv.channelId, name);
        return created ? `Group "${name}" created.` : `Group "${name}" already exists.`;
      },
    },
    {
      path: ['permissions', 'group', 'remove'],
      permissionWords: ['permissions', 'group'],
      requiredLevel: GROUP_ADMIN,
      usage: 'permissions group remove <group>',
      run: async ({ inv, args }) => {
        const name = args.join(' ');
        if (!name) return null;
        return (await svc.deleteGroupByName(inv.channelId, name)) ? `Group "${name}" removed.` : `Group "${name}" not found.`;
      },
    },
    {
      path: ['permissions', 'group', 'list'],
      permissionWords: ['permissions', 'group'],
      requiredLevel: GROUP_ADMIN,
      usage: 'permissions group list [page]',
      run: async ({ inv, args }) => {
        const page = args[0] === undefined ? 1 : parsePositiveInt(args[0]);
        if (page === null) return null;
        const result = await svc.listGroups(inv.channelId, page);
        if (result.total === 0) return 'No permission groups yet.';
        return `Groups (page ${result.page}/${result.pageCount}): ${result.items.map((g) => g.name).join(', ')}`;
      },
    },
    ...(['allow', 'deny'] as const).map(
      (verb): CommandDef => ({
        path: ['permissions', 'group', verb],
        permissionWords: ['permissions', 'group'],
        requiredLevel: GROUP_ADMIN,
        usage: `permissions group ${verb} <permission> <group>`,
        run: async ({ inv, args }) => {
          const [permission, ...rest] = args;
          const name = rest.join(' ');
          if (!permission || !name) return null;
          const group = await groupByName(inv.channelId, name);
          if (!group) return `Group "${name}" not found.`;
          const result = await svc.setGroupPermission(group.id, permission, verb === 'deny');
          return result === 'unchanged'
            ? `Group "${group.name}" already ${verb === 'deny' ? 'denies' : 'allows'} ${permission}.`
            : `Group "${group.name}" now ${verb === 'deny' ? 'denies' : 'allows'} ${permission}.`;
        },
      })
    ),
    {
      path: ['permissions', 'group', 'inherit'],
      permissionWords: ['permissions', 'group'],
      requiredLevel: GROUP_ADMIN,
      usage: 'permissions group inherit <permission> <group>',
      run: async ({ inv, args }) => {
        const [permission, ...rest] = args;
        const name = rest.join(' ');
        if (!permission || !name) return null;
        const group = await groupByName(inv.channelId, name);
        if (!group) return `Group "${name}" not found.`;
        const removed = await svc.removePermissionFromGroup(group.id, permission);
        return removed
          ? `Group "${group.name}" now inherits ${permission}.`
          : `Group "${group.name}" has no entry for ${permission}.`;
      },
    },
    {
      path: ['permissions', 'group', 'listpermissions'],
      permissionWords: ['permissions', 'group'],
      requiredLevel: GROUP_ADMIN,
      usage: 'permissions group listpermissions [page] <group>',
      run: async ({ inv, args }) => {
        const { page, rest } = splitPage(args);
        const name = rest.join(' ');
        if (!name) return null;
        const group = await groupByName(inv.channelId, name);
        if (!group) return `Group "${name}" not found.`;
        const result = await svc.listGroupPermissions(group.id, page);
        if (result.total === 0) return `Group "${group.name}" has no permissions.`;
        const items = result.items.map((e) => `${e.permissionName} (${e.isDenied ? 'deny' : 'allow'})`);
        return `Permissions for "${group.name}" (page ${result.page}/${result.pageCount}): ${items.join(', ')}`;
      },
    },
    ...(['add', 'remove'] as const).map(
      (verb): CommandDef => ({
        path: ['permissions', 'user', verb],
        permissionWords: ['permissions', 'user'],
        requiredLevel: GROUP_ADMIN,
        usage: `permissions user ${verb} <user> <group>`,
        run: async ({ inv, args }) => {
          const [rawLogin, ...rest] = args;
          const login = normalizeLogin(rawLogin);
          const name = rest.join(' ');
          if (!login || !name) return null;
          const group = await groupByName(inv.channelId, name);
          if (!group) return `Group "${name}" not found.`;
          const userId = await deps.actors.findUserIdByLogin(login);
          if (!userId) return `User ${login} has not been seen in chat.`;
          if (verb === 'add') {
            const added = await svc.addMembership(userId, group.id);
            return added ? `${login} added to "${group.name}".` : `${login} is already in "${group.name}".`;
          }
          const removed = await svc.removeMembership(userId, group.id);
          return removed ? `${login} removed from "${group.name}".` : `${login} is not in "${group.name}".`;
        },
      })
    ),
    ...createModerationCommands({ policies: deps.policies, journal: deps.journal, log }),
    {
      path: ['permit'],
      permissionWords: ['permit'],
      requiredLevel: MOD_OR_CUSTOM,
      usage: 'permit <user>',
      run: async ({ inv, args }) => {
        const login = normalizeLogin(args[0]);
        if (!login) return null;
        const policy = await deps.policies.get(inv.channelId);
        const seconds = policy?.document.links.permitSeconds ?? 30;
        deps.permits.grant(inv.channelId, login, seconds, clock());
        return `${login} may post one link in the next ${seconds} seconds.`;
      },
    },
    {
      path: ['purge'],
      permissionWords: ['purge'],
      requiredLevel: MOD_OR_CUSTOM,
      usage: 'purge <phrase>',
      run: async ({ inv, args }) => {
        const phrase = args.join(' ');
        if (!phrase) return null;
        const spared = new Set([inv.senderLogin, inv.channelLogin, botLogin]);
        const logins = deps.messages
          .loginsWhoSentMatching(inv.channelId, new RegExp(escapeRegExp(phrase), 'i'))
          .filter((login) => !spared.has(login));
        if (logins.length === 0) return `No recent messages contain "${phrase}".`;

        let purged = 0;
        for (const login of logins) {
          try {
            await inv.transport.timeout(inv.channelLogin, login, 1, `purge by ${inv.senderLogin}`);
            purged += 1;
          } catch (err) {
            log.warn('commands.purge_failed', { channelId: inv.channelId, login, errorMessage: getErrorMessage(err) });
          }
        }
        log.info('commands.purged', { channelId: inv.channelId, matched: logins.length, purged, by: inv.senderLogin });
        return `Purged ${purged} user${purged === 1 ? '' : 's'} for "${phrase}".`;
      },
    },
    {
      path: ['standing'],
      permissionWords: ['standing'],
      requiredLevel: 0,
      superAdminOnly: true,
      usage: `standing <user> ${GLOBAL_STANDINGS.join('|')}`,
      run: async ({ inv, args }) => {
        const login = normalizeLogin(args[0]);
        const standing = GLOBAL_STANDINGS.find((s) => s === String(args[1] ?? '').toLowerCase());
        if (!login || !standing) return null;
        if (login === inv.senderLogin) return 'You cannot change your own standing.';
        const userId = await deps.actors.findUserIdByLogin(login);
        if (!userId || !(await deps.actors.setGlobalStanding(userId, standing))) return `User ${login} has not been seen in chat.`;
        log.info('commands.standing_changed', { userId, standing, by: inv.senderLogin });
        return `${login} now has standing ${standing}.`;
      },
    },
  ];

  function match(words: string[]): { def: CommandDef; args: string[] } | null {
    let best: CommandDef | null = null;
    for (const def of commands) {
      const fits = def.path.every((w, i) => words[i]?.toLowerCase() === w);
      if (fits && (!best || def.path.length > best.path.length)) best = def;
    }
    return best ? { def: best, args: words.slice(best.path.length) } : null;
  }

  /** Reply text for a bot command, or null when the message is not addressed to the bot. */
  async function handle(inv: CommandInvocation): Promise<string | null> {
    const words = inv.text.trim().split(/\s+/);
    if (words[0]?.toLowerCase() !== prefix) return null;

    const found = match(words.slice(1));
    if (!found) {
      return `@${inv.senderLogin}, usage: ${prefix} permissions group|user ..., ${prefix} moderation <filter> ..., ${prefix} permit <user>, ${prefix} purge <phrase>`;
    }
    const { def, args } = found;
    const allowed = def.superAdminOnly
      ? inv.actor?.globalStanding === 'super_admin'
      : canRunCommand(inv.actor, def.requiredLevel, def.permissionWords, inv.groups);
    if (!allowed) {
      log.info('commands.denied', { channelId: inv.channelId, command: def.path.join(' '), login: inv.senderLogin });
      return `@${inv.senderLogin}, you do not have permission to use ${prefix} ${def.path.join(' ')}.`;
    }

    try {
      const reply = await def.run({ inv, args });
      return `@${inv.senderLogin}, ${reply ?? `usage: ${prefix} ${def.usage}`}`;
    } catch (err) {
      if (
        isAppError(err, 'INVALID_INPUT') ||
        isAppError(err, 'GROUP_NOT_FOUND') ||
        isAppError(err, 'USER_NOT_FOUND') ||
        isAppError(err, 'POLICY_INVALID')
      ) {
        return `@${inv.senderLogin}, ${err.message}.`;
      }
      throw err;
    }
  }

  return { handle, prefix };
}

export type ChatCommandRouter = ReturnType<typeof createChatCommandRouter>;
