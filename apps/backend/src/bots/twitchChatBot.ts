import type { ChatUserstate } from 'tmi.js';
import { normalizeLogin, type Actor, type ChatMessage } from '@chatwarden/shared';
import { loadGroupLookup } from '../permissions/permissionResolver.js';
import type { ModerationEngine } from '../moderation/moderationEngine.js';
import type { MessageCache } from '../moderation/messageCache.js';
import type { PolicyCache } from '../moderation/policy.js';
import type { ModerationLogRepository, RepositoryContext } from '../repositories/types.js';
import { getErrorMessage, logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ChatCommandRouter } from './chatCommands.js';
import { ModerationExecutor, type ChatTransport } from './moderationExecutor.js';
import { deriveUserLevel, parseEmotePositions } from './twitchBadges.js';
import { createTmiClient, createTmiTransport } from './twitchTransport.js';

export type IncomingChatEvent = {
  channel: string;
  tags: ChatUserstate;
  text: string;
  self: boolean;
};

export type ChatMessageHandlerDeps = {
  repos: Pick<RepositoryContext, 'actors' | 'groups'>;
  policies: PolicyCache;
  engine: ModerationEngine;
  messages: MessageCache;
  commands: ChatCommandRouter;
  executor: ModerationExecutor;
  transport: ChatTransport;
  /** Logins promoted to super admin the first time they are seen. */
  superAdmins?: readonly string[];
  clock?: () => number;
  logger?: Logger;
};

function tagString(tags: ChatUserstate, key: string): string {
  const v: unknown = tags[key];
  return typeof v === 'string' ? v.trim() : '';
}

/**
 * Upserts the sender, runs moderation, and dispatches bot commands. Never
 * rejects: failures are logged so one bad message cannot stop the chat loop.
 */
export function createChatMessageHandler(deps: ChatMessageHandlerDeps): (event: IncomingChatEvent) => Promise<void> {
  const log = deps.logger ?? defaultLogger;
  const clock = deps.clock ?? Date.now;
  const superAdmins = new Set((deps.superAdmins ?? []).map(normalizeLogin));

  async function resolveActor(seen: { userId: string; login: string; channelId: string; level: number }): Promise<Actor> {
    const fallback: Actor = {
      userId: seen.userId,
      login: seen.login,
      globalStanding: 'none',
      levelInChannel: seen.level,
      groupMemberships: [],
    };
    try {
      await deps.repos.actors.upsertSeen(seen);
      const stored = await deps.repos.actors.findActor(seen.userId, seen.channelId);
      if (stored && stored.globalStanding !== 'super_admin' && superAdmins.has(stored.login)) {
        await deps.repos.actors.setGlobalStanding(stored.userId, 'super_admin');
        log.info('chatbot.super_admin_promoted', { userId: stored.userId, login: stored.login });
        return { ...stored, globalStanding: 'super_admin' };
      }
      return stored ?? fallback;
    } catch (err) {
      log.error('chatbot.actor_upsert_failed', { channelId: seen.channelId, userId: seen.userId, errorMessage: getErrorMessage(err) });
      return fallback;
    }
  }

  async function handle(event: IncomingChatEvent): Promise<void> {
    if (event.self) return;
    const { tags } = event;
    const channelLogin = normalizeLogin(event.channel);
    const channelId = tagString(tags, 'room-id');
    const userId = tagString(tags, 'user-id');
    const login = normalizeLogin(tags.username ?? '');
    if (!channelId || !userId || !login) {
      log.debug('chatbot.message_skipped', { channelLogin, reason: 'missing_identity' });
      return;
    }

    const now = clock();
    const level = deriveUserLevel(tags.badges, tagString(tags, 'user-type'));
    const actor = await resolveActor({ userId, login, channelId, level });
    const message: ChatMessage = {
      id: tagString(tags, 'id') || null,
      channelId,
      userId,
      login,
      text: event.text,
      emotePositions: parseEmotePositions(tags.emotes),
      isAction: tags['message-type'] === 'action',
    };
    deps.messages.consume({ channelId, userId, login, text: message.text }, now);

    const groups = await loadGroupLookup(deps.repos.groups, actor, channelId);
    const policy = await deps.policies.get(channelId);
    const decision = deps.engine.evaluateAll(policy, {
      actor,
      message,
      groups,
      channelLogin,
      now,
    });

    if (decision && policy) {
      log.info('moderation.decision', {
        channelId,
        userId,
        kind: decision.kind,
        tier: decision.tier,
        punishment: decision.punishment.kind,
        durationSeconds: decision.punishment.durationSeconds,
      });
      await deps.executor.apply(
        decision,
        { channelId, channelLogin, userId, userLogin: login, messageId: message.id, messageText: message.text },
        policy.document.moderationMessageCooldownSeconds
      );
      if (decision.punishment.kind !== 'none') return;
    }

    const reply = await deps.commands.handle({
      actor,
      groups,
      channelId,
      channelLogin,
      senderLogin: login,
      text: message.text,
      transport: deps.transport,
    });
    if (reply) await deps.transport.say(channelLogin, reply);
  }

  return async (event) => {
    try {
      await handle(event);
    } catch (err) {
      log.error('chatbot.message_failed', { channel: event.channel, errorMessage: getErrorMessage(err) });
    }
  };
}

export type TwitchChatBotDeps = Omit<ChatMessageHandlerDeps, 'executor' | 'transport'> & {
  botLogin: string;
  oauthToken: string;
  channels: string[];
  journal?: ModerationLogRepository;
};

export function startTwitchChatBot(deps: TwitchChatBotDeps): { stop: () => Promise<void> } | null {
  const log = deps.logger ?? defaultLogger;
  const botLogin = normalizeLogin(deps.botLogin);
  const channels = Array.from(new Set(deps.channels.map(normalizeLogin))).filter(Boolean);
  if (!botLogin) {
    log.warn('chatbot.missing_login', {});
    return null;
  }
  if (channels.length === 0) {
    log.warn('chatbot.missing_channels', {});
    return null;
  }

  const client = createTmiClient({ botLogin, oauthToken: deps.oauthToken, channels });
  const transport = createTmiTransport(client);
  const executor = new ModerationExecutor({ transport, journal: deps.journal, logger: log, clock: deps.clock });
  const handler = createChatMessageHandler({ ...deps, executor, transport });

  client.on('connected', () => {
    log.info('chatbot.connected', { botLogin, channels });
  });
  client.on('disconnected', (reason) => {
    log.warn('chatbot.disconnected', { botLogin, reason: String(reason || '') });
  });
  client.on('message', (channel, tags, text, self) => {
    void handler({ channel, tags, text, self });
  });

  client.connect().catch((err: unknown) => {
    log.error('chatbot.connect_failed', { botLogin, errorMessage: getErrorMessage(err) });
  });

  let stopped = false;
  return {
    stop: async () => {
      if (stopped) return;
      stopped = true;
      try {
        await client.disconnect();
      } catch (err) {
        log.warn('chatbot.disconnect_failed', { botLogin, errorMessage: getErrorMessage(err) });
      }
    },
  };
}
