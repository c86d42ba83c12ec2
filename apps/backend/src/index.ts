import './config/loadEnv.js';
import { parseEnv } from './config/env.js';
import { createDatabase } from './lib/db.js';
import { createRepositoryContext } from './repositories/index.js';
import { initPermissionRegistry } from './permissions/permissionRegistry.js';
import { PermissionService } from './permissions/permissionService.js';
import { PolicyCache } from './moderation/policy.js';
import { ModerationEngine } from './moderation/moderationEngine.js';
import { WarningStateTracker } from './moderation/warningState.js';
import { MessageCache } from './moderation/messageCache.js';
import { LinkPermitStore } from './moderation/linkPermits.js';
import { createChatCommandRouter } from './bots/chatCommands.js';
import { startTwitchChatBot } from './bots/twitchChatBot.js';
import { startModerationStateCleanupScheduler } from './jobs/moderationStateCleanup.js';
import { setupShutdownHandlers } from './server/shutdown.js';
import { logger } from './utils/logger.js';

const env = parseEnv(process.env);

const database = createDatabase(env.DATABASE_URL);
const repos = createRepositoryContext(database.db);
const registry = initPermissionRegistry();

const warnings = new WarningStateTracker();
const messages = new MessageCache();
const permits = new LinkPermitStore();
const policies = new PolicyCache(repos.policies, { ttlMs: env.POLICY_CACHE_TTL_MS });
const engine = new ModerationEngine({ warnings, messages, permits });
const permissions = new PermissionService({ groups: repos.groups, actors: repos.actors, registry });

const commands = createChatCommandRouter({
  botLogin: env.CHAT_BOT_LOGIN,
  permissions,
  actors: repos.actors,
  policies,
  permits,
  messages,
  journal: repos.moderationLog,
});

const chatBot = startTwitchChatBot({
  botLogin: env.CHAT_BOT_LOGIN,
  oauthToken: env.CHAT_BOT_OAUTH_TOKEN,
  channels: env.CHAT_BOT_CHANNELS,
  superAdmins: env.CHAT_BOT_SUPER_ADMINS,
  journal: repos.moderationLog,
  repos,
  policies,
  engine,
  messages,
  commands,
});

const cleanup = startModerationStateCleanupScheduler({
  warnings,
  messages,
  permits,
  messageTtlMs: env.MESSAGE_CACHE_TTL_MS,
  intervalMs: env.MODERATION_CLEANUP_INTERVAL_MS,
  initialDelayMs: env.MODERATION_CLEANUP_INITIAL_DELAY_MS,
});

setupShutdownHandlers({
  shutdownTimeoutMs: 10_000,
  getChatBotHandle: () => chatBot,
  getCleanupHandle: () => cleanup,
  closeDatabase: database.close,
});

logger.info('startup.ready', {
  nodeEnv: env.NODE_ENV,
  channels: env.CHAT_BOT_CHANNELS.length,
  permissions: registry.list().size,
});
