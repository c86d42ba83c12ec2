import { z } from 'zod';
import {
  ALL_LEVELS_MASK,
  PUNISHMENT_KINDS,
  parseUserLevels,
  type FilterKind,
  type PunishmentSpec,
} from '@chatwarden/shared';
import type { ModerationPolicyRepository } from '../repositories/types.js';
import { AppError, ERROR_CODES, ERROR_MESSAGES } from '../shared/errors.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import { getErrorMessage, logger as defaultLogger, type Logger } from '../utils/logger.js';

export const MAX_WARNING_WINDOW_SECONDS = 86_400;
/** Twitch caps a timeout at two weeks. */
export const MAX_TIMEOUT_SECONDS = 1_209_600;

/** What a blacklist entry is tested against; `usernameAndMessage` is the login, a space, then the text. */
export const BLACKLIST_MATCH_TARGETS = ['message', 'username', 'usernameAndMessage'] as const;
export type BlacklistMatchTarget = (typeof BLACKLIST_MATCH_TARGETS)[number];

const punishmentSchema = z.object({
  kind: z.enum(PUNISHMENT_KINDS).default('timeout'),
  durationSeconds: z.number().int().nonnegative().max(MAX_TIMEOUT_SECONDS).default(0),
  reasonText: z.string().max(500).nullable().default(null),
  userFacingMessage: z.string().max(500).nullable().default(null),
});

/** Level masks are stored either as a number or as level names. */
const levelsSchema = z.union([z.number().int().nonnegative(), z.array(z.string())]).transform((value, ctx) => {
  if (typeof value === 'number') return value & ALL_LEVELS_MASK;
  const parsed = parseUserLevels(value);
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown user levels: ${parsed.unknown.join(', ')}` });
    return z.NEVER;
  }
  return parsed.mask;
});

function timeout(durationSeconds: number, userFacingMessage: string): PunishmentSpec {
  return { kind: 'timeout', durationSeconds, reasonText: null, userFacingMessage };
}

function tiered(warningMessage: string, repeatMessage: string) {
  return {
    enabled: z.boolean().default(false),
    excludedLevels: levelsSchema.default(0),
    warningTier: punishmentSchema.default(timeout(5, warningMessage)),
    repeatTier: punishmentSchema.default(timeout(600, repeatMessage)),
    warningWindowSeconds: z.number().int().positive().max(MAX_WARNING_WINDOW_SECONDS).default(600),
  };
}

const count = (fallback: number) => z.number().int().nonnegative().default(fallback);
const percentage = (fallback: number) => z.number().min(0).max(100).default(fallback);

const blacklistEntrySchema = z.object({
  phrase: z.string().trim().min(1).max(500),
  isRegex: z.boolean().default(false),
  matchOn: z.enum(BLACKLIST_MATCH_TARGETS).default('message'),
  punishment: punishmentSchema.default(timeout(600, '{user}, that phrase is not allowed here.')),
});

export const moderationPolicySchema = z.object({
  moderationMessageCooldownSeconds: z.number().int().nonnegative().default(30),
  caps: z
    .object({
      ...tiered('{user}, please stop using so many caps.', '{user}, you were timed out for excessive caps.'),
      minimumMessageLength: count(15),
      maximumPercentage: percentage(50),
    })
    .default({}),
  symbols: z
    .object({
      ...tiered('{user}, please stop using so many symbols.', '{user}, you were timed out for excessive symbols.'),
      minimumMessageLength: count(15),
      maximumPercentage: percentage(50),
      maximumGrouped: count(10),
    })
    .default({}),
  zalgo: z.object(tiered('{user}, please stop using glitched text.', '{user}, you were timed out for glitched text.')).default({}),
  links: z
    .object({
      ...tiered('{user}, please ask before posting links.', '{user}, you were timed out for posting links.'),
      whitelist: z.array(z.string().trim().min(1)).default([]),
      allowChannelClips: z.boolean().default(false),
      permitSeconds: z.number().int().positive().default(30),
    })
    .default({}),
  lengthyMessage: z
    .object({
      ...tiered('{user}, please keep your messages shorter.', '{user}, you were timed out for long messages.'),
      maximumLength: count(300),
    })
    .default({}),
  repetition: z
    .object({
      ...tiered('{user}, please stop repeating yourself.', '{user}, you were timed out for repetition.'),
      minimumMessageLength: count(15),
      maximumRepeatingCharacters: count(10),
      maximumRepeatingWords: count(5),
    })
    .default({}),
  emotes: z
    .object({
      ...tiered('{user}, please stop spamming emotes.', '{user}, you were timed out for emote spam.'),
      maximumAllowed: count(10),
      blockOnlyEmotes: z.boolean().default(false),
    })
    .default({}),
  fakePurge: z.object(tiered('{user}, please do not post fake purges.', '{user}, you were timed out for a fake purge.')).default({}),
  actionMessage: z
    .object(tiered('{user}, please do not use /me here.', '{user}, you were timed out for using /me.'))
    .default({}),
  oneManSpam: z
    .object({
      ...tiered('{user}, please slow down.', '{user}, you were timed out for spamming.'),
      maximumMessages: count(10),
      resetWindowSeconds: z.number().int().positive().default(30),
    })
    .default({}),
  blacklist: z
    .object({
      enabled: z.boolean().default(false),
      excludedLevels: levelsSchema.default(0),
      entries: z.array(blacklistEntrySchema).default([]),
    })
    .default({}),
});

export type ModerationPolicyDocument = z.output<typeof moderationPolicySchema>;
export type TieredFilterKind = Exclude<FilterKind, 'blacklist'>;

export type CompiledBlacklistEntry = {
  phrase: string;
  pattern: RegExp;
  matchOn: BlacklistMatchTarget;
  punishment: PunishmentSpec;
};

export type CompiledModerationPolicy = {
  channelId: string;
  document: ModerationPolicyDocument;
  blacklist: CompiledBlacklistEntry[];
};

export type PolicyParseResult =
  | { ok: true; document: ModerationPolicyDocument }
  | { ok: false; reason: 'missing' | 'invalid'; issues: string[] };

export function parseModerationPolicy(raw: unknown): PolicyParseResult {
  if (raw === null || raw === undefined) return { ok: false, reason: 'missing', issues: [] };
  const parsed = moderationPolicySchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      reason: 'invalid',
      issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    };
  }
  return { ok: true, document: parsed.data };
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Blacklist patterns are built once here; an entry whose regex does not compile is dropped. */
export function compilePolicy(channelId: string, document: ModerationPolicyDocument, log: Logger = defaultLogger): CompiledModerationPolicy {
  const blacklist: CompiledBlacklistEntry[] = [];
  for (const entry of document.blacklist.entries) {
    let pattern: RegExp;
    try {
      pattern = new RegExp(entry.isRegex ? entry.phrase : escapeRegExp(entry.phrase), 'i');
    } catch (err) {
      log.warn('moderation.blacklist_pattern_invalid', { channelId, phrase: entry.phrase, errorMessage: getErrorMessage(err) });
      continue;
    }
    blacklist.push({ phrase: entry.phrase, pattern, matchOn: entry.matchOn, punishment: entry.punishment });
  }
  return { channelId, document, blacklist };
}

function invalidPolicy(channelId: string, issues: string[]): AppError {
  return new AppError({
    errorCode: ERROR_CODES.POLICY_INVALID,
    message: issues.length > 0 ? `${ERROR_MESSAGES.POLICY_INVALID}: ${issues[0]}` : undefined,
    details: { channelId, issues },
  });
}

type CacheEntry = {
  value: Promise<CompiledModerationPolicy | null>;
  expiresAt: number;
};

export type PolicyCacheOptions = {
  ttlMs: number;
  logger?: Logger;
  now?: () => number;
};

/** Parsed, compiled channel policies with a TTL; a channel without a valid policy resolves to null. */
export class PolicyCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly writes = new KeyedMutex();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly repo: ModerationPolicyRepository,
    private readonly options: PolicyCacheOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  get(channelId: string): Promise<CompiledModerationPolicy | null> {
    const hit = this.entries.get(channelId);
    if (hit && hit.expiresAt > this.now()) return hit.value;
    const entry: CacheEntry = {
      expiresAt: this.now() + this.options.ttlMs,
      value: this.load(channelId).then(({ policy, failed }) => {
        // Storage errors fail closed; the next message retries unless a save has already replaced this entry.
        if (failed && this.entries.get(channelId) === entry) this.entries.delete(channelId);
        return policy;
      }),
    };
    this.entries.set(channelId, entry);
    return entry.value;
  }

  get size(): number {
    return this.entries.size;
  }

  async save(channelId: string, raw: unknown): Promise<CompiledModerationPolicy> {
    return this.writes.use(channelId, () => this.saveUnlocked(channelId, raw));
  }

  /**
   * Read-modify-write of the stored document under the channel's write lock.
   * A channel without a document starts from the defaults; the mutator's
   * result is validated like any other save.
   */
  async update(channelId: string, mutate: (document: ModerationPolicyDocument) => unknown): Promise<CompiledModerationPolicy> {
    return this.writes.use(channelId, async () => {
      const stored = await this.repo.findRawByChannel(channelId);
      const parsed = parseModerationPolicy(stored ?? {});
      if (!parsed.ok) throw invalidPolicy(channelId, parsed.issues);
      return this.saveUnlocked(channelId, mutate(parsed.document));
    });
  }

  async setFilterEnabled(channelId: string, kind: FilterKind, enabled: boolean): Promise<CompiledModerationPolicy> {
    return this.update(channelId, (doc) => ({ ...doc, [kind]: { ...doc[kind], enabled } }));
  }

  private async saveUnlocked(channelId: string, raw: unknown): Promise<CompiledModerationPolicy> {
    const parsed = parseModerationPolicy(raw);
    if (!parsed.ok) throw invalidPolicy(channelId, parsed.issues);
    await this.repo.saveRaw(channelId, parsed.document);
    const compiled = compilePolicy(channelId, parsed.document, this.logger);
    this.entries.set(channelId, { value: Promise.resolve(compiled), expiresAt: this.now() + this.options.ttlMs });
    this.logger.info('moderation.policy_saved', { channelId });
    return compiled;
  }

  private async load(channelId: string): Promise<{ policy: CompiledModerationPolicy | null; failed: boolean }> {
    let raw: unknown;
    try {
      raw = await this.repo.findRawByChannel(channelId);
    } catch (err) {
      this.logger.error('moderation.policy_load_failed', { channelId, errorMessage: getErrorMessage(err) });
      return { policy: null, failed: true };
    }
    const parsed = parseModerationPolicy(raw);
    if (!parsed.ok) {
      if (parsed.reason === 'invalid') {
        this.logger.warn('moderation.policy_invalid', { channelId, issues: parsed.issues });
      }
      return { policy: null, failed: false };
    }
    return { policy: compilePolicy(channelId, parsed.document, this.logger), failed: false };
  }
}
