import {
  FILTER_KINDS,
  PUNISHMENT_KINDS,
  UserLevel,
  combineLevels,
  formatUserLevels,
  paginate,
  parsePositiveInt,
  parseUserLevels,
  type FilterKind,
  type PunishmentSpec,
} from '@chatwarden/shared';
import {
  MAX_TIMEOUT_SECONDS,
  moderationPolicySchema,
  type BlacklistMatchTarget,
  type PolicyCache,
  type TieredFilterKind,
} from '../moderation/policy.js';
import type { ModerationLogEntry, ModerationLogRepository } from '../repositories/types.js';
import { AppError, ERROR_CODES } from '../shared/errors.js';
import { getErrorMessage, type Logger } from '../utils/logger.js';
import type { CommandDef, CommandInvocation } from './chatCommands.js';

export type ModerationCommandDeps = {
  policies: PolicyCache;
  journal: ModerationLogRepository;
  log: Logger;
};

const MOD_OR_CUSTOM = combineLevels(UserLevel.Moderator, UserLevel.Custom);
const LIST_PAGE_SIZE = 10;
const LOG_TEXT_PREVIEW = 200;

type TierKey = 'warningTier' | 'repeatTier';

// Settings reachable through `set` are the plain numbers and booleans of a filter section.
const DEFAULT_DOCUMENT = moderationPolicySchema.parse({});
const NOT_SETTABLE = new Set(['enabled', 'excludedLevels', 'warningTier', 'repeatTier', 'whitelist', 'entries']);

function invalid(message: string): AppError {
  return new AppError({ errorCode: ERROR_CODES.INVALID_INPUT, message });
}

function findFilterKind(raw: string): FilterKind | null {
  const wanted = raw.trim().toLowerCase();
  return FILTER_KINDS.find((k) => k.toLowerCase() === wanted) ?? null;
}

function isTiered(kind: FilterKind): kind is TieredFilterKind {
  return kind !== 'blacklist';
}

function parseToggle(raw: string | undefined): boolean | null {
  const v = String(raw ?? '').trim().toLowerCase();
  if (v === 'on' || v === 'enable' || v === 'true') return true;
  if (v === 'off' || v === 'disable' || v === 'false') return false;
  return null;
}

function parseMatchTarget(raw: string | undefined): BlacklistMatchTarget | null {
  switch (String(raw ?? '').toLowerCase()) {
    case 'message':
      return 'message';
    case 'username':
      return 'username';
    case 'both':
      return 'usernameAndMessage';
    default:
      return null;
  }
}

function describeMatchTarget(target: BlacklistMatchTarget): string {
  return target === 'usernameAndMessage' ? 'username and message' : target;
}

type Setting = { key: string; type: 'number' | 'boolean' };

function findSetting(kind: FilterKind, raw: string): Setting | null {
  const wanted = raw.toLowerCase();
  const fields: Array<[string, unknown]> = Object.entries(DEFAULT_DOCUMENT[kind]);
  for (const [key, value] of fields) {
    if (key.toLowerCase() !== wanted || NOT_SETTABLE.has(key)) continue;
    if (typeof value === 'number') return { key, type: 'number' };
    if (typeof value === 'boolean') return { key, type: 'boolean' };
  }
  return null;
}

function settingNames(kind: FilterKind): string[] {
  const fields: Array<[string, unknown]> = Object.entries(DEFAULT_DOCUMENT[kind]);
  return fields
    .filter(([key, value]) => !NOT_SETTABLE.has(key) && (typeof value === 'number' || typeof value === 'boolean'))
    .map(([key]) => key);
}

function parseSettingValue(setting: Setting, raw: string): number | boolean | null {
  if (setting.type === 'boolean') return parseToggle(raw);
  return /^\d+(\.\d+)?$/.test(raw) ? Number(raw) : null;
}

/** "none" clears an optional text. */
function optionalText(raw: string): string | null {
  return raw.toLowerCase() === 'none' ? null : raw;
}

function normalizeDomain(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
    .replace(/[/?#].*$/, '')
    .replace(/^www\./, '');
}

function describeLogEntry(entry: ModerationLogEntry): string {
  const action = entry.punishment === 'timeout' ? `timeout ${entry.durationSeconds}s` : entry.punishment;
  const text = entry.messageText.length > LOG_TEXT_PREVIEW ? `${entry.messageText.slice(0, LOG_TEXT_PREVIEW)}...` : entry.messageText;
  return `${entry.userLogin} got ${action} for ${entry.filterKind} (${entry.tier}) at ${entry.createdAt.toISOString()}: "${text}"`;
}

/** Commands that edit the channel's moderation policy and read the moderation log. */
export function createModerationCommands(deps: ModerationCommandDeps): CommandDef[] {
  const { policies, journal, log } = deps;

  async function setEnabled(inv: CommandInvocation, kind: FilterKind, enabled: boolean | null): Promise<string> {
    const policy =
      enabled === null
        ? await policies.update(inv.channelId, (doc) => ({ ...doc, [kind]: { ...doc[kind], enabled: !doc[kind].enabled } }))
        : await policies.setFilterEnabled(inv.channelId, kind, enabled);
    const now = policy.document[kind].enabled;
    log.info('moderation.filter_toggled', { channelId: inv.channelId, kind, enabled: now, by: inv.senderLogin });
    return `Moderation filter ${kind} is now ${now ? 'on' : 'off'}.`;
  }

  async function setExcluded(inv: CommandInvocation, kind: FilterKind, words: string[]): Promise<string | null> {
    const names = words.flatMap((w) => w.split(',')).filter(Boolean);
    if (names.length === 0) return null;
    let mask = 0;
    if (!(names.length === 1 && names[0]?.toLowerCase() === 'none')) {
      const parsed = parseUserLevels(names);
      if (!parsed.ok) throw invalid(`unknown user levels: ${parsed.unknown.join(', ')}`);
      mask = parsed.mask;
    }
    const policy = await policies.update(inv.channelId, (doc) => ({ ...doc, [kind]: { ...doc[kind], excludedLevels: mask } }));
    const excluded = formatUserLevels(policy.document[kind].excludedLevels);
    log.info('moderation.filter_updated', { channelId: inv.channelId, kind, setting: 'excludedLevels', by: inv.senderLogin });
    return `Moderation filter ${kind} now skips ${excluded.length > 0 ? excluded.join(', ') : 'nobody'}.`;
  }

  async function setTier(inv: CommandInvocation, kind: TieredFilterKind, tierKey: TierKey, words: string[]): Promise<string | null> {
    const [rawField, ...rest] = words;
    const field = String(rawField ?? '').toLowerCase();
    const value = rest.join(' ');
    if (!value) return null;

    let patch: Partial<PunishmentSpec>;
    let shown: string;
    switch (field) {
      case 'time': {
        const seconds = parsePositiveInt(value);
        if (seconds === null || seconds > MAX_TIMEOUT_SECONDS) {
          throw invalid(`time must be between 1 and ${MAX_TIMEOUT_SECONDS} seconds`);
        }
        patch = { durationSeconds: seconds };
        shown = `${seconds}s`;
        break;
      }
      case 'message':
      case 'reason': {
        const text = optionalText(value);
        patch = field === 'message' ? { userFacingMessage: text } : { reasonText: text };
        shown = text === null ? 'none' : `"${text}"`;
        break;
      }
      case 'punishment': {
        const punishment = PUNISHMENT_KINDS.find((k) => k === value.toLowerCase());
        if (!punishment) return null;
        patch = { kind: punishment };
        shown = punishment;
        break;
      }
      default:
        return null;
    }

    await policies.update(inv.channelId, (doc) => ({
      ...doc,
      [kind]: { ...doc[kind], [tierKey]: { ...doc[kind][tierKey], ...patch } },
    }));
    const tierWord = tierKey === 'warningTier' ? 'warning' : 'timeout';
    log.info('moderation.filter_updated', { channelId: inv.channelId, kind, setting: `${tierKey}.${field}`, by: inv.senderLogin });
    return `Moderation filter ${kind} ${tierWord} ${field} is now ${shown}.`;
  }

  async function setValue(inv: CommandInvocation, kind: FilterKind, words: string[]): Promise<string | null> {
    const [rawSetting, rawValue] = words;
    if (!rawSetting || rawValue === undefined) return null;
    const setting = findSetting(kind, rawSetting);
    if (!setting) {
      const known = settingNames(kind);
      return known.length > 0 ? `${kind} settings: ${known.join(', ')}` : `${kind} has no settings.`;
    }
    const value = parseSettingValue(setting, rawValue);
    if (value === null) throw invalid(`${setting.key} takes ${setting.type === 'number' ? 'a number' : 'on or off'}`);

    await policies.update(inv.channelId, (doc) => ({ ...doc, [kind]: { ...doc[kind], [setting.key]: value } }));
    log.info('moderation.filter_updated', { channelId: inv.channelId, kind, setting: setting.key, by: inv.senderLogin });
    return `Moderation filter ${kind} ${setting.key} is now ${typeof value === 'boolean' ? (value ? 'on' : 'off') : value}.`;
  }

  return [
    {
      path: ['moderation'],
      permissionWords: ['moderation'],
      requiredLevel: MOD_OR_CUSTOM,
      usage: 'moderation <filter> on|off|toggle|exclude <levels>|warning <field> <value>|timeout <field> <value>|set <setting> <value>',
      run: async ({ inv, args }) => {
        const [rawKind, rawAction, ...rest] = args;
        const kind = findFilterKind(rawKind ?? '');
        const action = String(rawAction ?? '').toLowerCase();
        if (!kind || !action) return null;

        const enabled = parseToggle(action);
        if (enabled !== null) return setEnabled(inv, kind, enabled);
        switch (action) {
          case 'toggle':
            return setEnabled(inv, kind, null);
          case 'exclude':
            return setExcluded(inv, kind, rest);
          case 'warning':
          case 'timeout':
            if (!isTiered(kind)) return null;
            return setTier(inv, kind, action === 'warning' ? 'warningTier' : 'repeatTier', rest);
          case 'set':
            return setValue(inv, kind, rest);
          default:
            return null;
        }
      },
    },
    {
      path: ['moderation', 'links', 'whitelist'],
      permissionWords: ['moderation'],
      requiredLevel: MOD_OR_CUSTOM,
      usage: 'moderation links whitelist add|remove <domain>|list',
      run: async ({ inv, args }) => {
        const [rawVerb, rawDomain] = args;
        const verb = String(rawVerb ?? '').toLowerCase();
        if (verb === 'list') {
          const whitelist = (await policies.get(inv.channelId))?.document.links.whitelist ?? [];
          return whitelist.length > 0 ? `Whitelisted domains: ${whitelist.join(', ')}` : 'No whitelisted domains.';
        }
        if (verb !== 'add' && verb !== 'remove') return null;
        const domain = normalizeDomain(rawDomain ?? '');
        if (!domain) return null;

        const result = { changed: false };
        await policies.update(inv.channelId, (doc) => {
          const listed = doc.links.whitelist.some((d) => d.toLowerCase() === domain);
          result.changed = verb === 'add' ? !listed : listed;
          const whitelist =
            verb === 'add'
              ? listed
                ? doc.links.whitelist
                : [...doc.links.whitelist, domain]
              : doc.links.whitelist.filter((d) => d.toLowerCase() !== domain);
          return { ...doc, links: { ...doc.links, whitelist } };
        });
        log.info('moderation.whitelist_updated', { channelId: inv.channelId, domain, verb, changed: result.changed, by: inv.senderLogin });
        if (verb === 'add') return result.changed ? `${domain} added to the link whitelist.` : `${domain} is already whitelisted.`;
        return result.changed ? `${domain} removed from the link whitelist.` : `${domain} is not whitelisted.`;
      },
    },
    ...(['add', 'addregex'] as const).map(
      (verb): CommandDef => ({
        path: ['moderation', 'blacklist', verb],
        permissionWords: ['moderation'],
        requiredLevel: MOD_OR_CUSTOM,
        usage: `moderation blacklist ${verb} message|username|both <${verb === 'add' ? 'phrase' : 'pattern'}>`,
        run: async ({ inv, args }) => {
          const [rawTarget, ...rest] = args;
          const matchOn = parseMatchTarget(rawTarget);
          const phrase = rest.join(' ');
          if (!matchOn || !phrase) return null;
          const isRegex = verb === 'addregex';
          if (isRegex) {
            try {
              new RegExp(phrase, 'i');
            } catch (err) {
              throw invalid(`invalid pattern (${getErrorMessage(err)})`);
            }
          }

          const result = { changed: false };
          await policies.update(inv.channelId, (doc) => {
            const exists = doc.blacklist.entries.some(
              (e) => e.isRegex === isRegex && e.matchOn === matchOn && e.phrase.toLowerCase() === phrase.toLowerCase()
            );
            result.changed = !exists;
            if (exists) return doc;
            return { ...doc, blacklist: { ...doc.blacklist, entries: [...doc.blacklist.entries, { phrase, isRegex, matchOn }] } };
          });
          if (!result.changed) return `"${phrase}" is already on the blacklist.`;
          log.info('moderation.blacklist_added', { channelId: inv.channelId, isRegex, matchOn, by: inv.senderLogin });
          return `"${phrase}" added to the blacklist (${describeMatchTarget(matchOn)}).`;
        },
      })
    ),
    {
      path: ['moderation', 'blacklist', 'remove'],
      permissionWords: ['moderation'],
      requiredLevel: MOD_OR_CUSTOM,
      usage: 'moderation blacklist remove <phrase>',
      run: async ({ inv, args }) => {
        const phrase = args.join(' ');
        if (!phrase) return null;
        const wanted = phrase.toLowerCase();

        const result = { removed: 0 };
        await policies.update(inv.channelId, (doc) => {
          const entries = doc.blacklist.entries.filter((e) => e.phrase.toLowerCase() !== wanted);
          result.removed = doc.blacklist.entries.length - entries.length;
          return { ...doc, blacklist: { ...doc.blacklist, entries } };
        });
        if (result.removed === 0) return `"${phrase}" is not on the blacklist.`;
        log.info('moderation.blacklist_removed', { channelId: inv.channelId, removed: result.removed, by: inv.senderLogin });
        return `"${phrase}" removed from the blacklist.`;
      },
    },
    {
      path: ['moderation', 'blacklist', 'list'],
      permissionWords: ['moderation'],
      requiredLevel: MOD_OR_CUSTOM,
      usage: 'moderation blacklist list [page]',
      run: async ({ inv, args }) => {
        const page = args[0] === undefined ? 1 : parsePositiveInt(args[0]);
        if (page === null) return null;
        const entries = (await policies.get(inv.channelId))?.document.blacklist.entries ?? [];
        if (entries.length === 0) return 'The blacklist is empty.';
        const result = paginate(entries, page, LIST_PAGE_SIZE);
        const items = result.items.map((e) => `${e.isRegex ? `/${e.phrase}/` : e.phrase} (${describeMatchTarget(e.matchOn)})`);
        return `Blacklist (page ${result.page}/${result.pageCount}): ${items.join(', ')}`;
      },
    },
    {
      path: ['moderation', 'log'],
      permissionWords: ['moderation'],
      requiredLevel: MOD_OR_CUSTOM,
      usage: 'moderation log <id>',
      run: async ({ inv, args }) => {
        const id = String(args[0] ?? '').replace(/^\[|\]$/g, '');
        if (!id) return null;
        const entry = await journal.findById(inv.channelId, id);
        return entry ? describeLogEntry(entry) : `No moderation log entry ${id}.`;
      },
    },
  ];
}
