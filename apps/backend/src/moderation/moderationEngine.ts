import {
  FILTER_KINDS,
  UserLevel,
  type Actor,
  type ChatMessage,
  type FilterKind,
  type ModerationDecision,
  type UserLevelMask,
} from '@chatwarden/shared';
import { canAct, EMPTY_GROUP_LOOKUP, type GroupLookup } from '../permissions/permissionResolver.js';
import { containsLink, findLinks, hostMatches, isClipLink, linkHost } from './linkPattern.js';
import type { LinkPermitStore } from './linkPermits.js';
import type { MessageCache } from './messageCache.js';
import type { BlacklistMatchTarget, CompiledBlacklistEntry, CompiledModerationPolicy, TieredFilterKind } from './policy.js';
import { isHarsher, normalizePunishment } from './punishment.js';
import {
  codePointLength,
  countSymbols,
  countUppercase,
  exceedsPercentage,
  hasZalgo,
  isActionMessage,
  isFakePurge,
  longestCharacterRun,
  longestSymbolRun,
  longestWordRun,
  stripEmotes,
} from './textMetrics.js';
import type { WarningStateTracker } from './warningState.js';

export type EvaluationContext = {
  actor: Actor | null;
  message: ChatMessage;
  /** Resolves the actor's custom groups when an excluded level carries Custom. */
  groups?: GroupLookup;
  channelLogin?: string | null;
  now?: number;
};

export type ModerationEngineDeps = {
  warnings: WarningStateTracker;
  messages: MessageCache;
  permits: LinkPermitStore;
  clock?: () => number;
};

const EXEMPT_BASE: UserLevelMask = UserLevel.Broadcaster | UserLevel.Moderator;

/** Checked against the actor's groups when a filter excludes Custom. */
export const MODERATION_EXEMPT_PERMISSION = 'moderation_exempt';

export function isExempt(actor: Actor | null, excludedLevels: UserLevelMask, groups: GroupLookup = EMPTY_GROUP_LOOKUP): boolean {
  return canAct(actor, EXEMPT_BASE | excludedLevels, MODERATION_EXEMPT_PERMISSION, groups);
}

type Prepared = {
  raw: string;
  stripped: string;
  strippedLength: number;
};

type Detection = { kind: 'blacklist'; entry: CompiledBlacklistEntry } | { kind: TieredFilterKind };

export class ModerationEngine {
  private readonly warnings: WarningStateTracker;
  private readonly messages: MessageCache;
  private readonly permits: LinkPermitStore;
  private readonly clock: () => number;

  constructor(deps: ModerationEngineDeps) {
    this.warnings = deps.warnings;
    this.messages = deps.messages;
    this.permits = deps.permits;
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Runs one filter kind. A missing policy yields no decision. A triggered
   * tiered filter records a warning unless one is already inside the window.
   */
  evaluate(kind: FilterKind, policy: CompiledModerationPolicy | null, ctx: EvaluationContext): ModerationDecision | null {
    if (!policy) return null;
    const now = ctx.now ?? this.clock();
    const detection = this.detect(kind, policy, ctx, prepare(ctx.message), now);
    if (!detection) return null;
    if (detection.kind === 'blacklist') return blacklistDecision(detection.entry);

    const filter = policy.document[detection.kind];
    const tier = this.warnings.recordTrigger(ctx.message.channelId, ctx.message.userId, filter.warningWindowSeconds, now);
    return {
      kind: detection.kind,
      tier,
      punishment: normalizePunishment(tier === 'repeat' ? filter.repeatTier : filter.warningTier),
    };
  }

  /**
   * Runs every kind and returns the harshest decision. Escalation state is
   * read once for all triggered kinds and a warning is recorded at most once
   * per message.
   */
  evaluateAll(policy: CompiledModerationPolicy | null, ctx: EvaluationContext): ModerationDecision | null {
    if (!policy) return null;
    const now = ctx.now ?? this.clock();
    const prepared = prepare(ctx.message);
    const { channelId, userId } = ctx.message;

    let best: ModerationDecision | null = null;
    let warned = false;
    for (const kind of FILTER_KINDS) {
      const detection = this.detect(kind, policy, ctx, prepared, now);
      if (!detection) continue;

      let decision: ModerationDecision;
      if (detection.kind === 'blacklist') {
        decision = blacklistDecision(detection.entry);
      } else {
        const filter = policy.document[detection.kind];
        const escalated = this.warnings.isEscalated(channelId, userId, filter.warningWindowSeconds, now);
        if (!escalated) warned = true;
        decision = {
          kind: detection.kind,
          tier: escalated ? 'repeat' : 'warning',
          punishment: normalizePunishment(escalated ? filter.repeatTier : filter.warningTier),
        };
      }
      if (!best || isHarsher(decision.punishment, best.punishment)) best = decision;
    }

    if (warned) this.warnings.recordWarning(channelId, userId, now);
    return best;
  }

  private detect(
    kind: FilterKind,
    policy: CompiledModerationPolicy,
    ctx: EvaluationContext,
    msg: Prepared,
    now: number
  ): Detection | null {
    const doc = policy.document;
    const filter = doc[kind];
    if (!filter.enabled) return null;
    if (isExempt(ctx.actor, filter.excludedLevels, ctx.groups)) return null;

    const { message } = ctx;
    switch (kind) {
      case 'caps': {
        const f = doc.caps;
        if (msg.strippedLength < f.minimumMessageLength) return null;
        return exceedsPercentage(countUppercase(msg.stripped), msg.strippedLength, f.maximumPercentage) ? { kind } : null;
      }
      case 'symbols': {
        const f = doc.symbols;
        if (msg.strippedLength < f.minimumMessageLength) return null;
        const triggered =
          exceedsPercentage(countSymbols(msg.stripped), msg.strippedLength, f.maximumPercentage) ||
          longestSymbolRun(msg.stripped) >= f.maximumGrouped;
        return triggered ? { kind } : null;
      }
      case 'zalgo':
        return hasZalgo(msg.raw) ? { kind } : null;
      case 'links':
        return this.detectLinks(policy, ctx, msg, now) ? { kind } : null;
      case 'lengthyMessage':
        return codePointLength(msg.raw) > doc.lengthyMessage.maximumLength ? { kind } : null;
      case 'repetition': {
        const f = doc.repetition;
        if (msg.strippedLength < f.minimumMessageLength) return null;
        const triggered =
          longestCharacterRun(msg.stripped) >= f.maximumRepeatingCharacters || longestWordRun(msg.stripped) >= f.maximumRepeatingWords;
        return triggered ? { kind } : null;
      }
      case 'emotes': {
        const f = doc.emotes;
        const emoteCount = message.emotePositions.length;
        const onlyEmotes = f.blockOnlyEmotes && emoteCount > 0 && msg.strippedLength === 0;
        return emoteCount >= f.maximumAllowed || onlyEmotes ? { kind } : null;
      }
      case 'fakePurge':
        return isFakePurge(msg.raw) ? { kind } : null;
      case 'actionMessage':
        return isActionMessage(msg.raw, message.isAction) ? { kind } : null;
      case 'oneManSpam': {
        const f = doc.oneManSpam;
        const since = now - f.resetWindowSeconds * 1000;
        return this.messages.countFromUserSince(message.channelId, message.userId, since) >= f.maximumMessages ? { kind } : null;
      }
      case 'blacklist': {
        const entry = policy.blacklist.find((e) => e.pattern.test(blacklistSubject(e.matchOn, message.login, msg.raw)));
        return entry ? { kind, entry } : null;
      }
    }
  }

  private detectLinks(policy: CompiledModerationPolicy, ctx: EvaluationContext, msg: Prepared, now: number): boolean {
    if (!containsLink(msg.stripped)) return false;
    const f = policy.document.links;
    const offending = findLinks(msg.stripped).filter((link) => {
      if (f.allowChannelClips && isClipLink(link, ctx.channelLogin ?? null)) return false;
      const host = linkHost(link);
      return !f.whitelist.some((domain) => hostMatches(host, domain));
    });
    if (offending.length === 0) return false;
    return !this.permits.consume(ctx.message.channelId, ctx.message.login, now);
  }
}

function prepare(message: ChatMessage): Prepared {
  const stripped = stripEmotes(message.text, message.emotePositions);
  return { raw: message.text, stripped, strippedLength: codePointLength(stripped) };
}

function blacklistSubject(matchOn: BlacklistMatchTarget, login: string, text: string): string {
  switch (matchOn) {
    case 'message':
      return text;
    case 'username':
      return login;
    case 'usernameAndMessage':
      return `${login} ${text}`;
  }
}

function blacklistDecision(entry: CompiledBlacklistEntry): ModerationDecision {
  return { kind: 'blacklist', tier: 'blacklist', punishment: normalizePunishment(entry.punishment) };
}
