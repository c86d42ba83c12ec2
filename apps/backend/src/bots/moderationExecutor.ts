import type { ModerationDecision } from '@chatwarden/shared';
import type { ModerationLogRepository } from '../repositories/types.js';
import { getErrorMessage, logger as defaultLogger, type Logger } from '../utils/logger.js';

/** Outgoing chat actions, addressed by channel and user login. */
export interface ChatTransport {
  say(channelLogin: string, message: string): Promise<void>;
  deleteMessage(channelLogin: string, messageId: string): Promise<void>;
  timeout(channelLogin: string, userLogin: string, seconds: number, reason: string): Promise<void>;
  ban(channelLogin: string, userLogin: string, reason: string): Promise<void>;
}

export type ModerationTarget = {
  channelId: string;
  channelLogin: string;
  userId: string;
  userLogin: string;
  messageId: string | null;
  messageText: string;
};

export type ModerationExecutorOptions = {
  transport: ChatTransport;
  /** When set, every decision is recorded first and its id is appended to the reason. */
  journal?: ModerationLogRepository;
  logger?: Logger;
  clock?: () => number;
};

export function renderUserMessage(template: string, userLogin: string): string {
  return template.replace(/\{user\}/gi, userLogin);
}

export class ModerationExecutor {
  private readonly transport: ChatTransport;
  private readonly journal: ModerationLogRepository | null;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly lastMessageAt = new Map<string, number>();

  constructor(options: ModerationExecutorOptions) {
    this.transport = options.transport;
    this.journal = options.journal ?? null;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? Date.now;
  }

  /** Transport failures are logged; nothing here throws back into the chat loop. */
  async apply(decision: ModerationDecision, target: ModerationTarget, messageCooldownSeconds: number): Promise<void> {
    const { punishment } = decision;
    const logId = await this.record(decision, target);
    const baseReason = punishment.reasonText ?? `${decision.kind} (${decision.tier})`;
    const reason = logId ? `${baseReason} [${logId}]` : baseReason;
    try {
      switch (punishment.kind) {
        case 'none':
          break;
        case 'delete':
          if (target.messageId) await this.transport.deleteMessage(target.channelLogin, target.messageId);
          else await this.transport.timeout(target.channelLogin, target.userLogin, 1, reason);
          break;
        case 'purge':
          await this.transport.timeout(target.channelLogin, target.userLogin, 1, reason);
          break;
        case 'timeout':
          await this.transport.timeout(target.channelLogin, target.userLogin, Math.max(1, punishment.durationSeconds), reason);
          break;
        case 'ban':
          await this.transport.ban(target.channelLogin, target.userLogin, reason);
          break;
      }
    } catch (err) {
      this.logger.warn('moderation.action_failed', {
        channelId: target.channelId,
        userLogin: target.userLogin,
        punishment: punishment.kind,
        errorMessage: getErrorMessage(err),
      });
    }

    if (punishment.userFacingMessage) await this.sayWithCooldown(target, punishment.userFacingMessage, messageCooldownSeconds);
  }

  private async record(decision: ModerationDecision, target: ModerationTarget): Promise<string | null> {
    if (!this.journal) return null;
    const { punishment } = decision;
    try {
      const entry = await this.journal.append({
        channelId: target.channelId,
        userId: target.userId,
        userLogin: target.userLogin,
        messageId: target.messageId,
        messageText: target.messageText,
        filterKind: decision.kind,
        tier: decision.tier,
        punishment: punishment.kind,
        durationSeconds: punishment.durationSeconds,
        reasonText: punishment.reasonText,
        userFacingMessage: punishment.userFacingMessage,
      });
      return entry.id;
    } catch (err) {
      // The action still goes out, just without a log reference.
      this.logger.warn('moderation.log_failed', { channelId: target.channelId, userLogin: target.userLogin, errorMessage: getErrorMessage(err) });
      return null;
    }
  }

  private async sayWithCooldown(target: ModerationTarget, template: string, cooldownSeconds: number): Promise<void> {
    const now = this.clock();
    const last = this.lastMessageAt.get(target.channelId);
    if (last !== undefined && now - last < cooldownSeconds * 1000) return;
    this.lastMessageAt.set(target.channelId, now);
    try {
      await this.transport.say(target.channelLogin, renderUserMessage(template, target.userLogin));
    } catch (err) {
      this.logger.warn('moderation.message_failed', { channelId: target.channelId, errorMessage: getErrorMessage(err) });
    }
  }
}
