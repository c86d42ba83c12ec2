import { AppError, ERROR_CODES } from '../shared/errors.js';

export type CachedMessageInput = {
  channelId: string;
  userId: string;
  login: string;
  text: string;
};

type CachedMessage = {
  userId: string;
  login: string;
  text: string;
  at: number;
};

export type MessageCacheOptions = {
  maxPerChannel?: number;
};

/** Recent chat per channel, oldest first. Feeds the one-man-spam filter and the purge command. */
export class MessageCache {
  private readonly byChannel = new Map<string, CachedMessage[]>();
  private readonly maxPerChannel: number;

  constructor(options: MessageCacheOptions = {}) {
    this.maxPerChannel = options.maxPerChannel ?? 1000;
  }

  consume({ channelId, userId, login, text }: CachedMessageInput, at: number): void {
    let list = this.byChannel.get(channelId);
    if (!list) {
      list = [];
      this.byChannel.set(channelId, list);
    }
    list.push({ userId, login, text, at });
    if (list.length > this.maxPerChannel) list.splice(0, list.length - this.maxPerChannel);
  }

  countFromUserSince(channelId: string, userId: string, since: number): number {
    if (!channelId.trim() || !userId.trim()) {
      throw new AppError({ errorCode: ERROR_CODES.INVALID_INPUT, message: 'channelId and userId are required' });
    }
    let n = 0;
    for (const m of this.byChannel.get(channelId) ?? []) {
      if (m.userId === userId && m.at >= since) n += 1;
    }
    return n;
  }

  /** Logins in first-seen order. */
  loginsWhoSentMatching(channelId: string, pattern: RegExp): string[] {
    const logins = new Set<string>();
    for (const m of this.byChannel.get(channelId) ?? []) {
      pattern.lastIndex = 0;
      if (pattern.test(m.text)) logins.add(m.login);
    }
    return [...logins];
  }

  prune(olderThan: number): number {
    let removed = 0;
    for (const [channelId, list] of this.byChannel) {
      const kept = list.filter((m) => m.at >= olderThan);
      removed += list.length - kept.length;
      if (kept.length === 0) this.byChannel.delete(channelId);
      else this.byChannel.set(channelId, kept);
    }
    return removed;
  }

  get size(): number {
    let n = 0;
    for (const list of this.byChannel.values()) n += list.length;
    return n;
  }
}
