import { normalizeLogin } from '@chatwarden/shared';

/** One-shot link permits granted by moderators, keyed by channel and login. */
export class LinkPermitStore {
  private readonly expiresAt = new Map<string, number>();

  private key(channelId: string, login: string): string {
    return `${channelId}\u0000${normalizeLogin(login)}`;
  }

  grant(channelId: string, login: string, seconds: number, now: number): void {
    this.expiresAt.set(this.key(channelId, login), now + seconds * 1000);
  }

  /** Uses up the permit; false when there is none or it expired. */
  consume(channelId: string, login: string, now: number): boolean {
    const key = this.key(channelId, login);
    const until = this.expiresAt.get(key);
    if (until === undefined) return false;
    this.expiresAt.delete(key);
    return until >= now;
  }

  prune(now: number): number {
    let removed = 0;
    for (const [key, until] of this.expiresAt) {
      if (until < now) {
        this.expiresAt.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
