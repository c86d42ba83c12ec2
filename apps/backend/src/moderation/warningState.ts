export type WarningOutcome = 'warning' | 'repeat';

function keyOf(channelId: string, userId: string): string {
  return `${channelId}\u0000${userId}`;
}

/**
 * Last warning time per (channel, user). Every read-then-write here is
 * synchronous, so two evaluations for one user cannot interleave between the
 * check and the update.
 */
export class WarningStateTracker {
  private readonly lastWarningAt = new Map<string, number>();

  /** A warning exactly `windowSeconds` old still counts. */
  isEscalated(channelId: string, userId: string, windowSeconds: number, now: number): boolean {
    const last = this.lastWarningAt.get(keyOf(channelId, userId));
    return last !== undefined && now - last <= windowSeconds * 1000;
  }

  recordWarning(channelId: string, userId: string, now: number): void {
    this.lastWarningAt.set(keyOf(channelId, userId), now);
  }

  recordTrigger(channelId: string, userId: string, windowSeconds: number, now: number): WarningOutcome {
    if (this.isEscalated(channelId, userId, windowSeconds, now)) return 'repeat';
    this.recordWarning(channelId, userId, now);
    return 'warning';
  }

  prune(maxAgeSeconds: number, now: number): number {
    let removed = 0;
    for (const [key, at] of this.lastWarningAt) {
      if (now - at > maxAgeSeconds * 1000) {
        this.lastWarningAt.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.lastWarningAt.size;
  }
}
