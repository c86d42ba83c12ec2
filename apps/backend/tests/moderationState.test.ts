import { describe, expect, it } from 'vitest';

import { LinkPermitStore } from '../src/moderation/linkPermits.js';
import { MessageCache } from '../src/moderation/messageCache.js';
import { WarningStateTracker } from '../src/moderation/warningState.js';

describe('warning state', () => {
  it('records a warning and reports a repeat inside the window', () => {
    const tracker = new WarningStateTracker();
    expect(tracker.recordTrigger('c1', 'u1', 60, 0)).toBe('warning');
    expect(tracker.recordTrigger('c1', 'u1', 60, 30_000)).toBe('repeat');
    expect(tracker.recordTrigger('c1', 'u1', 60, 60_000)).toBe('repeat');
    // A repeat does not move the warning forward.
    expect(tracker.recordTrigger('c1', 'u1', 60, 60_001)).toBe('warning');
  });

  it('prunes warnings older than the given age', () => {
    const tracker = new WarningStateTracker();
    tracker.recordWarning('c1', 'old', 0);
    tracker.recordWarning('c1', 'new', 90_000);

    expect(tracker.prune(60, 100_000)).toBe(1);
    expect(tracker.size).toBe(1);
    expect(tracker.isEscalated('c1', 'new', 60, 100_000)).toBe(true);
    expect(tracker.isEscalated('c1', 'old', 600, 100_000)).toBe(false);
  });
});

describe('message cache', () => {
  it('counts a user messages since a point in time', () => {
    const cache = new MessageCache();
    cache.consume({ channelId: 'c1', userId: 'u1', login: 'login1', text: 'a' }, 1_000);
    cache.consume({ channelId: 'c1', userId: 'u1', login: 'login1', text: 'b' }, 2_000);
    cache.consume({ channelId: 'c1', userId: 'u2', login: 'login2', text: 'c' }, 2_000);
    cache.consume({ channelId: 'c2', userId: 'u1', login: 'login1', text: 'd' }, 2_000);

    expect(cache.countFromUserSince('c1', 'u1', 1_500)).toBe(1);
    expect(cache.countFromUserSince('c1', 'u1', 0)).toBe(2);
    expect(cache.countFromUserSince('c3', 'u1', 0)).toBe(0);
  });

  it('rejects blank identifiers', () => {
    const cache = new MessageCache();
    expect(() => cache.countFromUserSince(' ', 'u1', 0)).toThrow('channelId and userId are required');
  });

  it('keeps only the newest messages per channel', () => {
    const cache = new MessageCache({ maxPerChannel: 2 });
    cache.consume({ channelId: 'c1', userId: 'u1', login: 'login1', text: 'a' }, 1);
    cache.consume({ channelId: 'c1', userId: 'u1', login: 'login1', text: 'b' }, 2);
    cache.consume({ channelId: 'c1', userId: 'u1', login: 'login1', text: 'c' }, 3);

    expect(cache.size).toBe(2);
    expect(cache.countFromUserSince('c1', 'u1', 0)).toBe(2);
    expect(cache.loginsWhoSentMatching('c1', /^a$/)).toEqual([]);
  });

  it('lists logins whose messages match, once each', () => {
    const cache = new MessageCache();
    cache.consume({ channelId: 'c1', userId: 'u1', login: 'login1', text: 'buy followers' }, 1);
    cache.consume({ channelId: 'c1', userId: 'u1', login: 'login1', text: 'buy followers now' }, 2);
    cache.consume({ channelId: 'c1', userId: 'u2', login: 'login2', text: 'hello' }, 3);
    cache.consume({ channelId: 'c1', userId: 'u3', login: 'login3', text: 'BUY FOLLOWERS' }, 4);

    expect(cache.loginsWhoSentMatching('c1', /buy followers/gi)).toEqual(['login1', 'login3']);
  });

  it('prunes old messages and empty channels', () => {
    const cache = new MessageCache();
    cache.consume({ channelId: 'c1', userId: 'u1', login: 'login1', text: 'a' }, 1_000);
    cache.consume({ channelId: 'c2', userId: 'u1', login: 'login1', text: 'b' }, 5_000);

    expect(cache.prune(2_000)).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.countFromUserSince('c2', 'u1', 0)).toBe(1);
  });
});

describe('link permits', () => {
  it('is consumed once and ignores login case', () => {
    const permits = new LinkPermitStore();
    permits.grant('c1', 'SomeUser', 30, 0);

    expect(permits.consume('c1', 'someuser', 10_000)).toBe(true);
    expect(permits.consume('c1', 'someuser', 10_000)).toBe(false);
  });

  it('expires after the granted seconds', () => {
    const permits = new LinkPermitStore();
    permits.grant('c1', 'someuser', 30, 0);
    expect(permits.consume('c1', 'someuser', 30_001)).toBe(false);
  });

  it('is scoped to the channel', () => {
    const permits = new LinkPermitStore();
    permits.grant('c1', 'someuser', 30, 0);
    expect(permits.consume('c2', 'someuser', 0)).toBe(false);
    expect(permits.consume('c1', 'someuser', 0)).toBe(true);
  });

  it('prunes expired permits', () => {
    const permits = new LinkPermitStore();
    permits.grant('c1', 'a', 10, 0);
    permits.grant('c1', 'b', 60, 0);
    expect(permits.prune(20_000)).toBe(1);
    expect(permits.consume('c1', 'b', 20_000)).toBe(true);
  });
});
