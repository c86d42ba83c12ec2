import { describe, expect, it } from 'vitest';

import {
  UserLevel,
  combineLevels,
  formatUserLevels,
  hasFlag,
  parseUserLevels,
  rankOf,
  satisfiesRank,
} from '../src/levels.js';

describe('user levels', () => {
  it('ranks staff above admin above moderator', () => {
    expect(rankOf(UserLevel.Moderator)).toBe(1);
    expect(rankOf(UserLevel.TwitchAdmin)).toBe(2);
    expect(rankOf(UserLevel.TwitchStaff)).toBe(3);
    expect(rankOf(UserLevel.VIP | UserLevel.Subscriber)).toBe(0);
    expect(rankOf(UserLevel.Moderator | UserLevel.TwitchStaff)).toBe(3);
  });

  it('a higher rank satisfies any lower rank requirement, never the reverse', () => {
    expect(satisfiesRank(UserLevel.TwitchStaff, UserLevel.Moderator)).toBe(true);
    expect(satisfiesRank(UserLevel.TwitchStaff, UserLevel.TwitchAdmin)).toBe(true);
    expect(satisfiesRank(UserLevel.TwitchAdmin, UserLevel.TwitchStaff)).toBe(false);
    expect(satisfiesRank(UserLevel.Moderator, UserLevel.TwitchAdmin)).toBe(false);
    expect(satisfiesRank(UserLevel.Moderator, UserLevel.Moderator)).toBe(true);
  });

  it('uses the lowest rank named in a combined requirement', () => {
    expect(satisfiesRank(UserLevel.Moderator, UserLevel.Moderator | UserLevel.TwitchStaff)).toBe(true);
  });

  it('treats a flag-only requirement as below moderator', () => {
    expect(satisfiesRank(UserLevel.Moderator, UserLevel.Subscriber)).toBe(true);
    expect(satisfiesRank(UserLevel.Moderator, UserLevel.VIP)).toBe(true);
  });

  it('never lets a rank satisfy a requirement without ranks or flags', () => {
    expect(satisfiesRank(UserLevel.TwitchStaff, UserLevel.Broadcaster)).toBe(false);
    expect(satisfiesRank(UserLevel.TwitchStaff, UserLevel.Custom)).toBe(false);
  });

  it('flags only match the exact flag', () => {
    expect(hasFlag(UserLevel.VIP, UserLevel.VIP)).toBe(true);
    expect(hasFlag(UserLevel.VIP, UserLevel.Subscriber)).toBe(false);
    expect(hasFlag(UserLevel.VIP, UserLevel.Moderator)).toBe(false);
    expect(hasFlag(UserLevel.Subscriber, UserLevel.VIP | UserLevel.Subscriber)).toBe(true);
  });

  it('parses names case-insensitively and reports unknown ones', () => {
    expect(parseUserLevels(['moderator', 'VIP'])).toEqual({ ok: true, mask: 24 });
    expect(parseUserLevels(['moderator', 'wizard'])).toEqual({ ok: false, unknown: ['wizard'] });
    expect(parseUserLevels([])).toEqual({ ok: true, mask: 0 });
  });

  it('formats a mask in declaration order', () => {
    expect(formatUserLevels(combineLevels(UserLevel.Subscriber, UserLevel.Broadcaster))).toEqual([
      'Broadcaster',
      'Subscriber',
    ]);
  });
});
