import type { EmotePosition } from '@chatwarden/shared';

const SYMBOL_CHARS = new Set(Array.from('-!$%#^&*()_+|~=`{}[]:\'<>?,./\\;"'));

// Anything outside this band (emoji surrogates, Latin, Cyrillic, general punctuation) counts as glitch text.
const ZALGO_RE = /[^\uD83C-\uDBFF\uDC00-\uDFFF\u0401\u0451\u0410-\u044f\u0009-\u02b7\u2000-\u20bf\u2122\u0308]/;

const UPPERCASE_RE = /\p{Lu}/u;

const FAKE_PURGE_TEXTS = new Set(['<message deleted>', '<deleted message>', 'message deleted by a moderator.']);

export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Removes emote ranges (inclusive, code-point indexed) and collapses the
 * whitespace left behind. Out-of-range positions are clamped.
 */
export function stripEmotes(text: string, positions: readonly EmotePosition[]): string {
  const chars = Array.from(text);
  if (positions.length > 0 && chars.length > 0) {
    const keep = new Array<boolean>(chars.length).fill(true);
    const last = chars.length - 1;
    for (const p of positions) {
      if (!Number.isFinite(p.start) || !Number.isFinite(p.end)) continue;
      const start = Math.max(0, Math.trunc(p.start));
      const end = Math.min(last, Math.trunc(p.end));
      for (let i = start; i <= end; i += 1) keep[i] = false;
    }
    return collapseWhitespace(chars.filter((_, i) => keep[i]).join(''));
  }
  return collapseWhitespace(text);
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function countUppercase(text: string): number {
  let n = 0;
  for (const ch of text) if (UPPERCASE_RE.test(ch)) n += 1;
  return n;
}

export function countSymbols(text: string): number {
  let n = 0;
  for (const ch of text) if (SYMBOL_CHARS.has(ch)) n += 1;
  return n;
}

function longestRun(items: readonly string[], counts: (item: string) => boolean): number {
  let best = 0;
  let run = 0;
  for (let i = 0; i < items.length; i += 1) {
    if (!counts(items[i])) {
      run = 0;
      continue;
    }
    run = i > 0 && items[i] === items[i - 1] ? run + 1 : 1;
    if (run > best) best = run;
  }
  return best;
}

export function longestSymbolRun(text: string): number {
  return longestRun(Array.from(text), (ch) => SYMBOL_CHARS.has(ch));
}

export function longestCharacterRun(text: string): number {
  return longestRun(Array.from(text), (ch) => !/\s/.test(ch));
}

/** Consecutive identical words, compared case-insensitively. */
export function longestWordRun(text: string): number {
  const words = text
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean);
  return longestRun(words, () => true);
}

/** True when `count` is at least `maximumPercentage` percent of `length`; zero length never qualifies. */
export function exceedsPercentage(count: number, length: number, maximumPercentage: number): boolean {
  if (length <= 0) return false;
  return (count * 100) / length >= maximumPercentage;
}

export function hasZalgo(text: string): boolean {
  return ZALGO_RE.test(text);
}

export function isFakePurge(text: string): boolean {
  return FAKE_PURGE_TEXTS.has(text.trim().toLowerCase());
}

export function isActionMessage(text: string, isAction: boolean): boolean {
  return isAction || text.trimStart().toLowerCase().startsWith('/me');
}
