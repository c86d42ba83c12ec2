/** Strict decimal integer; anything else (including "12abc") is null. */
export function parsePositiveInt(raw: unknown): number | null {
  const s = String(raw ?? '').trim();
  if (!/^\d+$/.test(s)) return null;
  const n = Number.parseInt(s, 10);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

export function clampInt(n: number, min: number, max: number, fallback: number): number {
  if (!Number.isFinite(n)) return fallback;
  if (n < min) return min;
  if (n > max) return max;
  return Math.floor(n);
}

export function pageCount(total: number, pageSize: number): number {
  return Math.max(1, Math.ceil(Math.max(0, total) / pageSize));
}

export type Page<T> = {
  items: T[];
  page: number;
  pageCount: number;
  total: number;
};

/** Out-of-range pages are clamped into [1, pageCount]. */
export function paginate<T>(items: readonly T[], page: number, pageSize: number): Page<T> {
  const count = pageCount(items.length, pageSize);
  const current = clampInt(page, 1, count, 1);
  const start = (current - 1) * pageSize;
  return {
    items: items.slice(start, start + pageSize),
    page: current,
    pageCount: count,
    total: items.length,
  };
}
