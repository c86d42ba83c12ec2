export function normalizeLogin(v: unknown): string {
  return String(v ?? '')
    .trim()
    .toLowerCase()
    .replace(/^[#@]+/, '');
}

/** Permission names compare case-folded with whitespace turned into underscores. */
export function normalizePermissionName(v: unknown): string {
  return String(v ?? '')
    .trim()
    .toLowerCase()
    .replace(/\s/g, '_');
}

export function normalizeGroupName(v: unknown): string {
  return String(v ?? '')
    .trim()
    .toLowerCase();
}

export function commandPermissionName(words: readonly string[]): string {
  return normalizePermissionName(`can_${words.join(' ')}`);
}
