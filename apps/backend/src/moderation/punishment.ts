import type { PunishmentKind, PunishmentSpec } from '@chatwarden/shared';

const SEVERITY: Record<PunishmentKind, number> = {
  none: 0,
  delete: 1,
  purge: 2,
  timeout: 3,
  ban: 4,
};

/** Ban > longer timeout > shorter timeout > purge > delete > none. */
export function isHarsher(a: PunishmentSpec, b: PunishmentSpec): boolean {
  if (SEVERITY[a.kind] !== SEVERITY[b.kind]) return SEVERITY[a.kind] > SEVERITY[b.kind];
  return a.kind === 'timeout' && a.durationSeconds > b.durationSeconds;
}

export function normalizePunishment(spec: PunishmentSpec): PunishmentSpec {
  switch (spec.kind) {
    case 'timeout':
      return { ...spec, durationSeconds: Math.max(1, Math.trunc(spec.durationSeconds)) };
    case 'purge':
      return { ...spec, durationSeconds: 1 };
    default:
      return { ...spec, durationSeconds: 0 };
  }
}
