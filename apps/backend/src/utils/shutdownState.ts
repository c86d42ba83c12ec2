let shuttingDown = false;

/** False when shutdown had already been requested. */
export function markShuttingDown(): boolean {
  if (shuttingDown) return false;
  shuttingDown = true;
  return true;
}
