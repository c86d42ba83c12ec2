import type { LinkPermitStore } from '../moderation/linkPermits.js';
import type { MessageCache } from '../moderation/messageCache.js';
import { MAX_WARNING_WINDOW_SECONDS } from '../moderation/policy.js';
import type { WarningStateTracker } from '../moderation/warningState.js';
import { getErrorMessage, logger } from '../utils/logger.js';

export type ModerationStateCleanupDeps = {
  warnings: WarningStateTracker;
  messages: MessageCache;
  permits: LinkPermitStore;
  messageTtlMs: number;
  clock?: () => number;
};

export type CleanupResult = {
  warningsRemoved: number;
  messagesRemoved: number;
  permitsRemoved: number;
};

export function cleanupModerationState(deps: ModerationStateCleanupDeps): CleanupResult {
  const now = (deps.clock ?? Date.now)();
  return {
    warningsRemoved: deps.warnings.prune(MAX_WARNING_WINDOW_SECONDS, now),
    messagesRemoved: deps.messages.prune(now - deps.messageTtlMs),
    permitsRemoved: deps.permits.prune(now),
  };
}

export function startModerationStateCleanupScheduler(
  deps: ModerationStateCleanupDeps & { intervalMs: number; initialDelayMs: number }
): { stop: () => void } {
  let running = false;

  const runOnce = () => {
    if (running) return;
    running = true;
    const startedAt = Date.now();
    try {
      const res = cleanupModerationState(deps);
      logger.debug('cleanup.moderation_state.completed', { durationMs: Date.now() - startedAt, ...res });
    } catch (error) {
      logger.error('cleanup.moderation_state.failed', { durationMs: Date.now() - startedAt, errorMessage: getErrorMessage(error) });
    } finally {
      running = false;
    }
  };

  // Kick after a short delay, then run periodically.
  const initial = setTimeout(runOnce, Math.max(0, deps.initialDelayMs));
  const interval = setInterval(runOnce, Math.max(1000, deps.intervalMs));
  initial.unref?.();
  interval.unref?.();

  return {
    stop: () => {
      clearTimeout(initial);
      clearInterval(interval);
    },
  };
}
