import { logger } from '../utils/logger.js';
import { markShuttingDown } from '../utils/shutdownState.js';

type StopHandle = { stop: () => Promise<void> | void };

type ShutdownDeps = {
  shutdownTimeoutMs: number;
  getChatBotHandle: () => StopHandle | null;
  getCleanupHandle: () => StopHandle | null;
  closeDatabase: () => Promise<void>;
  exit?: (code: number) => void;
};

async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return await promise;
  let timer: NodeJS.Timeout | null = null;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${label}_timeout_${ms}`)), ms);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export function createShutdown(deps: ShutdownDeps): (signal: NodeJS.Signals) => Promise<void> {
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  async function runShutdownStep(label: string, deadlineAt: number, maxMs: number, action: () => Promise<void>): Promise<void> {
    const budget = Math.min(maxMs, Math.max(0, deadlineAt - Date.now() - 250));
    if (budget <= 0) {
      logger.warn('shutdown.step_skipped', { step: label, reason: 'deadline_reached' });
      return;
    }
    try {
      await withTimeout(action(), budget, `shutdown_${label}`);
    } catch (error) {
      logger.warn(`shutdown.${label}_failed`, { errorMessage: error instanceof Error ? error.message : String(error), timeoutMs: budget });
    }
  }

  return async (signal) => {
    if (!markShuttingDown()) return;
    logger.info('shutdown.start', { signal, timeoutMs: deps.shutdownTimeoutMs });

    const deadlineAt = Date.now() + deps.shutdownTimeoutMs;
    const timer = setTimeout(() => {
      logger.error('shutdown.timeout', { signal, timeoutMs: deps.shutdownTimeoutMs });
      exit(1);
    }, deps.shutdownTimeoutMs);
    timer.unref?.();

    await runShutdownStep('cleanup_stop', deadlineAt, 1000, async () => {
      await deps.getCleanupHandle()?.stop();
    });
    await runShutdownStep('chatbot_stop', deadlineAt, 5000, async () => {
      await deps.getChatBotHandle()?.stop();
    });
    await runShutdownStep('db_close', deadlineAt, 5000, () => deps.closeDatabase());

    clearTimeout(timer);
    logger.info('shutdown.complete', { signal });
    exit(0);
  };
}

export function setupShutdownHandlers(deps: ShutdownDeps): void {
  const shutdown = createShutdown(deps);
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}
