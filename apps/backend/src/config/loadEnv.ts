import dotenv from 'dotenv';

const result = dotenv.config();

// Keep the bot identity from .env even when the process manager exports stale values.
const FORCE_KEYS = ['CHAT_BOT_LOGIN', 'CHAT_BOT_CHANNELS'] as const;
const parsed = result.parsed ?? null;
if (parsed) {
  for (const key of FORCE_KEYS) {
    const value = parsed[key];
    if (typeof value === 'string' && value.trim()) {
      if (process.env[key] && process.env[key] !== value) {
        // Logger is not loaded yet.
        console.warn(`[env] Overriding ${key} from .env`);
      }
      process.env[key] = value;
    }
  }
}
