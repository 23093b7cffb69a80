import { existsSync, readFileSync } from 'node:fs';
import logger from './logger.js';

type Env = Record<string, string | undefined>;

const NUMBERED_KEY_MAX = 10;

function pushUnique(keys: string[], raw: string | undefined): void {
  const key = raw?.trim();
  if (key && !keys.includes(key)) keys.push(key);
}

/**
 * Collects upstream API keys in a stable order:
 * GROQ_API_KEY, GROQ_API_KEY_2..GROQ_API_KEY_10, GROQ_API_KEYS (comma separated),
 * then the keys file (one per line, `#` starts a comment line).
 * Duplicates keep their first position.
 */
export function loadCredentials(env: Env = process.env, keysFile: string | null = null): string[] {
  const keys: string[] = [];

  pushUnique(keys, env.GROQ_API_KEY);
  for (let i = 2; i <= NUMBERED_KEY_MAX; i++) {
    pushUnique(keys, env[`GROQ_API_KEY_${i}`]);
  }
  for (const key of (env.GROQ_API_KEYS ?? '').split(',')) {
    pushUnique(keys, key);
  }

  if (keysFile && existsSync(keysFile)) {
    try {
      for (const line of readFileSync(keysFile, 'utf8').split(/\r?\n/)) {
        const trimmed = line.trim();
        if (trimmed.startsWith('#')) continue;
        pushUnique(keys, trimmed);
      }
    } catch (err) {
      logger.warn({ keysFile, error: err instanceof Error ? err.message : String(err) }, 'Could not read keys file');
    }
  }

  logger.info({ count: keys.length }, 'Loaded API key(s)');
  return keys;
}
