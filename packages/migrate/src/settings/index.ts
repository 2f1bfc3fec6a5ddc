/**
 * @fileoverview Settings Module
 *
 * Settings are read from the process environment once and cached.
 *
 * | Variable                          | Default | Meaning                                   |
 * |-----------------------------------|---------|-------------------------------------------|
 * | TABLEWRIGHT_LOG_LEVEL / LOG_LEVEL | warn    | pino level                                |
 * | TABLEWRIGHT_LOG_PRETTY            | false   | pretty-print logs through pino-pretty     |
 * | TABLEWRIGHT_BUSY_TIMEOUT_MS       | 5000    | SQLite busy timeout for opened databases  |
 * | TABLEWRIGHT_WAL                   | true    | WAL journal mode for file databases       |
 * | TABLEWRIGHT_CHECK_FOREIGN_KEYS    | true    | run foreign_key_check after table rebuilds|
 */

import type { LogLevel } from '../logging/types.js';
import {
  parseEnvBoolean,
  parseEnvInteger,
  parseLogLevel,
  type EnvParseLogger,
} from './env-parsing.js';

export * from './env-parsing.js';

export interface TablewrightSettings {
  readonly logLevel: LogLevel;
  readonly logPretty: boolean;
  readonly busyTimeoutMs: number;
  readonly enableWAL: boolean;
  readonly checkForeignKeys: boolean;
}

export const DEFAULT_SETTINGS: TablewrightSettings = Object.freeze({
  logLevel: 'warn',
  logPretty: false,
  busyTimeoutMs: 5000,
  enableWAL: true,
  checkForeignKeys: true,
});

/**
 * Warnings raised while parsing are written to stderr directly, since the
 * logger itself is configured from these settings.
 */
const stderrLogger: EnvParseLogger = {
  warn: (message, context) => {
    process.stderr.write(`${message} ${JSON.stringify(context ?? {})}\n`);
  },
};

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  logger: EnvParseLogger = stderrLogger
): TablewrightSettings {
  return Object.freeze({
    logLevel: parseLogLevel(env.TABLEWRIGHT_LOG_LEVEL ?? env.LOG_LEVEL, {
      name: 'TABLEWRIGHT_LOG_LEVEL',
      fallback: DEFAULT_SETTINGS.logLevel,
      logger,
    }),
    logPretty: parseEnvBoolean(env.TABLEWRIGHT_LOG_PRETTY, {
      name: 'TABLEWRIGHT_LOG_PRETTY',
      fallback: DEFAULT_SETTINGS.logPretty,
      logger,
    }),
    busyTimeoutMs: parseEnvInteger(env.TABLEWRIGHT_BUSY_TIMEOUT_MS, {
      name: 'TABLEWRIGHT_BUSY_TIMEOUT_MS',
      fallback: DEFAULT_SETTINGS.busyTimeoutMs,
      min: 0,
      logger,
    }),
    enableWAL: parseEnvBoolean(env.TABLEWRIGHT_WAL, {
      name: 'TABLEWRIGHT_WAL',
      fallback: DEFAULT_SETTINGS.enableWAL,
      logger,
    }),
    checkForeignKeys: parseEnvBoolean(env.TABLEWRIGHT_CHECK_FOREIGN_KEYS, {
      name: 'TABLEWRIGHT_CHECK_FOREIGN_KEYS',
      fallback: DEFAULT_SETTINGS.checkForeignKeys,
      logger,
    }),
  });
}

let cachedSettings: TablewrightSettings | null = null;

export function getSettings(): TablewrightSettings {
  if (!cachedSettings) {
    cachedSettings = loadSettings();
  }
  return cachedSettings;
}

/**
 * Drop the cached settings (for testing)
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}
