/**
 * @fileoverview Environment parsing helpers
 *
 * Each parser returns the fallback for an unset variable, and warns before
 * returning it for a value it can't read.
 */

import { isLogLevel, type LogLevel } from '../logging/types.js';

export interface EnvParseLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}

export interface EnvParseOptions<T> {
  name: string;
  fallback: T;
  logger?: EnvParseLogger;
}

export interface ParseEnvIntegerOptions extends EnvParseOptions<number> {
  min?: number;
}

const BOOLEANS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['1', true],
  ['yes', true],
  ['on', true],
  ['false', false],
  ['0', false],
  ['no', false],
  ['off', false],
]);

function readEnv<T>(
  raw: string | undefined,
  options: EnvParseOptions<T>,
  parse: (value: string) => T | undefined
): T {
  if (raw === undefined) return options.fallback;

  const value = parse(raw.trim());
  if (value !== undefined) return value;

  options.logger?.warn('Invalid environment value, using fallback', {
    variable: options.name,
    value: raw,
    fallback: options.fallback,
  });
  return options.fallback;
}

/** Integers only (`12abc` and `1.5` are rejected), at or above `min` */
export function parseEnvInteger(raw: string | undefined, options: ParseEnvIntegerOptions): number {
  return readEnv(raw, options, (value) => {
    if (!/^-?\d+$/.test(value)) return undefined;
    const parsed = Number(value);
    if (!Number.isSafeInteger(parsed)) return undefined;
    return options.min !== undefined && parsed < options.min ? undefined : parsed;
  });
}

export function parseEnvBoolean(raw: string | undefined, options: EnvParseOptions<boolean>): boolean {
  return readEnv(raw, options, (value) => BOOLEANS.get(value.toLowerCase()));
}

export function parseLogLevel(raw: string | undefined, options: EnvParseOptions<LogLevel>): LogLevel {
  return readEnv(raw, options, (value) => {
    const level = value.toLowerCase();
    return isLogLevel(level) ? level : undefined;
  });
}
