import { ConfigService } from '@nestjs/config';

/**
 * Environment values arrive as strings; programmatic configuration
 * (tests, `load` factories) may already be typed.
 */
export function getNumber(
  config: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }

  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Configuration ${key} must be numeric, got "${raw}"`);
  }
  return value;
}

export function getBoolean(
  config: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = config.get<string | boolean>(key);
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }
  if (typeof raw === 'boolean') {
    return raw;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

export function getString(
  config: ConfigService,
  key: string,
  fallback: string,
): string {
  const raw = config.get<string>(key);
  return raw === undefined || raw === null || raw === '' ? fallback : raw;
}

/**
 * Restrict a string setting to a known set of values
 */
export function getChoice<T extends string>(
  config: ConfigService,
  key: string,
  choices: readonly T[],
  fallback: T,
): T {
  const raw = getString(config, key, fallback).toLowerCase();
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(
      `Configuration ${key} must be one of ${choices.join(', ')}, got "${raw}"`,
    );
  }
  return match;
}
