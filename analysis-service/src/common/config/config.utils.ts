import type { ConfigService } from '@nestjs/config';

/**
 * Read a numeric setting. Env vars arrive as strings, so anything that does
 * not coerce to a finite number falls back to the default.
 */
export function getNumber(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return defaultValue;
  }

  const n = Number(raw);
  return Number.isFinite(n) ? n : defaultValue;
}

/**
 * Positive integer setting, floored and clamped to at least `min`
 */
export function getInteger(
  configService: ConfigService,
  key: string,
  defaultValue: number,
  min = 1,
): number {
  return Math.max(min, Math.floor(getNumber(configService, key, defaultValue)));
}
