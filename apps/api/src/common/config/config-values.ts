import type { ConfigService } from '@nestjs/config';

/**
 * Reads a numeric setting. Values from .env arrive as strings, so they are
 * parsed here; a missing, empty or non-numeric value yields the fallback.
 */
export function getNumber(configService: ConfigService, key: string, fallback: number): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/** Reads a boolean setting: `true`, `1` and `yes` (any case) are true. */
export function getBoolean(configService: ConfigService, key: string, fallback: boolean): boolean {
  const raw = configService.get<string | boolean>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (typeof raw === 'boolean') {
    return raw;
  }
  return ['true', '1', 'yes'].includes(raw.toLowerCase());
}
