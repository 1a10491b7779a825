import { homedir } from 'node:os';
import path from 'node:path';

export const DEFAULT_API_URL = 'http://comtrade.un.org/api/';
export const DEFAULT_REFERENCE_BASE_URL = 'https://comtrade.un.org/data/cache/';
export const TOKEN_ENV_NAME = 'COMTRADE_TOKEN';
export const TOKEN_LENGTH = 152;
export const DEFAULT_MAX_RETRIES = 3;

export function defaultTokenFile(home: string = homedir()): string {
  return path.join(home, '.comtraderc');
}

export function defaultDataDir(home: string = homedir()): string {
  return path.join(home, '.comtrade', 'data');
}

export type Environment = Record<string, string | undefined>;

export function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}
