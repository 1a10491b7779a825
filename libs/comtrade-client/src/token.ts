import { existsSync, readFileSync, statSync } from 'node:fs';
import type { Logger } from '@comtrade/http-core';
import { TOKEN_ENV_NAME, TOKEN_LENGTH, type Environment } from './config';
import { ComtradeConfigError } from './types';

export type TokenSource = 'explicit' | 'environment' | 'file';

export interface TokenSources {
  token?: string;
  env?: Environment;
  tokenFile?: string;
}

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

/**
 * Picks the API token from, in order: the explicit value, `COMTRADE_TOKEN` in
 * the given environment, the token file. Returns undefined when none is set.
 */
export function findToken(sources: TokenSources): ResolvedToken | undefined {
  if (sources.token !== undefined) {
    return { token: sources.token, source: 'explicit' };
  }
  const fromEnv = sources.env?.[TOKEN_ENV_NAME];
  if (fromEnv !== undefined) {
    return { token: fromEnv, source: 'environment' };
  }
  if (sources.tokenFile && isFile(sources.tokenFile)) {
    return { token: readFileSync(sources.tokenFile, 'utf-8').trim(), source: 'file' };
  }
  return undefined;
}

/**
 * Resolves and length-checks the token. Tokens longer than the API's fixed
 * length are cut down with a warning; shorter ones are rejected.
 */
export function resolveToken(sources: TokenSources, logger?: Logger): string | undefined {
  const resolved = findToken(sources);
  if (!resolved) {
    logger?.warn('Comtrade token not detected, usage may be limited.');
    return undefined;
  }

  const { token, source } = resolved;
  if (token.length > TOKEN_LENGTH) {
    logger?.warn(`API token too long, using first ${TOKEN_LENGTH} characters`, {
      source,
      length: token.length,
    });
    return token.slice(0, TOKEN_LENGTH);
  }
  if (token.length < TOKEN_LENGTH) {
    throw new ComtradeConfigError(
      `API token from ${source} is too short (${token.length} characters). Should be ${TOKEN_LENGTH} chars`,
    );
  }
  return token;
}

function isFile(filePath: string): boolean {
  return existsSync(filePath) && statSync(filePath).isFile();
}
