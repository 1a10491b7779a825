import { ComtradeParameterError } from './types';

/**
 * Query parameter names each client method accepts. Names outside a method's
 * list are rejected before any request is made; values are not inspected.
 */
export const ALLOWED_PARAMETERS = {
  get: ['r', 'px', 'ps', 'p', 'rg', 'cc', 'max', 'type', 'freq', 'head', 'token', 'imts'],
  view: ['r', 'px', 'ps', 'type', 'freq', 'token'],
  getBulk: ['r', 'px', 'ps', 'type', 'freq', 'token'],
  viewBulk: ['r', 'px', 'ps', 'type', 'freq', 'from', 'token'],
  getSubUserToken: ['email'],
  getAuthToken: ['username', 'password'],
  getUserInfo: ['token'],
} as const satisfies Record<string, readonly string[]>;

export type ComtradeMethod = keyof typeof ALLOWED_PARAMETERS;

export function validateParameters(method: ComtradeMethod, params: object): void {
  const allowed: readonly string[] = ALLOWED_PARAMETERS[method];
  for (const name of Object.keys(params)) {
    if (!allowed.includes(name)) {
      throw new ComtradeParameterError(
        `Argument ${name} not allowed for method ${method}`,
        method,
        name,
      );
    }
  }
}
