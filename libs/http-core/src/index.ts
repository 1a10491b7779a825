export * from './types';
export { HttpClient, HttpError, decodeText, parseJsonBody, isSuccessStatus } from './HttpClient';
export { createDefaultHttpClient, createConsoleLogger } from './factories';
export type { LogLevel } from './factories';
export * from './transport/fetchTransport';
