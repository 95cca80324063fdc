export * from './types';
export * from './errors';
export { HttpClient } from './http-client';
export type { HttpClientOptions } from './http-client';
export { createLogger, rootLogger } from './logger';
export type { Logger } from './logger';
