export * from './types.ts';
export * from './config.ts';
export * from './logger.ts';
export * from './http/client.ts';
