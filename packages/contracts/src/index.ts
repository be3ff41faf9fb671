export * from './providers.ts';
export * from './cache.ts';
export * from './session.ts';
