export * from './beatsource.types.ts';
export * from './config.ts';
export * from './subscription.ts';
export * from './artwork.ts';
export * from './url.ts';
export * from './beatsource.client.ts';
export * from './beatsource.auth.ts';
export * from './pagination.ts';
export * from './normalize.ts';
export * from './module.ts';
