export * from './schema';
export * from './errors';
export * from './env';
export * from './types/config';
export * from './flags';
