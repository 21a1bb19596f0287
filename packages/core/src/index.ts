export * from './types';
export * from './schemas';
export * from './errors';
export * from './trace';
export * from './logger';
