export * from './constants';
export * from './errors';
export * from './schemas';
export type * from './types';
