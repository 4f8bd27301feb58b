export * from './constants';
export * from './utils';
export type * from './types';
