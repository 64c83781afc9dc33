export type * from './types';

export * from './asserts';
export * from './failure';
