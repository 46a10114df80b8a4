export * from './types';
export { succeed, fail } from './result';
export { settleInOrder } from './batch';
export type { SettleOptions } from './batch';
