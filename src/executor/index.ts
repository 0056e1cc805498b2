export { directExecutor, deferredExecutor, PoolExecutor, createExecutor } from './executors.js';
export type { ExecutorKind } from './executors.js';
