export * from './core/index.js';
export { directExecutor, deferredExecutor, PoolExecutor, createExecutor } from './executor/index.js';
export type { ExecutorKind } from './executor/index.js';
export { InMemorySessionStorage, StripedLock } from './storage/index.js';
export type { InMemorySessionStorageOptions } from './storage/index.js';
export { EmitterEventSource } from './events/emitter.source.js';
export { config, loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export { logger, createChildLogger } from './config/logger.js';
