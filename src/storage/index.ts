export { InMemorySessionStorage } from './memory-session.storage.js';
export type { InMemorySessionStorageOptions } from './memory-session.storage.js';
export { StripedLock } from './striped-lock.js';
