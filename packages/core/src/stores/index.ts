export { GuardedParcelStore } from './guarded-store.js';
export { InMemoryParcelStore, InMemoryParcelTable } from './in-memory.js';
