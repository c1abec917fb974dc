export { SqlitePersistenceAdapter } from './sqlite-adapter.js';
export { InMemoryPersistenceAdapter } from './in-memory-adapter.js';
