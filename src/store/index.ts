export * from './types.js';
export * from './errors.js';
export { SqliteUserStore, createUserStore } from './SqliteUserStore.js';
