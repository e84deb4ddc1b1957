/**
 * user-intake — validated user intake over a local SQLite record store.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Configuration
export * from './config/index.js';

// Record store
export * from './store/index.js';

// Intake workflow
export * from './intake/index.js';

// Form view controller
export * from './ui/index.js';

// HTTP API
export * from './api/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitOptions } from './server.js';
