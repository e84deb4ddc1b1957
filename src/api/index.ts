export * from './types.js';
export * from './handlers/index.js';
export { registerRoutes } from './routes.js';
export type { RouteOptions } from './routes.js';
