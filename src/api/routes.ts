/**
 * Route configuration for the API.
 *
 * Registers the intake routes on a Fastify instance.
 */

import type { FastifyInstance } from 'fastify';
import type { UserHandlers } from './handlers/UserHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  userHandlers: UserHandlers;
  storeStatus: () => { open: boolean; path: string };
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { userHandlers, storeStatus } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    components: {
      store: storeStatus(),
    },
  }));

  // ============================================================================
  // User Routes
  // ============================================================================

  // Paged listing
  fastify.get('/users', userHandlers.listUsers.bind(userHandlers));

  // Submit the form
  fastify.post('/users', userHandlers.submitUser.bind(userHandlers));

  // Pre-fill from the random-user provider
  fastify.post('/users/prefill', userHandlers.prefillUser.bind(userHandlers));
}
