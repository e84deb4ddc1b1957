/**
 * Server entry point for the user-intake API.
 *
 * This module:
 * - Loads configuration and opens the record store
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { loadConfig, resolveDatabasePath } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createUserStore, type SqliteUserStore } from './store/SqliteUserStore.js';
import { createRandomUserProvider, type UserProvider } from './intake/RandomUserProvider.js';
import { createIntakeService, type IntakeService } from './intake/IntakeService.js';
import { createUserHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ServerOptions } from './api/types.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  store: SqliteUserStore;
  provider: UserProvider;
  service: IntakeService;
}

/**
 * Options for initializeApp.
 */
export interface InitOptions {
  /** Use this config instead of reading config.yaml */
  config?: AppConfig;
  /** Override the configured database path */
  databasePath?: string;
  /** Override the random-user provider */
  provider?: UserProvider;
}

/**
 * Initialize all application components. The store is opened here.
 */
export async function initializeApp(
  basePath: string,
  options: InitOptions = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const config = options.config ?? await loadConfig({
    configPath: process.env.CONFIG_PATH || resolve(basePath, 'config.yaml'),
  });

  const databasePath = options.databasePath ?? resolveDatabasePath(config, basePath);
  const store = createUserStore({ databasePath });
  await store.open();
  console.log(`Record store opened: ${databasePath}`);

  const provider = options.provider ?? createRandomUserProvider({ url: config.provider.url });
  const service = createIntakeService(store, provider);

  console.log('App initialized');

  return { config, store, provider, service };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  options: ServerOptions = {}
): Promise<ReturnType<typeof Fastify>> {
  const serverConfig = ctx.config.server;
  const logLevel = options.logLevel ?? serverConfig.logLevel;
  const corsEnabled = options.cors ?? serverConfig.cors.enabled;
  const corsOrigins = options.corsOrigins ?? serverConfig.cors.origins;

  const fastify = Fastify({
    logger: {
      level: logLevel,
    },
  });

  if (corsEnabled) {
    await fastify.register(cors, {
      origin: corsOrigins.includes('*') ? true : corsOrigins,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  }

  const userHandlers = createUserHandlers(ctx.service, ctx.config.listing.pageSize);

  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      userHandlers,
      storeStatus: () => ({ open: ctx.store.isOpen, path: ctx.store.path }),
    });
  }, { prefix: '/api' });

  fastify.addHook('onClose', async () => {
    await ctx.store.close();
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  options: ServerOptions = {}
): Promise<void> {
  try {
    const ctx = await initializeApp(basePath);
    const fastify = await createServer(ctx, options);

    const port = options.port ?? ctx.config.server.port;
    const host = options.host ?? ctx.config.server.host;

    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);
    console.log(`Listing page size: ${ctx.config.listing.pageSize}`);

    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((err) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env.APP_BASE_PATH || process.cwd();
  const options: ServerOptions = {};
  if (process.env.PORT) {
    options.port = parseInt(process.env.PORT, 10);
  }
  if (process.env.HOST) {
    options.host = process.env.HOST;
  }

  await startServer(basePath, options);
}

// Run if executed directly
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
