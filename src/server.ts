/**
 * Server entry point for the sample-data-links API.
 *
 * This module:
 * - Loads configuration and seeds the experiment store
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { createExperimentStore } from './store/ExperimentStoreImpl.js';
import { seedExperiments } from './store/seed.js';
import type { ExperimentStore } from './store/types.js';
import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createExperimentHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ServerConfig } from './api/types.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  store: ExperimentStore;
  appConfig: AppConfig;
  configPath?: string | undefined;
}

/**
 * Options for initializing the app.
 */
export interface InitializeOptions {
  /** Path to config.yaml (default: CONFIG_PATH or <basePath>/config.yaml) */
  configPath?: string;
  /** Use this configuration instead of loading one */
  appConfig?: AppConfig;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  options: InitializeOptions = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const configPath = options.configPath ?? process.env.CONFIG_PATH ?? resolve(basePath, 'config.yaml');
  const appConfig = options.appConfig ?? await loadConfig({ configPath });

  const store = createExperimentStore();
  const { seedDir } = appConfig.experiments;
  if (seedDir !== undefined) {
    const seeded = await seedExperiments(store, resolve(basePath, seedDir));
    console.log(`Seeded ${seeded.length} experiment(s) from ${seedDir}`);
  }

  return {
    store,
    appConfig,
    ...(options.appConfig === undefined ? { configPath } : {}),
  };
}

/**
 * Create and configure a Fastify server.
 *
 * Settings not given in `config` come from the loaded configuration.
 */
export async function createServer(
  ctx: AppContext,
  config: ServerConfig = {}
): Promise<ReturnType<typeof Fastify>> {
  const serverConfig = ctx.appConfig.server;
  const corsEnabled = config.cors ?? serverConfig.cors.enabled;
  const origins = config.corsOrigins ?? serverConfig.cors.origins;

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: config.logLevel ?? serverConfig.logLevel,
    },
  });

  // Register CORS if enabled
  if (corsEnabled) {
    await fastify.register(cors, {
      origin: origins.includes('*') ? true : origins,
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  // Create handlers
  const experimentHandlers = createExperimentHandlers(ctx);

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      experimentHandlers,
      experimentCount: () => ctx.store.count(),
    });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  config: ServerConfig = {}
): Promise<void> {
  try {
    // Initialize app
    const ctx = await initializeApp(basePath);

    // Create server
    const fastify = await createServer(ctx, config);

    const port = config.port ?? ctx.appConfig.server.port;
    const host = config.host ?? ctx.appConfig.server.host;

    // Start listening
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);
    console.log(`Experiments loaded: ${await ctx.store.count()}`);

    // Handle shutdown
    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

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

  await startServer(basePath, {
    ...(process.env.PORT ? { port: parseInt(process.env.PORT, 10) } : {}),
    ...(process.env.HOST ? { host: process.env.HOST } : {}),
  });
}

// Run if executed directly
// Note: ESM doesn't have require.main, so match the script name instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
