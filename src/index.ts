/**
 * sample-data-links: link a sample table to the data recorded for each sample.
 *
 * This is the main entry point for the library.
 */

// Experiment container, links and subsetting
export * from './experiment/index.js';

// Configuration
export { loadConfig, resolveConfig, validateConfig, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/types.js';
export type { AppConfig, CorsConfig, ExperimentsConfig, LinkingConfig, LogLevel } from './config/types.js';

// Experiment store
export { ExperimentStoreImpl, createExperimentStore } from './store/ExperimentStoreImpl.js';
export { seedExperiments } from './store/seed.js';
export type {
  CreateExperimentOptions,
  ExperimentFilter,
  ExperimentRecord,
  ExperimentStore,
  ExperimentStoreConfig,
} from './store/types.js';

// HTTP API
export { createExperimentHandlers, type ExperimentHandlers } from './api/handlers/ExperimentHandlers.js';
export { registerRoutes, type RouteOptions } from './api/routes.js';
export type {
  AddLinkResponse,
  ApiError,
  ElementResponse,
  ExperimentResponse,
  HealthResponse,
  LinkResponse,
  LinksResponse,
  ListExperimentsResponse,
  ServerConfig,
  SpectraSampleIndexResponse,
} from './api/types.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
