/**
 * Configuration types for the sample-data-links server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

import type { AmbiguityPolicy } from '../experiment/links/SampleIndexLookup.js';
import type { SampleIndexMode } from '../experiment/spectraSampleIndex.js';

/**
 * Top-level server configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  linking: LinkingConfig;
  experiments: ExperimentsConfig;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * How links are read back.
 */
export interface LinkingConfig {
  /** Elements linked to several samples: warn and keep the first, or fail (default: 'warn') */
  ambiguousMapping: AmbiguityPolicy;
  /** Lookup mode of the spectra sample index when a request names none (default: 'first') */
  defaultLookupMode: SampleIndexMode;
}

export interface ExperimentsConfig {
  /** Directory of *.json experiment documents loaded at startup */
  seedDir?: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  linking: {
    ambiguousMapping: 'warn',
    defaultLookupMode: 'first',
  },
  experiments: {},
};
