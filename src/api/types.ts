/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 * Linking rules live in the experiment module, not here.
 */

import type { ExperimentDocument } from '../experiment/ExperimentCodec.js';
import type { LinkDiagnostic } from '../experiment/links/diagnostics.js';
import type { LinkCardinality } from '../experiment/links/LinkMatrix.js';
import type { SampleIndexMode } from '../experiment/spectraSampleIndex.js';
import type { ExperimentSummary } from '../experiment/summarizeExperiment.js';
import type { SubsetBy } from '../experiment/types.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
}

// ============================================================================
// Experiment Endpoints
// ============================================================================

/**
 * Stored experiment as returned by the API.
 */
export interface ExperimentResponse {
  id: string;
  name?: string;
  derivedFrom?: string;
  createdAt: string;
  updatedAt: string;
  summary: ExperimentSummary;
  /** Full JSON document (single-experiment endpoints only) */
  document?: ExperimentDocument;
}

/**
 * Response for listing experiments.
 */
export interface ListExperimentsResponse {
  experiments: ExperimentResponse[];
  total: number;
  offset: number;
  limit?: number;
}

/**
 * One link of an experiment.
 */
export interface LinkResponse {
  address: string;
  subsetBy: SubsetBy;
  cardinality: LinkCardinality;
  pairs: Array<[number, number]>;
}

export interface LinksResponse {
  links: LinkResponse[];
}

/**
 * Response after adding a link: the stored link plus any warnings raised.
 */
export interface AddLinkResponse {
  /** Undefined when the link resolved to no pairs and nothing was stored */
  link?: LinkResponse;
  diagnostics: LinkDiagnostic[];
}

export interface ElementResponse {
  address: string;
  value: unknown;
}

export interface SpectraSampleIndexResponse {
  mode: SampleIndexMode;
  /** Sample index per spectrum: number or null in 'first' mode, sorted arrays in 'all' mode */
  index: Array<number | null> | number[][];
  diagnostics: LinkDiagnostic[];
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components?: {
    experiments?: { stored: number };
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Server configuration options.
 */
export interface ServerConfig {
  /** HTTP port (default: 3001) */
  port?: number;
  /** HTTP host (default: '0.0.0.0') */
  host?: string;
  /** Enable CORS (default: true) */
  cors?: boolean;
  /** Allowed CORS origins (default: ['*']) */
  corsOrigins?: string[];
  /** Log level (default: 'info') */
  logLevel?: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
}
