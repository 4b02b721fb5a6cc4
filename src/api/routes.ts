/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers with no linking logic.
 */

import type { FastifyInstance } from 'fastify';
import type { ExperimentHandlers } from './handlers/ExperimentHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  experimentHandlers: ExperimentHandlers;
  experimentCount: () => Promise<number>;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { experimentHandlers, experimentCount } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      components: {
        experiments: { stored: await experimentCount() },
      },
    };
  });

  // ============================================================================
  // Experiment Routes
  // ============================================================================

  fastify.get('/experiments', experimentHandlers.listExperiments);
  fastify.post('/experiments', experimentHandlers.createExperiment);
  fastify.get('/experiments/:id', experimentHandlers.getExperiment);
  fastify.delete('/experiments/:id', experimentHandlers.deleteExperiment);

  // ============================================================================
  // Link Routes
  // ============================================================================

  fastify.get('/experiments/:id/links', experimentHandlers.listLinks);
  fastify.post('/experiments/:id/links', experimentHandlers.addLink);
  fastify.get('/experiments/:id/spectra-sample-index', experimentHandlers.getSpectraSampleIndex);

  // ============================================================================
  // Subsetting and Element Routes
  // ============================================================================

  fastify.post('/experiments/:id/subset', experimentHandlers.subsetExperiment);
  fastify.get('/experiments/:id/elements/:address', experimentHandlers.readElement);
  fastify.put('/experiments/:id/elements/:address', experimentHandlers.writeElement);
  fastify.post('/experiments/:id/elements/:address/select', experimentHandlers.selectElements);
}
