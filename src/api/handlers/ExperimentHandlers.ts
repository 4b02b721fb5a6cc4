/**
 * ExperimentHandlers: HTTP handlers for stored experiments.
 *
 * Provides endpoints for creating and reading experiments, linking samples
 * to their data, subsetting by sample and reading or replacing single
 * elements. Link warnings go to the request logger and are returned to the
 * caller.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../../server.js';
import type {
  AddLinkResponse,
  ApiError,
  ElementResponse,
  ExperimentResponse,
  LinkResponse,
  LinksResponse,
  ListExperimentsResponse,
  SpectraSampleIndexResponse,
} from '../types.js';
import { getElement, setElement } from '../../experiment/ElementAddressing.js';
import { decodeElement, decodeExperiment, encodeElement, encodeExperiment, formatZodError } from '../../experiment/ExperimentCodec.js';
import { ExperimentError } from '../../experiment/errors.js';
import { experimentFromFiles } from '../../experiment/experimentFromFiles.js';
import type { DiagnosticSink, LinkDiagnostic } from '../../experiment/links/diagnostics.js';
import { linkCardinality } from '../../experiment/links/LinkMatrix.js';
import type { LinkEntry } from '../../experiment/links/LinkRegistry.js';
import { linkAddress, linkSampleData, sampleDataLinks } from '../../experiment/linkSampleData.js';
import { selectLinkedElements, subsetSamples } from '../../experiment/SampleSubsetter.js';
import { spectraSampleIndex } from '../../experiment/spectraSampleIndex.js';
import { summarizeExperiment } from '../../experiment/summarizeExperiment.js';
import type { ExperimentRecord } from '../../store/types.js';

const createExperimentSchema = z.object({
  name: z.string().min(1).optional(),
  document: z.unknown().optional(),
  files: z.array(z.string()).optional(),
  sampleRows: z.array(z.record(z.string(), z.unknown())).optional(),
});

const addLinkSchema = z.object({
  with: z.string().min(1),
  sampleIndex: z.array(z.number().int()).optional(),
  withIndex: z.array(z.number().int()).optional(),
  subsetBy: z.union([z.literal(1), z.literal(2)]).optional(),
});

const subsetSchema = z.object({
  samples: z.union([z.array(z.number().int()), z.array(z.boolean())]),
  name: z.string().min(1).optional(),
});

const selectElementsSchema = z.object({
  indices: z.array(z.number().int()),
});

const putElementSchema = z.object({
  value: z.unknown(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

const sampleIndexQuerySchema = z.object({
  mode: z.enum(['first', 'all']).optional(),
});

type ParsedBody<T> = { ok: true; value: T } | { ok: false; error: ApiError };

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): ParsedBody<z.infer<S>> {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: { error: 'BAD_REQUEST', message: formatZodError(result.error) } };
}

function notFound(id: string): ExperimentError {
  return new ExperimentError('NOT_FOUND', `Experiment not found: ${id}`);
}

/**
 * Map a thrown error to the response body and status.
 */
function errorResponse(err: unknown, reply: FastifyReply): ApiError {
  if (err instanceof ExperimentError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

/**
 * Sink that logs each diagnostic at warn level and keeps it for the response.
 */
function collectDiagnostics(request: FastifyRequest): { sink: DiagnosticSink; diagnostics: LinkDiagnostic[] } {
  const diagnostics: LinkDiagnostic[] = [];
  const sink: DiagnosticSink = (diagnostic) => {
    request.log.warn({ code: diagnostic.code, details: diagnostic.details }, diagnostic.message);
    diagnostics.push(diagnostic);
  };
  return { sink, diagnostics };
}

function toLinkResponse(entry: LinkEntry): LinkResponse {
  return {
    address: entry.address,
    subsetBy: entry.subsetBy,
    cardinality: linkCardinality(entry.matrix),
    pairs: entry.matrix.map(([sample, element]): [number, number] => [sample, element]),
  };
}

function toExperimentResponse(record: ExperimentRecord, includeDocument: boolean): ExperimentResponse {
  return {
    id: record.id,
    ...(record.name !== undefined ? { name: record.name } : {}),
    ...(record.derivedFrom !== undefined ? { derivedFrom: record.derivedFrom } : {}),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    summary: summarizeExperiment(record.experiment),
    ...(includeDocument ? { document: encodeExperiment(record.experiment) } : {}),
  };
}

export function createExperimentHandlers(ctx: AppContext) {
  const { store } = ctx;
  const linking = ctx.appConfig.linking;

  async function requireRecord(id: string): Promise<ExperimentRecord> {
    const record = await store.get(id);
    if (record === null) {
      throw notFound(id);
    }
    return record;
  }

  return {
    /**
     * GET /experiments
     * List stored experiments with their summaries.
     */
    async listExperiments(
      request: FastifyRequest<{ Querystring: { limit?: string; offset?: string } }>,
      reply: FastifyReply,
    ): Promise<ListExperimentsResponse | ApiError> {
      const query = parseWith(listQuerySchema, request.query);
      if (!query.ok) {
        reply.status(400);
        return query.error;
      }
      const offset = query.value.offset ?? 0;
      const limit = query.value.limit;
      const records = await store.list({ offset, ...(limit !== undefined ? { limit } : {}) });
      return {
        experiments: records.map((record) => toExperimentResponse(record, false)),
        total: await store.count(),
        offset,
        ...(limit !== undefined ? { limit } : {}),
      };
    },

    /**
     * POST /experiments
     * Create an experiment from a JSON document or from a list of data files.
     */
    async createExperiment(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<ExperimentResponse | ApiError> {
      const body = parseWith(createExperimentSchema, request.body);
      if (!body.ok) {
        reply.status(400);
        return body.error;
      }
      try {
        const { name, document, files, sampleRows } = body.value;
        const experiment = files !== undefined
          ? experimentFromFiles(files, sampleRows)
          : decodeExperiment(document ?? {});
        const record = await store.create({ experiment, ...(name !== undefined ? { name } : {}) });
        reply.status(201);
        return toExperimentResponse(record, true);
      } catch (err) {
        return errorResponse(err, reply);
      }
    },

    /**
     * GET /experiments/:id
     */
    async getExperiment(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ): Promise<ExperimentResponse | ApiError> {
      try {
        return toExperimentResponse(await requireRecord(request.params.id), true);
      } catch (err) {
        return errorResponse(err, reply);
      }
    },

    /**
     * DELETE /experiments/:id
     */
    async deleteExperiment(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ): Promise<{ success: boolean } | ApiError> {
      if (!(await store.delete(request.params.id))) {
        return errorResponse(notFound(request.params.id), reply);
      }
      return { success: true };
    },

    /**
     * GET /experiments/:id/links
     * Links of an experiment, optionally restricted by `?address=a,b`.
     */
    async listLinks(
      request: FastifyRequest<{ Params: { id: string }; Querystring: { address?: string } }>,
      reply: FastifyReply,
    ): Promise<LinksResponse | ApiError> {
      try {
        const record = await requireRecord(request.params.id);
        const addresses = request.query.address?.split(',').filter((address) => address.length > 0);
        const links = sampleDataLinks(record.experiment, addresses);
        return { links: [...links].map(toLinkResponse) };
      } catch (err) {
        return errorResponse(err, reply);
      }
    },

    /**
     * POST /experiments/:id/links
     * Link samples to an element by explicit indices or by a join expression.
     */
    async addLink(
      request: FastifyRequest<{ Params: { id: string }; Body: unknown }>,
      reply: FastifyReply,
    ): Promise<AddLinkResponse | ApiError> {
      const body = parseWith(addLinkSchema, request.body);
      if (!body.ok) {
        reply.status(400);
        return body.error;
      }
      try {
        const record = await requireRecord(request.params.id);
        const { sink, diagnostics } = collectDiagnostics(request);
        const { with: target, sampleIndex, withIndex, subsetBy } = body.value;
        const experiment = linkSampleData(record.experiment, {
          with: target,
          ...(sampleIndex !== undefined ? { sampleIndex } : {}),
          ...(withIndex !== undefined ? { withIndex } : {}),
          ...(subsetBy !== undefined ? { subsetBy } : {}),
          onDiagnostic: sink,
        });
        if (experiment === record.experiment) {
          return { diagnostics };
        }
        await store.update(record.id, experiment);
        const entry = experiment.links.get(linkAddress(target));
        reply.status(201);
        return { ...(entry !== undefined ? { link: toLinkResponse(entry) } : {}), diagnostics };
      } catch (err) {
        return errorResponse(err, reply);
      }
    },

    /**
     * POST /experiments/:id/subset
     * Select samples and store the result as a new experiment.
     */
    async subsetExperiment(
      request: FastifyRequest<{ Params: { id: string }; Body: unknown }>,
      reply: FastifyReply,
    ): Promise<ExperimentResponse | ApiError> {
      const body = parseWith(subsetSchema, request.body);
      if (!body.ok) {
        reply.status(400);
        return body.error;
      }
      try {
        const record = await requireRecord(request.params.id);
        const subset = subsetSamples(record.experiment, body.value.samples);
        const created = await store.create({
          experiment: subset,
          derivedFrom: record.id,
          ...(body.value.name !== undefined ? { name: body.value.name } : {}),
        });
        reply.status(201);
        return toExperimentResponse(created, true);
      } catch (err) {
        return errorResponse(err, reply);
      }
    },

    /**
     * GET /experiments/:id/elements/:address
     */
    async readElement(
      request: FastifyRequest<{ Params: { id: string; address: string } }>,
      reply: FastifyReply,
    ): Promise<ElementResponse | ApiError> {
      try {
        const record = await requireRecord(request.params.id);
        const value = getElement(record.experiment, request.params.address);
        if (value === undefined) {
          throw new ExperimentError('NOT_FOUND', `No element at '${request.params.address}'`);
        }
        return { address: request.params.address, value: encodeElement(value) };
      } catch (err) {
        return errorResponse(err, reply);
      }
    },

    /**
     * PUT /experiments/:id/elements/:address
     * Replace or add an element. Tagged tables and matrices are decoded.
     */
    async writeElement(
      request: FastifyRequest<{ Params: { id: string; address: string }; Body: unknown }>,
      reply: FastifyReply,
    ): Promise<ElementResponse | ApiError> {
      const body = parseWith(putElementSchema, request.body);
      if (!body.ok) {
        reply.status(400);
        return body.error;
      }
      try {
        const record = await requireRecord(request.params.id);
        const experiment = setElement(record.experiment, request.params.address, decodeElement(body.value.value));
        await store.update(record.id, experiment);
        return { address: request.params.address, value: encodeElement(getElement(experiment, request.params.address)) };
      } catch (err) {
        return errorResponse(err, reply);
      }
    },

    /**
     * POST /experiments/:id/elements/:address/select
     * Subset one element by its own indices and rewrite its link.
     */
    async selectElements(
      request: FastifyRequest<{ Params: { id: string; address: string }; Body: unknown }>,
      reply: FastifyReply,
    ): Promise<ElementResponse | ApiError> {
      const body = parseWith(selectElementsSchema, request.body);
      if (!body.ok) {
        reply.status(400);
        return body.error;
      }
      try {
        const record = await requireRecord(request.params.id);
        const experiment = selectLinkedElements(record.experiment, request.params.address, body.value.indices);
        await store.update(record.id, experiment);
        return { address: request.params.address, value: encodeElement(getElement(experiment, request.params.address)) };
      } catch (err) {
        return errorResponse(err, reply);
      }
    },

    /**
     * GET /experiments/:id/spectra-sample-index?mode=first|all
     */
    async getSpectraSampleIndex(
      request: FastifyRequest<{ Params: { id: string }; Querystring: { mode?: string } }>,
      reply: FastifyReply,
    ): Promise<SpectraSampleIndexResponse | ApiError> {
      const query = parseWith(sampleIndexQuerySchema, request.query);
      if (!query.ok) {
        reply.status(400);
        return query.error;
      }
      try {
        const record = await requireRecord(request.params.id);
        const mode = query.value.mode ?? linking.defaultLookupMode;
        const { sink, diagnostics } = collectDiagnostics(request);
        if (mode === 'all') {
          const owners = spectraSampleIndex(record.experiment, 'all');
          return { mode, index: owners.map((samples) => [...samples].sort((a, b) => a - b)), diagnostics };
        }
        const index = spectraSampleIndex(record.experiment, 'first', {
          ambiguity: linking.ambiguousMapping,
          onDiagnostic: sink,
        });
        return { mode, index, diagnostics };
      } catch (err) {
        return errorResponse(err, reply);
      }
    },
  };
}

export type ExperimentHandlers = ReturnType<typeof createExperimentHandlers>;
