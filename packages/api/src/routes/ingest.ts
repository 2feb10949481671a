import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { Services } from '../container';
import { ValidationError } from '../errors';
import { parseChunks } from '../services/chunks';

const IngestRequestSchema = z.object({
  chunks: z.array(z.unknown()).min(1),
  batchSize: z.number().int().positive().optional(),
});

export const ingestRoutes: FastifyPluginAsync<{ services: Services }> = async (fastify, { services }) => {
  /**
   * POST /api/v1/ingest
   * Idempotent: ids already in the index are skipped.
   */
  fastify.post('/', async (request) => {
    const validation = IngestRequestSchema.safeParse(request.body);

    if (!validation.success) {
      throw new ValidationError(
        'Invalid ingest request',
        validation.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }

    const chunks = parseChunks(validation.data.chunks, 'request body');
    const report = await services.ingestion.ingest(chunks, { batchSize: validation.data.batchSize });

    request.log.info(
      { requestId: request.id, runId: report.runId, processed: report.processed, failed: report.failedBatches.length },
      'Ingest request processed'
    );

    return report;
  });
};
