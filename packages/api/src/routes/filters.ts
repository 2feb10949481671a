import type { FastifyPluginAsync } from 'fastify';
import type { Services } from '../container';
import { IndexQueryError, toAppError } from '../errors';

export const filterRoutes: FastifyPluginAsync<{ services: Services }> = async (fastify, { services }) => {
  /**
   * GET /api/v1/filters
   * Distinct filenames and product fields, for filter pickers.
   */
  fastify.get('/', async () => {
    try {
      return await services.index.facets();
    } catch (error) {
      throw toAppError(error, IndexQueryError, 'Loading filter values failed');
    }
  });
};
