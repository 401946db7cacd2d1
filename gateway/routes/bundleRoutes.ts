/**
 * Catálogo de bundles habilitados.
 */

import { FastifyPluginAsync } from 'fastify';

interface BundleIdParams {
  bundleId: string;
}

export const bundleRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /api/v1/bundles
   */
  app.get('/bundles', async () => {
    const bundles = app.engine.catalog.list();
    return {
      bundles: bundles.map(b => ({
        bundle_id: b.bundle_id,
        name: b.name,
        description: b.description,
        version: b.version,
        element_count: b.elements.length,
        elements: b.elements
      })),
      total: bundles.length
    };
  });

  /**
   * GET /api/v1/bundles/:bundleId
   * BundleNotFoundError vira 404 no error handler
   */
  app.get<{ Params: BundleIdParams }>('/bundles/:bundleId', async (request) => {
    return app.engine.catalog.require(request.params.bundleId);
  });
};
