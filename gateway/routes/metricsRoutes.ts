/**
 * Exposição de métricas no formato Prometheus.
 * Protegida pelo admin token (authPlugin).
 */

import { FastifyPluginAsync } from 'fastify';
import { EpisodeStatus } from '../../entidades/tipos';

const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /internal/metrics
   */
  app.get('/internal/metrics', async (_request, reply) => {
    const { engine, telemetry } = app;

    const counts: Record<EpisodeStatus, number> = {
      [EpisodeStatus.ACTIVE]: 0,
      [EpisodeStatus.COMPLETE]: 0,
      [EpisodeStatus.CLOSED]: 0
    };
    for (const status of Object.values(EpisodeStatus)) {
      counts[status] = (await engine.episodes.listByStatus([status])).length;
    }

    telemetry.updateEpisodeCounts(counts);
    telemetry.updateEventLogDegraded(engine.evaluator.getEventLogStatus().degraded);

    return reply.type(PROMETHEUS_CONTENT_TYPE).send(telemetry.toPrometheus());
  });
};
