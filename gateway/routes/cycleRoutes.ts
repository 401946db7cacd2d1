/**
 * Disparo manual de ciclos de avaliação.
 */

import { FastifyPluginAsync } from 'fastify';
import { CycleReport } from '../../orquestrador/EpisodeEvaluator';
import { asRecord, readBoolean, readStringArray } from '../../utilitarios/Revive';
import { bodyOrEmpty } from './requestParsing';

/**
 * Resumo do ciclo; avaliações reduzidas a transições e desvios.
 */
function summarizeCycle(report: CycleReport) {
  return {
    started_at: report.started_at,
    finished_at: report.finished_at,
    dry_run: report.dry_run,
    stopped: report.stopped,
    episodes_evaluated: report.episodes_evaluated,
    episodes_failed: report.episodes_failed,
    elements_resolved: report.elements_resolved,
    deviations_emitted: report.deviations_emitted,
    deviations_suppressed: report.deviations_suppressed,
    deviations_deferred: report.deviations_deferred,
    episodes: report.evaluations.map(e => ({
      episode_id: e.episode.id,
      previous_status: e.previous_status,
      status: e.episode.status,
      transitions: e.transitions.map(t => ({ element_id: t.element_id, status: t.status })),
      deviations: e.deviations
    })),
    errors: report.errors
  };
}

export const cycleRoutes: FastifyPluginAsync = async (app) => {
  /**
   * POST /api/v1/cycles
   * Body opcional: { dry_run?: boolean, bundle_ids?: string[] }
   *
   * Sem opções: um ciclo do runner (triggers + avaliação), sem sobreposição
   * com o daemon. Com opções: só a avaliação, restrita aos bundles pedidos.
   */
  app.post<{ Body: unknown }>('/cycles', async (request) => {
    const { engine, telemetry } = app;
    const body = asRecord(bodyOrEmpty(request.body), 'body');
    const dryRun = readBoolean(body, 'dry_run', false);
    const bundleIds = body.bundle_ids === undefined ? [] : readStringArray(body, 'bundle_ids');

    if (!dryRun && bundleIds.length === 0) {
      const result = await engine.runner.runOnce();
      telemetry.recordCycle(result.report);
      return {
        triggers_found: result.triggers_found,
        episodes_opened: result.episodes_opened,
        trigger_errors: result.trigger_errors,
        ...summarizeCycle(result.report)
      };
    }

    for (const id of bundleIds) {
      engine.catalog.require(id);
    }

    const report = await engine.evaluator.runCycle({
      dryRun,
      bundleIds: bundleIds.length > 0 ? bundleIds : undefined,
      actor: 'gateway'
    });
    telemetry.recordCycle(report);
    return {
      triggers_found: 0,
      episodes_opened: 0,
      trigger_errors: 0,
      ...summarizeCycle(report)
    };
  });
};

export { summarizeCycle };
