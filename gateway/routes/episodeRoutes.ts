/**
 * Episódios: consulta, abertura manual, reavaliação e encerramento.
 */

import { FastifyPluginAsync } from 'fastify';
import { Episode, EpisodeStatus } from '../../entidades/tipos';
import { EpisodeNotFoundError } from '../../entidades/AdherenceErrors';
import { EpisodeEvaluation } from '../../orquestrador/EpisodeEvaluator';
import { episodeAdherence } from '../../servicos/ComplianceAggregator';
import {
  RecordShapeError,
  asRecord,
  oneOf,
  readBoolean,
  readDate,
  readOptionalNumber,
  readOptionalString,
  readString
} from '../../utilitarios/Revive';
import { bodyOrEmpty, parseIntParam } from './requestParsing';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

interface EpisodeIdParams {
  id: string;
}

interface ListEpisodesQuery {
  bundle_id?: string;
  status?: string;
  patient_id?: string;
  limit?: string;
  cursor?: string;
}

const EPISODE_STATUSES: readonly EpisodeStatus[] = Object.values(EpisodeStatus);
const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 500;

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

function withAdherence(episode: Episode) {
  return { ...episode, adherence: episodeAdherence(episode) };
}

function serializeEvaluation(evaluation: EpisodeEvaluation) {
  return {
    episode: withAdherence(evaluation.episode),
    previous_status: evaluation.previous_status,
    transitions: evaluation.transitions,
    deviations: evaluation.deviations,
    context: evaluation.context,
    dry_run: evaluation.dry_run,
    persisted: evaluation.persisted
  };
}

function parseStatus(value: string | undefined): EpisodeStatus | undefined {
  if (value === undefined || value === '') return undefined;
  const status = oneOf(value, EPISODE_STATUSES);
  if (!status) {
    throw new RecordShapeError('status', EPISODE_STATUSES.join(' | '));
  }
  return status;
}

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

export const episodeRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /api/v1/episodes
   * Filtros: bundle_id, status, patient_id. Paginação por cursor.
   */
  app.get<{ Querystring: ListEpisodesQuery }>('/episodes', async (request) => {
    const q = request.query;
    const result = await app.engine.episodes.find({
      bundle_id: q.bundle_id || undefined,
      status: parseStatus(q.status),
      patient_id: q.patient_id || undefined,
      limit: parseIntParam(q.limit, 'limit', DEFAULT_PAGE_SIZE, 1, MAX_PAGE_SIZE),
      cursor: q.cursor || undefined
    });

    return {
      episodes: result.episodes.map(withAdherence),
      next_cursor: result.next_cursor ?? null
    };
  });

  /**
   * GET /api/v1/episodes/:id
   */
  app.get<{ Params: EpisodeIdParams }>('/episodes/:id', async (request) => {
    const episode = await app.engine.episodes.getById(request.params.id);
    if (!episode) {
      throw new EpisodeNotFoundError(request.params.id);
    }
    return withAdherence(episode);
  });

  /**
   * POST /api/v1/episodes
   * Abre um episódio a partir de um trigger. Idempotente pela identidade
   * (patient, encounter, bundle): 201 quando cria, 200 quando já existia.
   */
  app.post<{ Body: unknown }>('/episodes', async (request, reply) => {
    const body = asRecord(request.body, 'body');
    const bundleId = readString(body, 'bundle_id');

    const { episode, created } = await app.engine.evaluator.openEpisode(bundleId, {
      patient_id: readString(body, 'patient_id'),
      encounter_id: readString(body, 'encounter_id'),
      onset_time: readDate(body, 'onset_time'),
      age_days: readOptionalNumber(body, 'age_days'),
      mrn: readOptionalString(body, 'mrn')
    }, 'gateway');

    return reply.code(created ? 201 : 200).send({ episode: withAdherence(episode), created });
  });

  /**
   * POST /api/v1/episodes/:id/evaluate
   * Body opcional: { dry_run?: boolean }
   */
  app.post<{ Params: EpisodeIdParams; Body: unknown }>('/episodes/:id/evaluate', async (request) => {
    const body = asRecord(bodyOrEmpty(request.body), 'body');
    const evaluation = await app.engine.evaluator.evaluateEpisode(request.params.id, {
      dryRun: readBoolean(body, 'dry_run', false),
      actor: 'gateway'
    });
    return serializeEvaluation(evaluation);
  });

  /**
   * POST /api/v1/episodes/:id/close
   * Body: { reason: string }
   */
  app.post<{ Params: EpisodeIdParams; Body: unknown }>('/episodes/:id/close', async (request) => {
    const body = asRecord(bodyOrEmpty(request.body), 'body');
    const reason = readOptionalString(body, 'reason') ?? 'closed by operator';
    const episode = await app.engine.evaluator.closeEpisode(request.params.id, reason, 'gateway');
    return withAdherence(episode);
  });
};

export { withAdherence, serializeEvaluation };
