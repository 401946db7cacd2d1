/**
 * Application Factory
 *
 * Cria a instancia Fastify configurada. Separado do entrypoint para
 * facilitar testes (app.inject).
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { GatewayConfig } from './GatewayConfig';
import { Engine, createEngine } from '../orquestrador/createEngine';
import { AdherenceError } from '../entidades/AdherenceErrors';
import { RecordShapeError } from '../utilitarios/Revive';

import { authPlugin } from './plugins/authPlugin';
import { extractOrGenerateRequestId, requestIdPlugin } from './plugins/requestIdPlugin';
import { telemetryMiddleware } from './telemetry/TelemetryMiddleware';
import { TelemetryRegistry } from './telemetry/TelemetryRegistry';

import {
  healthRoutes,
  bundleRoutes,
  episodeRoutes,
  cycleRoutes,
  complianceRoutes,
  metricsRoutes
} from './routes';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

declare module 'fastify' {
  interface FastifyInstance {
    engine: Engine;
    telemetry: TelemetryRegistry;
  }
}

export interface BuildAppOptions {
  config: GatewayConfig;

  /**
   * Motor já montado (testes); padrão: createEngine(config.monitor)
   */
  engine?: Engine;
}

// ════════════════════════════════════════════════════════════════════════════
// ERROS
// ════════════════════════════════════════════════════════════════════════════

const STATUS_BY_CODE: Record<string, number> = {
  BUNDLE_NOT_FOUND: 404,
  EPISODE_NOT_FOUND: 404,
  ALERT_NOT_FOUND: 404,
  EPISODE_ALREADY_EXISTS: 409,
  EPISODE_CLOSED: 409,
  INVALID_TRANSITION: 409,
  EPISODE_INVALID: 422,
  CATALOG_INVALID: 400,
  CONFIG_INVALID: 400,
  EVIDENCE_UNAVAILABLE: 502,
  REPOSITORY_NOT_INITIALIZED: 503
};

/**
 * Status HTTP para um erro lançado por uma rota
 */
export function statusForError(error: Error): number {
  if (error instanceof AdherenceError) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  if (error instanceof RecordShapeError) {
    return 400;
  }
  // Erros do próprio Fastify (JSON inválido, payload grande)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400) {
    return error.statusCode;
  }
  return 500;
}

function errorCode(error: Error): string {
  if (error instanceof AdherenceError) return error.code;
  if (error instanceof RecordShapeError) return 'INVALID_REQUEST';
  if ('code' in error && typeof error.code === 'string') return error.code;
  return 'INTERNAL_ERROR';
}

// ════════════════════════════════════════════════════════════════════════════
// FACTORY
// ════════════════════════════════════════════════════════════════════════════

/**
 * Cria e configura instancia Fastify com todos os plugins e rotas.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const engine = options.engine ?? await createEngine({ config: config.monitor });
  const telemetry = new TelemetryRegistry();

  const app = Fastify({
    logger: {
      level: config.logLevel
    },
    // conclusão de requisição é logada pelo requestIdPlugin
    disableRequestLogging: true,
    genReqId: request => extractOrGenerateRequestId(request.headers['x-request-id'])
  });

  app.decorate('engine', engine);
  app.decorate('telemetry', telemetry);

  // ══════════════════════════════════════════════════════════════════════════
  // REGISTRAR PLUGINS
  // ══════════════════════════════════════════════════════════════════════════

  await app.register(requestIdPlugin, {
    logRequests: config.nodeEnv !== 'test'
  });

  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS']
  });

  // Telemetria antes da auth: requisições recusadas também são medidas
  await app.register(telemetryMiddleware, { registry: telemetry });

  await app.register(authPlugin, {
    adminToken: config.adminToken,
    requireToken: config.nodeEnv === 'production',
    onFailure: reason => telemetry.incAuthFailure({ reason })
  });

  // ══════════════════════════════════════════════════════════════════════════
  // ERROS
  // ══════════════════════════════════════════════════════════════════════════

  app.setErrorHandler((error: Error, request, reply) => {
    const statusCode = statusForError(error);
    if (statusCode >= 500) {
      request.log.error({ err: error, requestId: request.id }, 'request failed');
    } else {
      request.log.info({ code: errorCode(error), requestId: request.id }, error.message);
    }

    return reply.code(statusCode).send({
      error: statusCode >= 500 && statusCode !== 502 ? 'Internal Server Error' : error.name,
      code: errorCode(error),
      message: error.message,
      requestId: request.id
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // REGISTRAR ROTAS
  // ══════════════════════════════════════════════════════════════════════════

  await app.register(healthRoutes);
  await app.register(metricsRoutes);

  await app.register(bundleRoutes, { prefix: '/api/v1' });
  await app.register(episodeRoutes, { prefix: '/api/v1' });
  await app.register(cycleRoutes, { prefix: '/api/v1' });
  await app.register(complianceRoutes, { prefix: '/api/v1' });

  // ══════════════════════════════════════════════════════════════════════════
  // HOOKS DE LIFECYCLE
  // ══════════════════════════════════════════════════════════════════════════

  app.addHook('onClose', async () => {
    app.log.info('Stopping monitor runner...');
    await engine.runner.stop();
  });

  return app;
}
