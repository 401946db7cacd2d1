/**
 * Rotas de health check (públicas).
 */

import { FastifyPluginAsync } from 'fastify';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  uptime: number;
}

interface ReadinessResponse extends HealthResponse {
  catalog: {
    loaded: boolean;
    bundleCount: number;
  };
  episodes: {
    loaded: boolean;
    count: number;
  };
  eventLog: {
    enabled: boolean;
    degraded: boolean;
    errorCount: number;
  };
  runner: {
    running: boolean;
    cyclesCompleted: number;
  };
}

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

const startTime = Date.now();

export const healthRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /health
   * Liveness probe - sempre retorna 200 se o servidor esta rodando
   */
  app.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime
    };
  });

  /**
   * GET /health/ready
   * Readiness probe - catálogo carregado e repositório de episódios acessível.
   * Event log degradado não derruba a prontidão.
   */
  app.get('/health/ready', async (request, reply): Promise<ReadinessResponse> => {
    const { engine } = app;
    const eventLog = engine.evaluator.getEventLogStatus();
    const runner = engine.runner.getStatus();
    const base = {
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime,
      eventLog: {
        enabled: eventLog.enabled,
        degraded: eventLog.degraded,
        errorCount: eventLog.errorCount
      },
      runner: {
        running: runner.running,
        cyclesCompleted: runner.cycles_completed
      }
    };

    try {
      const bundleCount = engine.catalog.list().length;
      const count = await engine.episodes.count();

      return {
        ...base,
        status: eventLog.degraded ? 'degraded' : 'ok',
        catalog: { loaded: bundleCount > 0, bundleCount },
        episodes: { loaded: true, count }
      };
    } catch (error) {
      request.log.error({ err: error }, 'readiness check failed');
      reply.code(503);
      return {
        ...base,
        status: 'error',
        catalog: { loaded: false, bundleCount: 0 },
        episodes: { loaded: false, count: 0 }
      };
    }
  });
};
