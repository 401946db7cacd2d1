/**
 * Telemetria: métricas HTTP de cada resposta do gateway.
 */

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { TelemetryRegistry } from './TelemetryRegistry';

export interface TelemetryMiddlewareOptions {
  registry: TelemetryRegistry;
  /** Caminhos fora das métricas (default: o próprio /internal/metrics) */
  ignoreRoutes?: RegExp[];
}

export function getStatusCategory(statusCode: number): string {
  return statusCode >= 100 && statusCode < 600 ? `${Math.floor(statusCode / 100)}xx` : 'unknown';
}

const telemetryMiddlewarePlugin: FastifyPluginAsync<TelemetryMiddlewareOptions> = async (app, options) => {
  const { registry } = options;
  const ignoreRoutes = options.ignoreRoutes ?? [/^\/internal\/metrics/];

  app.addHook('onResponse', async (request, reply) => {
    const path = request.url.split('?')[0];
    if (ignoreRoutes.some(pattern => pattern.test(path))) return;

    // template da rota, nunca a URL crua com ids
    const route = request.routeOptions.url ?? 'unmatched';
    const { method } = request;
    const statusCode = reply.statusCode;

    registry.incHttpRequests({ method, route, status_code: String(statusCode) });
    registry.observeHttpDuration({ method, route }, reply.elapsedTime);
    if (statusCode >= 400) {
      registry.incHttpError({ error_code: getStatusCategory(statusCode) });
    }
  });
};

export const telemetryMiddleware = fp(telemetryMiddlewarePlugin, {
  name: 'telemetry-middleware',
  fastify: '5.x'
});
