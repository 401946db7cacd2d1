/**
 * X-Request-Id do gateway.
 *
 * O id é gerado pelo próprio Fastify (`genReqId`, ver app.ts) a partir do
 * header recebido, então `request.id` e o `reqId` dos logs são o mesmo
 * valor. Este plugin devolve o id na resposta e loga a conclusão de cada
 * requisição.
 */

import { randomUUID } from 'crypto';
import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

export interface RequestIdPluginOptions {
  /** Log "request completed" por requisição (default: true) */
  logRequests?: boolean;
}

const MAX_REQUEST_ID_LENGTH = 64;

/**
 * Id recebido, reduzido a [A-Za-z0-9_-] e 64 caracteres; UUID quando não
 * sobra nada.
 */
export function extractOrGenerateRequestId(headerValue: string | string[] | undefined): string {
  const received = typeof headerValue === 'string' ? headerValue : '';
  const sanitized = received.replace(/[^a-zA-Z0-9\-_]/g, '').slice(0, MAX_REQUEST_ID_LENGTH);
  return sanitized.length > 0 ? sanitized : randomUUID();
}

const requestIdPluginImpl: FastifyPluginAsync<RequestIdPluginOptions> = async (app, opts) => {
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-Id', request.id);
  });

  if (opts.logRequests === false) return;

  app.addHook('onResponse', async (request, reply) => {
    request.log.info({
      method: request.method,
      route: request.routeOptions.url ?? 'unmatched',
      statusCode: reply.statusCode,
      latencyMs: Math.round(reply.elapsedTime)
    }, 'request completed');
  });
};

export const requestIdPlugin = fp(requestIdPluginImpl, {
  name: 'request-id-plugin',
  fastify: '5.x'
});
