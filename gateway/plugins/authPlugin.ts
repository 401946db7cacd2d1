/**
 * Auth Plugin
 *
 * Um único papel: operador com o admin token (Bearer).
 *
 * REGRAS:
 * - /health e /health/ready: públicas
 * - demais rotas: exigem o token
 * - sem token configurado fora de produção: acesso livre (desenvolvimento)
 */

import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import * as crypto from 'crypto';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

declare module 'fastify' {
  interface FastifyRequest {
    authenticated: boolean;
  }
}

export interface AuthPluginOptions {
  adminToken: string;

  /**
   * false libera as rotas quando não há adminToken
   */
  requireToken: boolean;

  /**
   * Chamado a cada requisição recusada (telemetria)
   */
  onFailure?: (reason: 'MISSING_TOKEN' | 'INVALID_TOKEN') => void;
}

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Extrai Bearer token do header Authorization
 */
export function extractBearerToken(authorization: string | undefined): string | null {
  if (!authorization || !authorization.startsWith('Bearer ')) {
    return null;
  }

  const token = authorization.slice(7).trim();
  return token || null;
}

/**
 * Comparação em tempo constante
 */
export function secureCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf-8');
  const bufB = Buffer.from(b, 'utf-8');
  if (bufA.length !== bufB.length) {
    return false;
  }
  return crypto.timingSafeEqual(bufA, bufB);
}

function isPublicRoute(url: string): boolean {
  const path = url.split('?')[0];
  return path === '/health' || path.startsWith('/health/');
}

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

const authPluginImpl: FastifyPluginAsync<AuthPluginOptions> = async (app, opts) => {
  const { adminToken, requireToken, onFailure } = opts;

  app.decorateRequest('authenticated', false);

  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    if (isPublicRoute(request.url)) {
      return;
    }

    if (!adminToken && !requireToken) {
      return;
    }

    const token = extractBearerToken(request.headers.authorization);

    if (!token) {
      onFailure?.('MISSING_TOKEN');
      return reply.code(401).send({
        error: 'Unauthorized',
        code: 'MISSING_TOKEN',
        message: 'Missing Authorization header'
      });
    }

    if (!adminToken || !secureCompare(token, adminToken)) {
      onFailure?.('INVALID_TOKEN');
      request.log.warn({ ip: request.ip }, 'Invalid admin token attempt');
      return reply.code(401).send({
        error: 'Unauthorized',
        code: 'INVALID_TOKEN',
        message: 'Invalid token'
      });
    }

    request.authenticated = true;
  });
};

export const authPlugin = fp(authPluginImpl, {
  name: 'auth-plugin',
  fastify: '5.x'
});
